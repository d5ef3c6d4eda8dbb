/**
 * Artifacts passed between steps.
 *
 * @module
 */

import type { ArtifactRef } from "../Step.js";

export const TAP_PATH: ArtifactRef = { step: "tap-new", key: "tapPath" };
export const REPO_SLUG: ArtifactRef = { step: "repo-create", key: "repoSlug" };
export const FORMULA_NAME: ArtifactRef = { step: "add-formula", key: "formulaName" };
export const FORMULA_PATH: ArtifactRef = { step: "add-formula", key: "formulaPath" };
export const BRANCH: ArtifactRef = { step: "commit-push", key: "branch" };
