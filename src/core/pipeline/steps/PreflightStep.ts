/**
 * Preflight: required tools are on PATH and gh is logged in.
 *
 * Runs on every attempt of a run (its check never reports AlreadyDone) and
 * only reads, so it also runs in dry-run.
 *
 * @module
 */

import { expectSuccess } from "../../tools/CommandRunner.js";
import { TapError } from "../../errors/errors.js";
import { ErrorCode } from "../../errors/ErrorCode.js";
import {
  needsApply,
  type ArtifactRef,
  type Artifacts,
  type CheckResult,
  type PipelineStep,
  type StepContext,
} from "../Step.js";

export const REQUIRED_TOOLS = ["git", "brew", "gh"] as const;

const INSTALL_HINTS: Record<(typeof REQUIRED_TOOLS)[number], string> = {
  git: "Install git (https://git-scm.com) and make sure it is on PATH.",
  brew: "Install Homebrew (https://brew.sh) and make sure brew is on PATH.",
  gh: "Install the GitHub CLI (https://cli.github.com), e.g. brew install gh.",
};

export class PreflightStep implements PipelineStep {
  readonly name = "preflight";
  readonly description = "Check git, brew and gh";
  readonly requires: readonly ArtifactRef[] = [];

  async check(): Promise<CheckResult> {
    return needsApply();
  }

  async apply(ctx: StepContext): Promise<Artifacts> {
    for (const tool of REQUIRED_TOOLS) {
      const result = await ctx.tools.commands.run(tool, ["--version"]);

      if (result.spawnFailed) {
        throw new TapError(
          `${tool} was not found on PATH`,
          ErrorCode.PREFLIGHT_MISSING_TOOL,
          { tool },
          INSTALL_HINTS[tool],
        );
      }
      expectSuccess(result);

      ctx.logger.debug("Tool available", { tool, version: result.stdout.split("\n")[0] });
    }

    const auth = await ctx.tools.gh.authStatus();
    if (auth.exitCode !== 0 || auth.spawnFailed) {
      throw new TapError(
        "GitHub CLI is not authenticated",
        ErrorCode.AUTH_REQUIRED,
        { stderr: auth.stderr || undefined },
        "Run: gh auth login",
      );
    }

    return {};
  }

  async validate(): Promise<void> {}
}
