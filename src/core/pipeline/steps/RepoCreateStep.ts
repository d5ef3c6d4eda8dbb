/**
 * repo-create: creates (or adopts) the GitHub repository and wires `origin`.
 *
 * | gh repo view | local origin     | result                  |
 * |--------------|------------------|-------------------------|
 * | absent       | -                | create                  |
 * | present      | none             | adopt (add origin)      |
 * | present      | matches the repo | AlreadyDone             |
 * | present      | anything else    | REMOTE_ALREADY_EXISTS   |
 *
 * @module
 */

import { repoSlug, type RunInputs } from "../../inputs/RunInputs.js";
import type { RemoteRepo } from "../../tools/GhCli.js";
import { TapError } from "../../errors/errors.js";
import { ErrorCode } from "../../errors/ErrorCode.js";
import {
  alreadyDone,
  needsApply,
  type ArtifactRef,
  type Artifacts,
  type CheckResult,
  type PipelineStep,
  type StepContext,
} from "../Step.js";
import { TAP_PATH } from "./refs.js";

const ORIGIN = "origin";

function normalizeRemote(url: string): string {
  return url.trim().replace(/\/+$/, "").replace(/\.git$/, "");
}

/**
 * True when a remote URL points at the repository (HTTPS or SSH form, with or
 * without `.git`).
 */
export function originMatches(origin: string, repo: Pick<RemoteRepo, "url" | "sshUrl">): boolean {
  const normalized = normalizeRemote(origin);
  return normalized === normalizeRemote(repo.url) || normalized === normalizeRemote(repo.sshUrl);
}

function repoArtifacts(inputs: RunInputs, repoUrl: string): Artifacts {
  return {
    repoName: inputs.repoName,
    repoSlug: repoSlug(inputs),
    repoUrl,
  };
}

export class RepoCreateStep implements PipelineStep {
  readonly name = "repo-create";
  readonly description = "Create the GitHub repository";
  readonly requires: readonly ArtifactRef[] = [TAP_PATH];

  async check(ctx: StepContext): Promise<CheckResult> {
    const tapPath = ctx.artifact(TAP_PATH);
    const slug = repoSlug(ctx.inputs);

    const repo = await ctx.tools.gh.repoView(slug);
    if (!repo) {
      return needsApply();
    }

    const origin = await this.readOrigin(ctx, tapPath);
    if (origin === null) {
      return needsApply();
    }
    if (originMatches(origin, repo)) {
      return alreadyDone(repoArtifacts(ctx.inputs, repo.url));
    }

    throw new TapError(
      `Repository ${slug} exists but origin points elsewhere`,
      ErrorCode.REMOTE_ALREADY_EXISTS,
      { slug, origin, repoUrl: repo.url },
      `Point origin at ${repo.url} (git -C ${tapPath} remote set-url origin ${repo.url}.git), ` +
        `or pick another --repo-name.`,
    );
  }

  async apply(ctx: StepContext): Promise<Artifacts> {
    const tapPath = ctx.artifact(TAP_PATH);
    const slug = repoSlug(ctx.inputs);
    const { git, gh } = ctx.tools;

    if (ctx.dryRun) {
      const existing = await gh.repoView(slug);
      if (existing) {
        return {
          ...repoArtifacts(ctx.inputs, existing.url),
          plan: `git -C ${tapPath} remote add ${ORIGIN} ${existing.url}.git`,
        };
      }
      return {
        ...repoArtifacts(ctx.inputs, `https://github.com/${slug}`),
        plan: `gh repo create ${slug} --source ${tapPath} --remote ${ORIGIN} --${ctx.inputs.visibility}`,
      };
    }

    const branch = await git.currentBranch(tapPath);
    if (branch !== ctx.inputs.branch) {
      await git.renameBranch(tapPath, ctx.inputs.branch);
      ctx.logger.info("Branch renamed", { from: branch, to: ctx.inputs.branch });
    }

    const existing = await gh.repoView(slug);
    if (existing) {
      await git.addRemote(tapPath, ORIGIN, `${existing.url}.git`);
      ctx.logger.info("Adopted existing repository", { slug, repoUrl: existing.url });
    } else {
      await gh.repoCreate({ slug, source: tapPath, visibility: ctx.inputs.visibility });
      ctx.logger.info("Repository created", { slug, visibility: ctx.inputs.visibility });
    }

    const repo = await gh.repoView(slug);
    if (!repo) {
      throw new TapError(
        `Repository ${slug} is not visible after creation`,
        ErrorCode.STEP_APPLY_FAILED,
        { slug },
        `Check https://github.com/${slug}, then resume.`,
      );
    }
    return repoArtifacts(ctx.inputs, repo.url);
  }

  async validate(ctx: StepContext, artifacts: Artifacts): Promise<void> {
    const tapPath = ctx.artifact(TAP_PATH);
    const slug = artifacts["repoSlug"] ?? repoSlug(ctx.inputs);

    const repo = await ctx.tools.gh.repoView(slug);
    if (!repo) {
      throw new TapError(`Repository ${slug} does not exist`, ErrorCode.STEP_VALIDATE_FAILED, {
        slug,
      });
    }

    const origin = await ctx.tools.git.remoteUrl(tapPath, ORIGIN);
    if (origin === null || !originMatches(origin, repo)) {
      throw new TapError(
        `origin does not point at ${repo.url}`,
        ErrorCode.STEP_VALIDATE_FAILED,
        { slug, origin: origin ?? undefined },
      );
    }
  }

  private async readOrigin(ctx: StepContext, tapPath: string): Promise<string | null> {
    // The tap only exists on disk after a real tap-new
    if (!(await ctx.tools.git.isRepo(tapPath))) {
      return null;
    }
    return ctx.tools.git.remoteUrl(tapPath, ORIGIN);
  }
}
