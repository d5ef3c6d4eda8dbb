/**
 * GitHub CLI wrapper.
 *
 * Only the handful of `gh` calls the pipeline needs: authentication status,
 * repository lookup and repository creation. Output of `gh repo view` is
 * requested as JSON and validated with zod before use.
 *
 * @module
 */

import { z } from "zod";
import { describeFailure, expectSuccess, type CommandResult, type CommandRunner } from "./CommandRunner.js";
import type { Visibility } from "../inputs/RunInputs.js";
import { TapError, asError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

const RemoteRepoSchema = z.object({
  name: z.string(),
  url: z.string(),
  sshUrl: z.string(),
});

/**
 * A repository as reported by `gh repo view`.
 */
export type RemoteRepo = z.infer<typeof RemoteRepoSchema>;

export interface RepoCreateParams {
  /** `owner/name` */
  readonly slug: string;

  /** Local repository pushed as the initial source */
  readonly source: string;

  readonly visibility: Visibility;
}

// =============================================================================
// stderr classification
// =============================================================================

const NOT_FOUND_MARKERS = ["could not resolve to a repository", "not found", "404"];
const AUTH_MARKERS = ["gh auth login", "not logged in", "authentication required"];

function includesAny(text: string, markers: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}

function authError(result: CommandResult): TapError {
  return new TapError(
    "GitHub CLI is not authenticated",
    ErrorCode.AUTH_REQUIRED,
    { command: result.command, stderr: result.stderr || undefined },
    "Run: gh auth login",
  );
}

// =============================================================================
// GhCli
// =============================================================================

export class GhCli {
  constructor(private readonly commands: CommandRunner) {}

  /**
   * Raw result of `gh auth status`; preflight interprets it.
   */
  async authStatus(): Promise<CommandResult> {
    return this.commands.run("gh", ["auth", "status"]);
  }

  /**
   * Looks up a repository.
   *
   * @returns The repository, or null when it does not exist
   * @throws TapError (AUTH_REQUIRED) when gh is not logged in
   * @throws TapError (TOOL_COMMAND_FAILED) for any other failure
   */
  async repoView(slug: string): Promise<RemoteRepo | null> {
    const result = await this.commands.run("gh", [
      "repo",
      "view",
      slug,
      "--json",
      "name,url,sshUrl",
    ]);

    if (result.exitCode !== 0 || result.spawnFailed) {
      if (includesAny(result.stderr, AUTH_MARKERS)) {
        throw authError(result);
      }
      if (!result.spawnFailed && includesAny(result.stderr, NOT_FOUND_MARKERS)) {
        return null;
      }
      expectSuccess(result);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw new TapError(
        `Unexpected output from ${result.command}`,
        ErrorCode.TOOL_COMMAND_FAILED,
        { command: result.command, stdout: result.stdout },
        undefined,
        asError(error),
      );
    }

    const parsed = RemoteRepoSchema.safeParse(json);
    if (!parsed.success) {
      throw new TapError(
        `Unexpected output from ${result.command}`,
        ErrorCode.TOOL_COMMAND_FAILED,
        { command: result.command, issues: parsed.error.issues.map((i) => i.message) },
      );
    }
    return parsed.data;
  }

  /**
   * Creates the repository from a local source and registers it as `origin`.
   *
   * @throws TapError (REMOTE_ALREADY_EXISTS) when the name is taken
   */
  async repoCreate(params: RepoCreateParams): Promise<void> {
    const result = await this.commands.run("gh", [
      "repo",
      "create",
      params.slug,
      "--source",
      params.source,
      "--remote",
      "origin",
      params.visibility === "private" ? "--private" : "--public",
    ]);

    if (result.exitCode === 0 && !result.spawnFailed) {
      return;
    }
    if (includesAny(result.stderr, AUTH_MARKERS)) {
      throw authError(result);
    }
    if (result.stderr.toLowerCase().includes("already exists")) {
      throw new TapError(
        `Repository ${params.slug} already exists`,
        ErrorCode.REMOTE_ALREADY_EXISTS,
        { slug: params.slug, detail: describeFailure(result) },
        "Pick another --repo-name, or delete the existing repository.",
      );
    }
    expectSuccess(result);
  }
}
