/**
 * Git operations on the local tap repository.
 *
 * Steps use the {@link GitClient} interface; {@link SimpleGitClient} backs it
 * with simple-git. Failures surface as TapError (TOOL_COMMAND_FAILED) with the
 * git error kept as the cause.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { simpleGit, GitError, type SimpleGit } from "simple-git";
import { TapError, asError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface GitStatus {
  /** Uncommitted changes, staged or not, including untracked files */
  readonly dirty: boolean;

  /** Commits not yet on the tracking branch */
  readonly ahead: number;

  /** Tracking-branch commits missing locally */
  readonly behind: number;

  /** Tracking branch, e.g. `origin/main` */
  readonly tracking: string | null;

  /** Checked-out branch */
  readonly branch: string | null;
}

export interface GitClient {
  isRepo(dir: string): Promise<boolean>;
  currentBranch(dir: string): Promise<string>;
  renameBranch(dir: string, branch: string): Promise<void>;

  /** Fetch URL of a remote, or null when the remote is not configured. */
  remoteUrl(dir: string, remote: string): Promise<string | null>;
  addRemote(dir: string, remote: string, url: string): Promise<void>;

  status(dir: string): Promise<GitStatus>;

  /** HEAD commit, or null before the first commit. */
  localHead(dir: string): Promise<string | null>;

  /** Commit a remote branch points at, or null when the branch is absent. */
  remoteHead(dir: string, remote: string, branch: string): Promise<string | null>;

  /**
   * Stages everything and commits.
   *
   * @returns The new commit, or null when there was nothing to commit
   */
  commitAll(dir: string, message: string): Promise<string | null>;

  push(dir: string, remote: string, branch: string): Promise<void>;
}

// =============================================================================
// SimpleGitClient
// =============================================================================

export class SimpleGitClient implements GitClient {
  async isRepo(dir: string): Promise<boolean> {
    return fs.existsSync(path.join(dir, ".git"));
  }

  async currentBranch(dir: string): Promise<string> {
    // symbolic-ref also works before the first commit
    const output = await this.run(dir, "read current branch", (git) =>
      git.raw(["symbolic-ref", "--short", "HEAD"]),
    );
    return output.trim();
  }

  async renameBranch(dir: string, branch: string): Promise<void> {
    await this.run(dir, `rename branch to ${branch}`, (git) => git.raw(["branch", "-M", branch]));
  }

  async remoteUrl(dir: string, remote: string): Promise<string | null> {
    const remotes = await this.run(dir, "list remotes", (git) => git.getRemotes(true));
    const match = remotes.find((r) => r.name === remote);
    return match ? match.refs.fetch : null;
  }

  async addRemote(dir: string, remote: string, url: string): Promise<void> {
    await this.run(dir, `add remote ${remote}`, (git) => git.addRemote(remote, url));
  }

  async status(dir: string): Promise<GitStatus> {
    const status = await this.run(dir, "read status", (git) => git.status());
    return {
      dirty: !status.isClean(),
      ahead: status.ahead,
      behind: status.behind,
      tracking: status.tracking,
      branch: status.current,
    };
  }

  async localHead(dir: string): Promise<string | null> {
    try {
      const head = await simpleGit(dir).revparse(["HEAD"]);
      return head.trim() || null;
    } catch (error) {
      if (error instanceof GitError) {
        return null;
      }
      throw this.wrap(dir, "read HEAD", error);
    }
  }

  async remoteHead(dir: string, remote: string, branch: string): Promise<string | null> {
    const output = await this.run(dir, `list ${remote}/${branch}`, (git) =>
      git.listRemote([remote, `refs/heads/${branch}`]),
    );
    const sha = output.trim().split(/\s+/)[0];
    return sha ? sha : null;
  }

  async commitAll(dir: string, message: string): Promise<string | null> {
    await this.run(dir, "stage changes", (git) => git.raw(["add", "-A"]));

    const status = await this.run(dir, "read status", (git) => git.status());
    if (status.isClean()) {
      return null;
    }

    await this.run(dir, "commit", (git) => git.commit(message));
    return this.localHead(dir);
  }

  async push(dir: string, remote: string, branch: string): Promise<void> {
    await this.run(dir, `push to ${remote}/${branch}`, (git) =>
      git.push(remote, branch, ["--set-upstream"]),
    );
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async run<T>(dir: string, action: string, op: (git: SimpleGit) => Promise<T>): Promise<T> {
    try {
      return await op(simpleGit(dir));
    } catch (error) {
      throw this.wrap(dir, action, error);
    }
  }

  private wrap(dir: string, action: string, error: unknown): TapError {
    const cause = asError(error);
    return new TapError(
      `git failed to ${action}`,
      ErrorCode.TOOL_COMMAND_FAILED,
      { dir, details: cause.message },
      `Inspect the repository with: git -C ${dir} status`,
      cause,
    );
  }
}
