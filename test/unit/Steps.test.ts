/**
 * Unit tests for individual pipeline steps.
 *
 * Each step is called directly with a hand-built context over the in-process
 * tool stand-ins.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  DEFAULT_PIPELINE_SETTINGS,
  type ArtifactRef,
  type PipelineSettings,
  type StepContext,
} from "../../src/core/pipeline/Step.js";
import type { RunInputs } from "../../src/core/inputs/RunInputs.js";
import { createLogger, nullSink } from "../../src/core/logging/ContextualLogger.js";
import { PreflightStep } from "../../src/core/pipeline/steps/PreflightStep.js";
import { TapNewStep, tapPathFor } from "../../src/core/pipeline/steps/TapNewStep.js";
import { RepoCreateStep, originMatches } from "../../src/core/pipeline/steps/RepoCreateStep.js";
import { AddFormulaStep, resolveFormulaName } from "../../src/core/pipeline/steps/AddFormulaStep.js";
import { CommitPushStep } from "../../src/core/pipeline/steps/CommitPushStep.js";
import { ValidateStep } from "../../src/core/pipeline/steps/ValidateStep.js";
import { createPipeline } from "../../src/core/pipeline/Pipeline.js";
import { STEP_NAMES } from "../../src/core/pipeline/Step.js";
import { TapError } from "../../src/core/errors/errors.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";
import { createFakeToolbox, type FakeToolbox } from "../helpers/fakeTools.js";

// =============================================================================
// Test Helpers
// =============================================================================

const INPUTS: RunInputs = {
  owner: "alice",
  tap: "tools",
  repoName: "homebrew-tools",
  visibility: "public",
  branch: "main",
  formulaMode: "stub",
  dryRun: false,
};

interface ContextOptions {
  inputs?: Partial<RunInputs>;
  settings?: PipelineSettings;
  artifacts?: Record<string, string>;
}

function createContext(fake: FakeToolbox, options: ContextOptions = {}): StepContext {
  const inputs = { ...INPUTS, ...options.inputs };
  const artifacts = options.artifacts ?? {};
  return {
    runId: "run-1",
    inputs,
    dryRun: inputs.dryRun,
    tools: fake.tools,
    settings: options.settings ?? DEFAULT_PIPELINE_SETTINGS,
    logger: createLogger({ sink: nullSink }),
    artifact: (ref: ArtifactRef) => {
      const value = artifacts[`${ref.step}.${ref.key}`];
      if (value === undefined) {
        throw new TapError(`missing ${ref.step}.${ref.key}`, ErrorCode.MISSING_DEPENDENCY);
      }
      return value;
    },
  };
}

async function rejection(promise: Promise<unknown>): Promise<TapError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof TapError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected a TapError");
}

// =============================================================================
// Tests
// =============================================================================

describe("pipeline steps", () => {
  let tempDir: string;
  let fake: FakeToolbox;
  let tapPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tapforge-steps-"));
    fake = createFakeToolbox(tempDir);
    tapPath = fake.toolchain.tapPath("alice", "homebrew-tools");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("creates the steps in pipeline order", () => {
    expect(createPipeline().map((s) => s.name)).toEqual([...STEP_NAMES]);
  });

  describe("preflight", () => {
    it("checks every tool and the gh login", async () => {
      await new PreflightStep().apply(createContext(fake));

      expect(fake.toolchain.commandLines()).toEqual([
        "git --version",
        "brew --version",
        "gh --version",
        "gh auth status",
      ]);
    });

    it("never reports already done", async () => {
      expect(await new PreflightStep().check()).toEqual({ kind: "needs-apply" });
    });
  });

  describe("tap-new", () => {
    it("places the tap under Library/Taps", () => {
      expect(tapPathFor("/opt/homebrew", INPUTS)).toBe(
        path.join("/opt/homebrew", "Library", "Taps", "alice", "homebrew-tools"),
      );
    });

    it("reports an existing tap repository as already done", async () => {
      await fs.mkdir(tapPath, { recursive: true });
      fake.git.init(tapPath);

      expect(await new TapNewStep().check(createContext(fake))).toEqual({
        kind: "already-done",
        artifacts: { tapPath },
      });
    });

    it("raises TAP_PATH_INVALID for a directory that is not a repository", async () => {
      await fs.mkdir(tapPath, { recursive: true });

      const error = await rejection(new TapNewStep().check(createContext(fake)));

      expect(error.code).toBe(ErrorCode.TAP_PATH_INVALID);
      expect(error.message).toBe(`Tap path exists but is not a git repository: ${tapPath}`);
    });

    it("fails validation when no repository was created", async () => {
      const error = await rejection(new TapNewStep().validate(createContext(fake), { tapPath }));

      expect(error.code).toBe(ErrorCode.STEP_VALIDATE_FAILED);
    });
  });

  describe("repo-create", () => {
    const repo = {
      url: "https://github.com/alice/homebrew-tools",
      sshUrl: "git@github.com:alice/homebrew-tools.git",
    };

    it("matches HTTPS and SSH origins with or without .git", () => {
      expect(originMatches("https://github.com/alice/homebrew-tools.git", repo)).toBe(true);
      expect(originMatches("https://github.com/alice/homebrew-tools/", repo)).toBe(true);
      expect(originMatches("git@github.com:alice/homebrew-tools.git", repo)).toBe(true);
      expect(originMatches("https://github.com/bob/homebrew-tools.git", repo)).toBe(false);
    });

    it("renames the branch before creating the repository", async () => {
      await fs.mkdir(tapPath, { recursive: true });
      fake.git.init(tapPath, "master");

      await new RepoCreateStep().apply(
        createContext(fake, { artifacts: { "tap-new.tapPath": tapPath } }),
      );

      expect(await fake.git.currentBranch(tapPath)).toBe("main");
      expect(await fake.git.remoteUrl(tapPath, "origin")).toBe(
        "https://github.com/alice/homebrew-tools.git",
      );
    });

    it("plans gh repo create in dry-run when the repository is absent", async () => {
      const artifacts = await new RepoCreateStep().apply(
        createContext(fake, { inputs: { dryRun: true }, artifacts: { "tap-new.tapPath": tapPath } }),
      );

      expect(artifacts["plan"]).toBe(
        `gh repo create alice/homebrew-tools --source ${tapPath} --remote origin --public`,
      );
    });

    it("plans adopting an existing repository in dry-run", async () => {
      fake.toolchain.addRemoteRepo("alice/homebrew-tools");

      const artifacts = await new RepoCreateStep().apply(
        createContext(fake, { inputs: { dryRun: true }, artifacts: { "tap-new.tapPath": tapPath } }),
      );

      expect(artifacts).toEqual({
        repoName: "homebrew-tools",
        repoSlug: "alice/homebrew-tools",
        repoUrl: "https://github.com/alice/homebrew-tools",
        plan: `git -C ${tapPath} remote add origin https://github.com/alice/homebrew-tools.git`,
      });
      expect(fake.toolchain.commandLines()).toEqual([
        "gh repo view alice/homebrew-tools --json name,url,sshUrl",
      ]);
    });
  });

  describe("add-formula", () => {
    it("names stub formulas after the tap", () => {
      expect(resolveFormulaName(INPUTS)).toBe("tools");
    });

    it("prefers an explicit formula name", () => {
      expect(resolveFormulaName({ ...INPUTS, formulaName: "mytool" })).toBe("mytool");
    });

    it("derives the name from the URL in brew-create mode", () => {
      expect(
        resolveFormulaName({
          ...INPUTS,
          formulaMode: "brew-create",
          formulaUrl: "https://example.com/mytool-1.0.tar.gz",
        }),
      ).toBe("mytool");
    });

    it("raises INPUT_REQUIRED when no name can be derived", () => {
      expect(() =>
        resolveFormulaName({ ...INPUTS, formulaMode: "brew-create", formulaUrl: "https://example.com/" }),
      ).toThrow(TapError);
    });

    it("fails when brew create leaves several candidates", async () => {
      await fs.mkdir(path.join(tapPath, "Formula"), { recursive: true });
      await fs.writeFile(path.join(tapPath, "Formula", "other.rb"), "class Other < Formula\nend\n");
      fake.toolchain.brewCreateWrites = "my-tool";
      const ctx = createContext(fake, {
        inputs: { formulaMode: "brew-create", formulaUrl: "https://example.com/mytool-1.0.tar.gz" },
        artifacts: { "tap-new.tapPath": tapPath },
      });

      const error = await rejection(new AddFormulaStep().apply(ctx));

      expect(error.code).toBe(ErrorCode.STEP_APPLY_FAILED);
      expect(error.message).toBe("brew create did not produce Formula/mytool.rb");
      expect(error.hint).toBe("Start a new run with --formula-name set to the name brew uses.");
    });
  });

  describe("commit-push", () => {
    it("refuses to push a branch that is behind its remote", async () => {
      await fs.mkdir(tapPath, { recursive: true });
      fake.git.init(tapPath);
      fake.git.setBehind(tapPath, 2);

      const error = await rejection(
        new CommitPushStep().apply(
          createContext(fake, {
            artifacts: { "tap-new.tapPath": tapPath, "repo-create.repoSlug": "alice/homebrew-tools" },
          }),
        ),
      );

      expect(error.code).toBe(ErrorCode.GIT_BEHIND_REMOTE);
      expect(error.message).toBe("Local main is 2 commit(s) behind origin");
      expect(fake.git.commits).toEqual([]);
    });

    it("plans the commit and push in dry-run", async () => {
      const artifacts = await new CommitPushStep().apply(
        createContext(fake, {
          inputs: { dryRun: true, branch: "trunk" },
          settings: { ...DEFAULT_PIPELINE_SETTINGS, commitMessage: "Bootstrap" },
          artifacts: { "tap-new.tapPath": tapPath },
        }),
      );

      expect(artifacts).toEqual({
        branch: "trunk",
        plan: 'git add -A && git commit -m "Bootstrap" && git push --set-upstream origin trunk',
      });
    });
  });

  describe("validate", () => {
    it("plans the configured validation commands in dry-run", async () => {
      const artifacts = await new ValidateStep().apply(
        createContext(fake, {
          inputs: { dryRun: true },
          settings: {
            ...DEFAULT_PIPELINE_SETTINGS,
            validation: { audit: true, install: true, test: true },
          },
          artifacts: { "add-formula.formulaName": "tools" },
        }),
      );

      expect(artifacts).toEqual({
        tapName: "alice/tools",
        plan:
          "brew tap alice/tools && brew audit --formula alice/tools/tools && " +
          "brew install alice/tools/tools && brew test alice/tools/tools",
      });
      expect(fake.toolchain.calls).toEqual([]);
    });

    it("fails when brew does not list the tap", async () => {
      const error = await rejection(
        new ValidateStep().validate(createContext(fake), { tapName: "alice/tools" }),
      );

      expect(error.code).toBe(ErrorCode.STEP_VALIDATE_FAILED);
      expect(error.message).toBe("brew tap does not list alice/tools");
    });
  });
});
