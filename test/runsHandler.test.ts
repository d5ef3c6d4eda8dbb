/**
 * Tests for the runs list/show handlers.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { handleRunsList, handleRunsShow } from "../src/cli/handlers/runsHandler.js";
import { getStepRecord, RunStateStore } from "../src/core/state/RunStateStore.js";
import type { RunInputs } from "../src/core/inputs/RunInputs.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";

const INPUTS: RunInputs = {
  owner: "alice",
  tap: "tools",
  repoName: "homebrew-tools",
  visibility: "public",
  branch: "main",
  formulaMode: "stub",
  dryRun: false,
};

describe("runs handlers", () => {
  let runsDir: string;
  let store: RunStateStore;

  beforeEach(async () => {
    runsDir = await fs.mkdtemp(path.join(os.tmpdir(), "tapforge-runs-"));
    store = new RunStateStore({ runsDir });
  });

  afterEach(async () => {
    await fs.rm(runsDir, { recursive: true, force: true });
  });

  describe("handleRunsList", () => {
    it("returns an empty list for a fresh installation", async () => {
      const entries = await handleRunsList({ runsDir: path.join(runsDir, "nothing-here") });

      expect(entries).toEqual([]);
    });

    it("returns recorded runs", async () => {
      const state = await store.create(INPUTS);

      const entries = await handleRunsList({ runsDir });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ kind: "ok", state: { runId: state.runId } });
    });
  });

  describe("handleRunsShow", () => {
    it("summarises a halted run", async () => {
      const state = await store.create(INPUTS);
      const tapNew = getStepRecord(state, "tap-new");
      tapNew.status = "succeeded";
      tapNew.attempts = 1;
      tapNew.artifacts = { tapPath: "/brew/Library/Taps/alice/homebrew-tools" };
      const repoCreate = getStepRecord(state, "repo-create");
      repoCreate.status = "failed";
      repoCreate.attempts = 1;
      repoCreate.error = {
        code: ErrorCode.REMOTE_ALREADY_EXISTS,
        message: "Repository alice/homebrew-tools already exists",
        phase: "apply",
      };
      state.status = "halted";
      state.currentStep = "repo-create";
      await store.save(state);

      const summary = await handleRunsShow(` ${state.runId} `, { runsDir });

      expect(summary.runId).toBe(state.runId);
      expect(summary.status).toBe("halted");
      expect(summary.tapPath).toBe("/brew/Library/Taps/alice/homebrew-tools");
      expect(summary.repoSlug).toBeUndefined();
      expect(summary.installCommand).toBeUndefined();
      expect(summary.statePath).toBe(path.join(runsDir, state.runId, "state.json"));
      expect(summary.steps[2]).toEqual({
        name: "repo-create",
        status: "failed",
        attempts: 1,
        errorCode: ErrorCode.REMOTE_ALREADY_EXISTS,
        errorMessage: "Repository alice/homebrew-tools already exists",
      });
    });

    it("throws STATE_NOT_FOUND for an unknown run", async () => {
      await expect(handleRunsShow("missing", { runsDir })).rejects.toMatchObject({
        code: ErrorCode.STATE_NOT_FOUND,
      });
    });
  });
});
