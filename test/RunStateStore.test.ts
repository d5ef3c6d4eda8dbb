/**
 * Tests for RunStateStore.
 *
 * The store persists one run at `<runsDir>/<runId>/state.json` and is the
 * only source of truth for resume.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  CURRENT_SCHEMA_VERSION,
  RunStateStore,
  getStepRecord,
  isValidRunId,
} from "../src/core/state/RunStateStore.js";
import type { RunInputs } from "../src/core/inputs/RunInputs.js";
import { STEP_NAMES } from "../src/core/pipeline/Step.js";
import { TapError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";

// =============================================================================
// Test Helpers
// =============================================================================

async function createTempDir(): Promise<string> {
  const baseDir = path.join(os.tmpdir(), "tapforge-state-test");
  await fs.mkdir(baseDir, { recursive: true });
  return await fs.mkdtemp(path.join(baseDir, "test-"));
}

function sampleInputs(overrides: Partial<RunInputs> = {}): RunInputs {
  return {
    owner: "alice",
    tap: "tools",
    repoName: "homebrew-tools",
    visibility: "public",
    branch: "main",
    formulaMode: "stub",
    dryRun: false,
    ...overrides,
  };
}

async function expectTapError(promise: Promise<unknown>, code: ErrorCode): Promise<TapError> {
  try {
    await promise;
  } catch (err) {
    expect(err).toBeInstanceOf(TapError);
    if (err instanceof TapError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`Expected TapError ${code}`);
}

// =============================================================================
// Tests
// =============================================================================

describe("RunStateStore", () => {
  let runsDir: string;
  let store: RunStateStore;

  beforeEach(async () => {
    runsDir = await createTempDir();
    store = new RunStateStore({ runsDir });
  });

  afterEach(async () => {
    await fs.rm(runsDir, { recursive: true, force: true });
  });

  describe("create()", () => {
    it("mints a run with every step pending and persists it", async () => {
      const state = await store.create(sampleInputs());

      expect(isValidRunId(state.runId)).toBe(true);
      expect(state.schemaVersion).toBe(CURRENT_SCHEMA_VERSION);
      expect(state.status).toBe("created");
      expect(state.steps.map((s) => s.name)).toEqual([...STEP_NAMES]);
      expect(state.steps.every((s) => s.status === "pending" && s.attempts === 0)).toBe(true);

      const stat = await fs.stat(store.statePath(state.runId));
      expect(stat.isFile()).toBe(true);
    });

    it("gives each run its own identifier", async () => {
      const a = await store.create(sampleInputs());
      const b = await store.create(sampleInputs());

      expect(a.runId).not.toBe(b.runId);
    });
  });

  describe("load()", () => {
    it("returns what was saved", async () => {
      const state = await store.create(sampleInputs({ formulaName: "mytool" }));
      const record = getStepRecord(state, "tap-new");
      record.status = "succeeded";
      record.artifacts = { tapPath: "/brew/Library/Taps/alice/homebrew-tools" };
      record.attempts = 1;
      await store.save(state);

      const loaded = await store.load(state.runId);

      expect(loaded).toEqual(state);
      expect(getStepRecord(loaded, "tap-new").artifacts["tapPath"]).toBe(
        "/brew/Library/Taps/alice/homebrew-tools",
      );
    });

    it("throws STATE_NOT_FOUND for an unknown run", async () => {
      const error = await expectTapError(store.load("does-not-exist"), ErrorCode.STATE_NOT_FOUND);

      expect(error.message).toBe("Run does-not-exist not found");
      expect(error.hint).toBe("List known runs with: tapforge runs list");
    });

    it("throws STATE_NOT_FOUND for an identifier that is not a path segment", async () => {
      await expectTapError(store.load("../escape"), ErrorCode.STATE_NOT_FOUND);
    });

    it("throws STATE_CORRUPT for invalid JSON", async () => {
      const state = await store.create(sampleInputs());
      await fs.writeFile(store.statePath(state.runId), "{ not json", "utf-8");

      const error = await expectTapError(store.load(state.runId), ErrorCode.STATE_CORRUPT);
      expect(error.message).toBe(`State file for run ${state.runId} contains invalid JSON`);
    });

    it("throws STATE_CORRUPT when the schema does not match", async () => {
      const state = await store.create(sampleInputs());
      await fs.writeFile(
        store.statePath(state.runId),
        JSON.stringify({ ...state, status: "exploded" }),
        "utf-8",
      );

      const error = await expectTapError(store.load(state.runId), ErrorCode.STATE_CORRUPT);
      expect(error.message).toContain("has an invalid structure");
      expect(error.message).toContain("status");
    });

    it("throws STATE_CORRUPT for a newer schema version", async () => {
      const state = await store.create(sampleInputs());
      await fs.writeFile(
        store.statePath(state.runId),
        JSON.stringify({ ...state, schemaVersion: CURRENT_SCHEMA_VERSION + 1 }),
        "utf-8",
      );

      const error = await expectTapError(store.load(state.runId), ErrorCode.STATE_CORRUPT);
      expect(error.message).toContain("was written by a newer version");
    });

    it("throws STATE_CORRUPT when the step list differs from the pipeline", async () => {
      const state = await store.create(sampleInputs());
      await fs.writeFile(
        store.statePath(state.runId),
        JSON.stringify({ ...state, steps: state.steps.slice(0, 3) }),
        "utf-8",
      );

      const error = await expectTapError(store.load(state.runId), ErrorCode.STATE_CORRUPT);
      expect(error.message).toContain("lists steps [preflight, tap-new, repo-create]");
    });

    it("throws STATE_CORRUPT for an unknown step error code", async () => {
      const state = await store.create(sampleInputs());
      const steps = state.steps.map((step) =>
        step.name === "tap-new"
          ? { ...step, status: "failed", error: { code: "NOT_A_CODE", message: "boom", phase: "apply" } }
          : step,
      );
      await fs.writeFile(
        store.statePath(state.runId),
        JSON.stringify({ ...state, steps }),
        "utf-8",
      );

      await expectTapError(store.load(state.runId), ErrorCode.STATE_CORRUPT);
    });

    it("throws STATE_CORRUPT when the file belongs to another run", async () => {
      const state = await store.create(sampleInputs());
      await fs.writeFile(
        store.statePath(state.runId),
        JSON.stringify({ ...state, runId: "other-run" }),
        "utf-8",
      );

      const error = await expectTapError(store.load(state.runId), ErrorCode.STATE_CORRUPT);
      expect(error.message).toBe(`State file for run ${state.runId} belongs to run other-run`);
    });

    it("ignores unknown fields", async () => {
      const state = await store.create(sampleInputs());
      await fs.writeFile(
        store.statePath(state.runId),
        JSON.stringify({ ...state, extra: { anything: true } }),
        "utf-8",
      );

      const loaded = await store.load(state.runId);
      expect(loaded.runId).toBe(state.runId);
    });
  });

  describe("save()", () => {
    it("leaves no temp files behind", async () => {
      const state = await store.create(sampleInputs());
      state.status = "running";
      await store.save(state);

      const files = await fs.readdir(path.dirname(store.statePath(state.runId)));
      expect(files).toEqual(["state.json"]);
    });

    it("refreshes updatedAt", async () => {
      const state = await store.create(sampleInputs());
      state.updatedAt = "2000-01-01T00:00:00.000Z";

      await store.save(state);

      expect(state.updatedAt).not.toBe("2000-01-01T00:00:00.000Z");
    });

    it("throws STATE_WRITE_FAILED when the run directory cannot be created", async () => {
      const blocker = path.join(runsDir, "blocked");
      await fs.writeFile(blocker, "not a directory", "utf-8");
      const blocked = new RunStateStore({ runsDir: blocker });

      await expectTapError(blocked.create(sampleInputs()), ErrorCode.STATE_WRITE_FAILED);
    });
  });

  describe("list()", () => {
    it("returns an empty list when no run was recorded", async () => {
      const empty = new RunStateStore({ runsDir: path.join(runsDir, "missing") });

      expect(await empty.list()).toEqual([]);
    });

    it("lists runs newest first and corrupt runs last", async () => {
      const older = await store.create(sampleInputs());
      older.createdAt = "2026-01-01T00:00:00.000Z";
      await store.save(older);

      const newer = await store.create(sampleInputs({ tap: "extras", repoName: "homebrew-extras" }));
      newer.createdAt = "2026-02-01T00:00:00.000Z";
      await store.save(newer);

      const broken = await store.create(sampleInputs());
      await fs.writeFile(store.statePath(broken.runId), "garbage", "utf-8");

      const entries = await store.list();

      expect(entries.map((e) => (e.kind === "ok" ? e.state.runId : e.runId))).toEqual([
        newer.runId,
        older.runId,
        broken.runId,
      ]);
      expect(entries[2]?.kind).toBe("corrupt");
    });

    it("skips directories without a state file", async () => {
      await fs.mkdir(path.join(runsDir, "empty-run"), { recursive: true });

      expect(await store.list()).toEqual([]);
    });
  });
});
