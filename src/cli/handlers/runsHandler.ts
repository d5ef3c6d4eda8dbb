/**
 * Handlers for `tapforge runs list` and `tapforge runs show`.
 *
 * @module
 */

import { RunStateStore, type RunListEntry } from "../../core/state/RunStateStore.js";
import { buildRunSummary, type RunSummary } from "../../core/summary/RunSummary.js";

export interface RunsDependencies {
  readonly runsDir: string;
}

export async function handleRunsList(deps: RunsDependencies): Promise<RunListEntry[]> {
  return new RunStateStore({ runsDir: deps.runsDir }).list();
}

/**
 * @throws TapError (STATE_NOT_FOUND / STATE_CORRUPT)
 */
export async function handleRunsShow(runId: string, deps: RunsDependencies): Promise<RunSummary> {
  const store = new RunStateStore({ runsDir: deps.runsDir });
  const state = await store.load(runId.trim());
  return buildRunSummary(state, store.statePath(state.runId));
}
