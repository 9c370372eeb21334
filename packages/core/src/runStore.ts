import type { RunContext, RunSnapshot, RunStatusView, RunStore, StepRecord } from '@flowpilot/shared';
import { toRunStatusView } from './runState.js';

type StoredRun = {
  view: RunStatusView;
  context: Readonly<RunContext>;
  steps: StepRecord[];
};

export type InMemoryRunStore = RunStore & {
  listRuns(): RunStatusView[];
};

export function createInMemoryRunStore(): InMemoryRunStore {
  const runs = new Map<string, StoredRun>();

  const requireRun = (runId: string): StoredRun => {
    const run = runs.get(runId);
    if (!run) {
      throw new Error(`Run "${runId}" has not been created in this store.`);
    }
    return run;
  };

  return {
    createRun(snapshot: RunSnapshot) {
      if (runs.has(snapshot.runId)) {
        throw new Error(`Run "${snapshot.runId}" already exists.`);
      }
      runs.set(snapshot.runId, {
        view: toRunStatusView(snapshot),
        context: structuredClone(snapshot.context),
        steps: [...snapshot.history],
      });
    },
    appendStep(runId, record) {
      const run = requireRun(runId);
      run.steps.push(record);
      run.view = { ...run.view, stepCount: run.steps.length, currentNode: record.nodeId };
    },
    finishRun(snapshot) {
      const run = requireRun(snapshot.runId);
      run.view = toRunStatusView(snapshot);
      run.context = structuredClone(snapshot.context);
    },
    getRun: runId => {
      const run = runs.get(runId);
      return run ? { ...run.view } : null;
    },
    listSteps: runId => {
      const run = runs.get(runId);
      return run ? [...run.steps] : null;
    },
    getSnapshot: runId => {
      const run = runs.get(runId);
      return run ? { ...run.view, context: structuredClone(run.context), history: [...run.steps] } : null;
    },
    listRuns: () => [...runs.values()].map(run => ({ ...run.view })),
  };
}
