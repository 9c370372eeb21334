import { randomUUID } from 'node:crypto';
import type { RunContext, RunSnapshot, RunState, RunStatusView, RunStore, StepRecord } from '@flowpilot/shared';
import type { WorkflowCatalog } from './catalog.js';
import { defaultEngineConfig, type EngineConfig } from './config.js';
import { driveRun, type EngineEventListener } from './engine.js';
import { RunNotFoundError } from './errors.js';
import type { HandlerRegistry } from './handlerRegistry.js';
import { createRunState, toRunSnapshot, toRunStatusView } from './runState.js';

export type WorkflowRuntimeOptions = {
  catalog: Pick<WorkflowCatalog, 'require'>;
  handlers: HandlerRegistry;
  config?: EngineConfig;
  store?: RunStore;
  onEvent?: EngineEventListener;
  now?: () => number;
  createRunId?: () => string;
};

export type WorkflowRuntime = {
  submit(workflowId: string, input?: Readonly<RunContext>): string;
  status(runId: string): RunStatusView | null;
  history(runId: string): StepRecord[] | null;
  cancel(runId: string): boolean;
  waitForRun(runId: string): Promise<RunSnapshot>;
  listRuns(): RunStatusView[];
};

type Settlement = { ok: true; state: RunState } | { ok: false; error: unknown };

type ActiveRun = {
  state: RunState;
  controller: AbortController;
  settled: Promise<Settlement>;
};

/**
 * Runs workflows as independent async tasks. Runs share only the frozen definitions and the
 * handler registry; each run's state is owned by the task driving it.
 *
 * With a store, finished runs are released from memory and read back from the store, so
 * `listRuns` only reports the runs still in flight.
 */
export function createWorkflowRuntime(options: WorkflowRuntimeOptions): WorkflowRuntime {
  const runs = new Map<string, ActiveRun>();
  const config = options.config ?? defaultEngineConfig;
  const now = options.now ?? Date.now;
  const createRunId = options.createRunId ?? randomUUID;

  return {
    submit(workflowId, input = {}) {
      const workflow = options.catalog.require(workflowId);
      const state = createRunState({
        runId: createRunId(),
        workflow,
        input,
        startedAt: new Date(now()).toISOString(),
      });
      const controller = new AbortController();

      const settled = driveRun(workflow, state, {
        handlers: options.handlers,
        config,
        signal: controller.signal,
        store: options.store,
        onEvent: options.onEvent,
        now,
      }).then(
        (finalState): Settlement => {
          // The store now holds the outcome.
          if (options.store) {
            runs.delete(finalState.runId);
          }
          return { ok: true, state: finalState };
        },
        (error: unknown): Settlement => ({ ok: false, error }),
      );

      runs.set(state.runId, { state, controller, settled });
      return state.runId;
    },

    status(runId) {
      const run = runs.get(runId);
      if (run) {
        return toRunStatusView(run.state);
      }
      return options.store?.getRun(runId) ?? null;
    },

    history(runId) {
      const run = runs.get(runId);
      if (run) {
        return [...run.state.history];
      }
      return options.store?.listSteps(runId) ?? null;
    },

    cancel(runId) {
      const run = runs.get(runId);
      if (!run || run.state.status !== 'running' || run.controller.signal.aborted) {
        return false;
      }
      run.controller.abort();
      return true;
    },

    async waitForRun(runId) {
      const run = runs.get(runId);
      if (!run) {
        const stored = options.store?.getSnapshot(runId);
        if (stored) {
          return stored;
        }
        throw new RunNotFoundError(runId);
      }

      const settlement = await run.settled;
      if (!settlement.ok) {
        throw settlement.error;
      }
      return toRunSnapshot(settlement.state);
    },

    listRuns: () => [...runs.values()].map(run => toRunStatusView(run.state)),
  };
}
