import { randomUUID } from 'node:crypto';
import {
  ModelClientError,
  type HandlerOutput,
  type RunContext,
  type RunFailure,
  type RunFailureReason,
  type RunState,
  type RunStore,
  type StepError,
  type StepRecord,
  type TerminalRunStatus,
  type WorkflowDefinition,
  type WorkflowNode,
} from '@flowpilot/shared';
import { defaultEngineConfig, type EngineConfig } from './config.js';
import { HandlerError, RenderError, UnknownHandlerError, toErrorMessage } from './errors.js';
import type { HandlerRegistry, NodeHandler } from './handlerRegistry.js';
import { renderPrompt } from './promptRenderer.js';
import {
  appendStepRecord,
  createRunState,
  mergeStepOutput,
  snapshotContext,
  toRunSnapshot,
  transitionRunStatus,
} from './runState.js';
import { selectNextNode } from './transitions.js';

type EngineEventBase = {
  runId: string;
  workflowId: string;
  timestamp: string;
};

export type EngineEvent = EngineEventBase &
  (
    | { type: 'run_started'; entryNode: string }
    | { type: 'step_started'; nodeId: string; sequence: number; attempt: number }
    | { type: 'step_completed'; nodeId: string; sequence: number; attempt: number; durationMs: number }
    | { type: 'step_failed'; nodeId: string; sequence: number; attempt: number; error: StepError }
    | { type: 'step_retrying'; nodeId: string; nextAttempt: number }
    | { type: 'transition'; from: string; to: string; via: 'edge' | 'error' }
    | { type: 'run_finished'; status: TerminalRunStatus; stepCount: number; failure: RunFailure | null }
  );

export type EngineEventListener = (event: EngineEvent) => Promise<void> | void;

export type RunExecutionOptions = {
  handlers: HandlerRegistry;
  config?: EngineConfig;
  // Aborting this signal cancels the run; an in-flight handler sees its step signal abort.
  signal?: AbortSignal;
  store?: RunStore;
  onEvent?: EngineEventListener;
  now?: () => number;
};

export type ExecuteRunOptions = RunExecutionOptions & {
  runId?: string;
};

type StepOutcome =
  | { ok: true; output: HandlerOutput }
  | { ok: false; error: StepError };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type EngineEventPayload = DistributiveOmit<EngineEvent, keyof EngineEventBase>;

export function toStepError(error: unknown): StepError {
  if (error instanceof RenderError) {
    return { kind: 'RenderError', message: error.message, code: error.code };
  }

  if (error instanceof UnknownHandlerError) {
    return { kind: 'UnknownHandler', message: error.message, code: error.code };
  }

  if (error instanceof HandlerError || error instanceof ModelClientError) {
    return { kind: 'HandlerError', message: error.message, code: error.code };
  }

  return { kind: 'HandlerError', message: toErrorMessage(error), code: null };
}

function isHandlerOutput(value: unknown): value is HandlerOutput {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// Outputs are stored in step records and merged into the context, so they must survive structuredClone.
function acceptHandlerOutput(handlerName: string | null, output: unknown): StepOutcome {
  if (!isHandlerOutput(output)) {
    return {
      ok: false,
      error: { kind: 'HandlerError', message: `Handler "${handlerName}" returned a non-object output.`, code: 'INVALID_OUTPUT' },
    };
  }

  try {
    return { ok: true, output: structuredClone(output) };
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: 'HandlerError',
        message: `Handler "${handlerName}" returned an output that cannot be cloned: ${toErrorMessage(error)}`,
        code: 'INVALID_OUTPUT',
      },
    };
  }
}

function watchStep(deadlineMs: number | null, runSignal: AbortSignal | undefined) {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onCancel: (() => void) | undefined;

  const interrupted = new Promise<StepError>(resolve => {
    if (deadlineMs !== null) {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ kind: 'Timeout', message: `Step exceeded its ${deadlineMs} ms deadline.`, code: 'STEP_TIMEOUT' });
      }, deadlineMs);
    }

    if (runSignal) {
      onCancel = () => {
        controller.abort();
        resolve({ kind: 'Cancelled', message: 'Run was cancelled during the step.', code: null });
      };
      if (runSignal.aborted) {
        onCancel();
      } else {
        runSignal.addEventListener('abort', onCancel, { once: true });
      }
    }
  });

  return {
    signal: controller.signal,
    interrupted,
    dispose() {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      if (onCancel) {
        runSignal?.removeEventListener('abort', onCancel);
      }
    },
  };
}

async function executeStep(
  node: WorkflowNode,
  handler: NodeHandler,
  context: Readonly<RunContext>,
  attempt: number,
  deadlineMs: number | null,
  runSignal: AbortSignal | undefined,
): Promise<StepOutcome> {
  let prompt: string | null = null;
  if (node.promptTemplate !== null) {
    try {
      prompt = renderPrompt(node.promptTemplate, context);
    } catch (error) {
      return { ok: false, error: toStepError(error) };
    }
  }

  const watch = watchStep(deadlineMs, runSignal);
  const invocation = Promise.resolve()
    .then(() => handler.invoke({ node, context, prompt, attempt, signal: watch.signal }))
    .then(
      (output): StepOutcome => acceptHandlerOutput(node.handler, output),
      (error: unknown): StepOutcome => ({ ok: false, error: toStepError(error) }),
    );

  try {
    return await Promise.race([
      invocation,
      watch.interrupted.then((error): StepOutcome => ({ ok: false, error })),
    ]);
  } finally {
    watch.dispose();
  }
}

function resolveHandler(
  handlers: HandlerRegistry,
  node: WorkflowNode,
): { ok: true; handler: NodeHandler } | { ok: false; error: StepError } {
  try {
    return { ok: true, handler: handlers.require(node.handler ?? '(none)') };
  } catch (error) {
    return { ok: false, error: toStepError(error) };
  }
}

function minDeadline(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

/**
 * Drives an already-created run state until it leaves `running`. The state object is owned by this
 * call for its whole duration; callers read it only through snapshots.
 */
export async function driveRun(
  workflow: WorkflowDefinition,
  state: RunState,
  options: RunExecutionOptions,
): Promise<RunState> {
  const config = options.config ?? defaultEngineConfig;
  const now = options.now ?? Date.now;
  const runDeadline = config.runTimeoutMs === null ? null : now() + config.runTimeoutMs;
  // Visits per node, used as the recorded attempt number.
  const visits = new Map<string, number>();
  // Attempts counted against maxRetries, keyed by node or shared by the whole run.
  const retryCounts = new Map<string, number>();

  const timestamp = () => new Date(now()).toISOString();
  const emit = async (event: EngineEventPayload) => {
    await options.onEvent?.({ ...event, runId: state.runId, workflowId: state.workflowId, timestamp: timestamp() });
  };

  const recordStep = (record: StepRecord) => {
    const stored = appendStepRecord(state, record);
    options.store?.appendStep(state.runId, stored);
  };

  const finish = async (status: TerminalRunStatus, failure: RunFailure | null) => {
    transitionRunStatus(state, status, timestamp(), failure);
    options.store?.finishRun(toRunSnapshot(state));
    await emit({ type: 'run_finished', status, stepCount: state.stepCount, failure });
  };

  const fail = (reason: RunFailureReason, message: string) =>
    finish('failed', { reason, message, nodeId: state.currentNode });

  // Anything thrown past this point is an engine fault; the run still ends in a terminal status.
  const abort = (error: unknown) => {
    if (state.status !== 'running') {
      return;
    }
    transitionRunStatus(state, 'failed', timestamp(), {
      reason: 'EngineError',
      message: toErrorMessage(error),
      nodeId: state.currentNode,
    });
    try {
      options.store?.finishRun(toRunSnapshot(state));
    } catch (storeError) {
      throw new AggregateError([error, storeError], `Run "${state.runId}" failed and its outcome could not be stored.`);
    }
  };

  try {
    options.store?.createRun(toRunSnapshot(state));
    await emit({ type: 'run_started', entryNode: state.currentNode });

    while (state.status === 'running') {
      if (options.signal?.aborted) {
        await finish('cancelled', { reason: 'Cancelled', message: 'Run was cancelled.', nodeId: state.currentNode });
        break;
      }

      if (runDeadline !== null && now() >= runDeadline) {
        await fail('Timeout', `Run exceeded its ${config.runTimeoutMs} ms timeout.`);
        break;
      }

      const node = workflow.nodes.get(state.currentNode);
      if (!node) {
        throw new Error(`Node "${state.currentNode}" is not part of workflow "${workflow.id}".`);
      }

      if (node.terminal) {
        await finish('completed', null);
        break;
      }

      if (state.stepCount >= config.maxSteps) {
        await fail('StepBudgetExceeded', `Run reached its budget of ${config.maxSteps} steps.`);
        break;
      }

      const retryKey = config.retryScope === 'node' ? node.id : '*';
      const retryCount = (retryCounts.get(retryKey) ?? 0) + 1;
      if (node.maxRetries !== null && retryCount > node.maxRetries + 1) {
        await fail('RetryLimitExceeded', `Node "${node.id}" exceeded its limit of ${node.maxRetries} retries.`);
        break;
      }
      retryCounts.set(retryKey, retryCount);

      const attempt = (visits.get(node.id) ?? 0) + 1;
      visits.set(node.id, attempt);

      const sequence = state.stepCount + 1;
      const inputSnapshot = snapshotContext(state.context);
      const startedAtMs = now();
      await emit({ type: 'step_started', nodeId: node.id, sequence, attempt });

      const resolved = resolveHandler(options.handlers, node);
      if (!resolved.ok) {
        const error = resolved.error;
        recordStep({
          sequence,
          nodeId: node.id,
          attempt,
          inputSnapshot,
          output: null,
          startedAt: new Date(startedAtMs).toISOString(),
          durationMs: 0,
          error,
        });
        await emit({ type: 'step_failed', nodeId: node.id, sequence, attempt, error });
        await fail(error.kind, error.message);
        break;
      }

      const remainingRunMs = runDeadline === null ? null : Math.max(runDeadline - now(), 1);
      const outcome = await executeStep(
        node,
        resolved.handler,
        inputSnapshot,
        attempt,
        minDeadline(config.stepTimeoutMs, remainingRunMs),
        options.signal,
      );
      const durationMs = Math.max(now() - startedAtMs, 0);

      if (outcome.ok) {
        mergeStepOutput(state, outcome.output, node.output);
        recordStep({
          sequence,
          nodeId: node.id,
          attempt,
          inputSnapshot,
          output: outcome.output,
          startedAt: new Date(startedAtMs).toISOString(),
          durationMs,
          error: null,
        });
        await emit({ type: 'step_completed', nodeId: node.id, sequence, attempt, durationMs });

        const next = selectNextNode(workflow, node.id, outcome.output, state.context);
        if (!next) {
          if (node.failOnDeadEnd) {
            await fail('DeadEnd', `Node "${node.id}" has no applicable outgoing edge.`);
          } else {
            await finish('completed', null);
          }
          break;
        }

        await emit({ type: 'transition', from: node.id, to: next.targetNode, via: 'edge' });
        state.currentNode = next.targetNode;
        continue;
      }

      const error = outcome.error;
      recordStep({
        sequence,
        nodeId: node.id,
        attempt,
        inputSnapshot,
        output: null,
        startedAt: new Date(startedAtMs).toISOString(),
        durationMs,
        error,
      });
      await emit({ type: 'step_failed', nodeId: node.id, sequence, attempt, error });

      if (error.kind === 'Cancelled') {
        await finish('cancelled', { reason: 'Cancelled', message: error.message, nodeId: node.id });
        break;
      }

      const { retry, fallbackTarget } = node.failurePolicy;
      if (retry && node.maxRetries !== null && retryCount <= node.maxRetries) {
        await emit({ type: 'step_retrying', nodeId: node.id, nextAttempt: attempt + 1 });
        continue;
      }

      if (fallbackTarget !== null) {
        state.context.lastError = { nodeId: node.id, kind: error.kind, message: error.message, code: error.code };
        await emit({ type: 'transition', from: node.id, to: fallbackTarget, via: 'error' });
        state.currentNode = fallbackTarget;
        continue;
      }

      // A timed-out final attempt keeps Timeout as the run's reason.
      if (retry && error.kind !== 'Timeout') {
        await fail('RetryLimitExceeded', `Node "${node.id}" failed after ${retryCount} attempts: ${error.message}`);
      } else {
        await fail(error.kind, error.message);
      }
    }
  } catch (error) {
    abort(error);
    throw error;
  }

  return state;
}

export async function executeRun(
  workflow: WorkflowDefinition,
  input: Readonly<RunContext>,
  options: ExecuteRunOptions,
): Promise<RunState> {
  const now = options.now ?? Date.now;
  const state = createRunState({
    runId: options.runId ?? randomUUID(),
    workflow,
    input,
    startedAt: new Date(now()).toISOString(),
  });

  return driveRun(workflow, state, options);
}
