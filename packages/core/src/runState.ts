import type {
  HandlerOutput,
  NodeOutputMapping,
  RunContext,
  RunFailure,
  RunSnapshot,
  RunState,
  RunStatusView,
  TerminalRunStatus,
  StepRecord,
  WorkflowDefinition,
} from '@flowpilot/shared';
import { transitionRun } from './stateMachine.js';

export type CreateRunStateParams = {
  runId: string;
  workflow: WorkflowDefinition;
  input: Readonly<RunContext>;
  startedAt: string;
};

export function createRunState(params: CreateRunStateParams): RunState {
  return {
    runId: params.runId,
    workflowId: params.workflow.id,
    workflowVersion: params.workflow.version,
    status: 'running',
    context: { ...params.input },
    currentNode: params.workflow.entryNode,
    stepCount: 0,
    startedAt: params.startedAt,
    completedAt: null,
    history: [],
    failure: null,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

// Detached, frozen copy of the context as a step saw it.
export function snapshotContext(context: Readonly<RunContext>): Readonly<RunContext> {
  return deepFreeze(structuredClone(context));
}

export function appendStepRecord(state: RunState, record: StepRecord): StepRecord {
  if (record.sequence !== state.history.length + 1) {
    throw new Error(`Step sequence ${record.sequence} does not follow ${state.history.length}.`);
  }

  const frozen = deepFreeze({ ...record, output: record.output ? structuredClone(record.output) : null });
  state.history.push(frozen);
  state.stepCount = state.history.length;
  return frozen;
}

/**
 * Projects a handler output through the node's output mapping: a declared field subset first,
 * then nesting under the output key.
 */
export function projectStepOutput(output: Readonly<HandlerOutput>, mapping: NodeOutputMapping): HandlerOutput {
  let projected: HandlerOutput = { ...output };

  if (mapping.fields) {
    projected = {};
    for (const field of mapping.fields) {
      if (Object.prototype.hasOwnProperty.call(output, field)) {
        projected[field] = output[field];
      }
    }
  }

  if (mapping.key) {
    return { [mapping.key]: projected };
  }

  return projected;
}

export function mergeStepOutput(state: RunState, output: Readonly<HandlerOutput>, mapping: NodeOutputMapping): void {
  Object.assign(state.context, projectStepOutput(output, mapping));
}

export function transitionRunStatus(
  state: RunState,
  next: TerminalRunStatus,
  completedAt: string,
  failure: RunFailure | null = null,
): void {
  state.status = transitionRun(state.status, next);
  state.completedAt = completedAt;
  state.failure = failure;
}

export function toRunSnapshot(state: RunState): RunSnapshot {
  return Object.freeze({
    ...state,
    context: { ...state.context },
    history: Object.freeze([...state.history]),
    failure: state.failure ? { ...state.failure } : null,
  });
}

export function toRunStatusView(state: RunState | RunSnapshot): RunStatusView {
  return {
    runId: state.runId,
    workflowId: state.workflowId,
    workflowVersion: state.workflowVersion,
    status: state.status,
    currentNode: state.currentNode,
    stepCount: state.stepCount,
    startedAt: state.startedAt,
    completedAt: state.completedAt,
    failure: state.failure ? { ...state.failure } : null,
  };
}
