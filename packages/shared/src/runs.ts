import type { HandlerOutput, RunContext, RunStatus } from './index.js';

export const stepErrorKinds = ['RenderError', 'HandlerError', 'UnknownHandler', 'Timeout', 'Cancelled'] as const;
export type StepErrorKind = (typeof stepErrorKinds)[number];

export const runFailureReasons = [
  'RenderError',
  'HandlerError',
  'UnknownHandler',
  'RetryLimitExceeded',
  'StepBudgetExceeded',
  'DeadEnd',
  'Timeout',
  'Cancelled',
  // The engine itself threw (a store, an event listener or a bookkeeping step failed).
  'EngineError',
] as const;
export type RunFailureReason = (typeof runFailureReasons)[number];

export type StepError = {
  kind: StepErrorKind;
  message: string;
  code: string | null;
};

export type StepRecord = {
  sequence: number;
  nodeId: string;
  attempt: number;
  inputSnapshot: Readonly<RunContext>;
  output: HandlerOutput | null;
  startedAt: string;
  durationMs: number;
  error: StepError | null;
};

export type RunFailure = {
  reason: RunFailureReason;
  message: string;
  nodeId: string | null;
};

// Mutable state owned by exactly one in-flight run.
export type RunState = {
  runId: string;
  workflowId: string;
  workflowVersion: number;
  status: RunStatus;
  context: RunContext;
  currentNode: string;
  stepCount: number;
  startedAt: string;
  completedAt: string | null;
  history: StepRecord[];
  failure: RunFailure | null;
};

export type RunSnapshot = Readonly<Omit<RunState, 'history' | 'context'>> & {
  readonly context: Readonly<RunContext>;
  readonly history: readonly StepRecord[];
};

export type RunStatusView = {
  runId: string;
  workflowId: string;
  workflowVersion: number;
  status: RunStatus;
  currentNode: string;
  stepCount: number;
  startedAt: string;
  completedAt: string | null;
  failure: RunFailure | null;
};

// Persistence sink for run state; implementations are synchronous like the SQLite driver.
export type RunStore = {
  createRun(snapshot: RunSnapshot): void;
  appendStep(runId: string, record: StepRecord): void;
  finishRun(snapshot: RunSnapshot): void;
  getRun(runId: string): RunStatusView | null;
  listSteps(runId: string): StepRecord[] | null;
  getSnapshot(runId: string): RunSnapshot | null;
};
