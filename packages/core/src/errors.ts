import { compareStringsByCodeUnit, type RunStatus } from '@flowpilot/shared';

export type DefinitionErrorCode =
  | 'INVALID_DOCUMENT'
  | 'DUPLICATE_NODE'
  | 'MISSING_ENTRY_NODE'
  | 'DANGLING_EDGE'
  | 'DEFAULT_EDGE_NOT_LAST'
  | 'EDGE_WITHOUT_CONDITION'
  | 'INVALID_CONDITION'
  | 'NON_TERMINAL_WITHOUT_EDGES'
  | 'MISSING_HANDLER'
  | 'UNKNOWN_HANDLER'
  | 'MISSING_TEMPLATE'
  | 'INVALID_ERROR_TARGET'
  | 'RETRY_WITHOUT_LIMIT';

export class DefinitionError extends Error {
  readonly code: DefinitionErrorCode;
  readonly workflowId: string | null;
  readonly nodeId: string | null;
  readonly edgeIndex: number | null;

  constructor(
    code: DefinitionErrorCode,
    message: string,
    options: {
      workflowId?: string | null;
      nodeId?: string | null;
      edgeIndex?: number | null;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DefinitionError';
    this.code = code;
    this.workflowId = options.workflowId ?? null;
    this.nodeId = options.nodeId ?? null;
    this.edgeIndex = options.edgeIndex ?? null;
  }
}

export class RenderError extends Error {
  readonly code = 'MISSING_PROMPT_VARIABLE';
  readonly placeholder: string;

  constructor(placeholder: string) {
    super(`Prompt variable "${placeholder}" is not present in the run context.`);
    this.name = 'RenderError';
    this.placeholder = placeholder;
  }
}

export class HandlerError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message);
    this.name = 'HandlerError';
    this.code = code;
    this.details = details;
    this.cause = cause;
  }
}

export class UnknownHandlerError extends Error {
  readonly code = 'UNKNOWN_HANDLER';
  readonly handlerName: string;
  readonly availableHandlers: readonly string[];

  constructor(handlerName: string, availableHandlers: readonly string[]) {
    const sortedHandlers = [...availableHandlers].sort(compareStringsByCodeUnit);
    const handlersText = sortedHandlers.length > 0 ? sortedHandlers.join(', ') : '(none)';
    super(`Unknown node handler "${handlerName}". Available handlers: ${handlersText}.`);

    this.name = 'UnknownHandlerError';
    this.handlerName = handlerName;
    this.availableHandlers = sortedHandlers;
  }
}

export class ConditionSyntaxError extends Error {
  readonly code = 'INVALID_CONDITION';
  readonly source: string;
  readonly position: number;

  constructor(source: string, position: number, detail: string) {
    super(`Invalid condition "${source}" at offset ${position}: ${detail}`);
    this.name = 'ConditionSyntaxError';
    this.source = source;
    this.position = position;
  }
}

export class InvalidRunTransitionError extends Error {
  readonly code = 'INVALID_RUN_TRANSITION';
  readonly from: RunStatus;
  readonly to: RunStatus;

  constructor(from: RunStatus, to: RunStatus) {
    super(`Invalid run transition: ${from} -> ${to}`);
    this.name = 'InvalidRunTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class WorkflowNotFoundError extends Error {
  readonly code = 'WORKFLOW_NOT_FOUND';
  readonly workflowId: string;

  constructor(workflowId: string) {
    super(`Workflow "${workflowId}" is not registered.`);
    this.name = 'WorkflowNotFoundError';
    this.workflowId = workflowId;
  }
}

export class ConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION';
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.key = key;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export class RunNotFoundError extends Error {
  readonly code = 'RUN_NOT_FOUND';
  readonly runId: string;

  constructor(runId: string) {
    super(`Run "${runId}" was not found.`);
    this.name = 'RunNotFoundError';
    this.runId = runId;
  }
}
