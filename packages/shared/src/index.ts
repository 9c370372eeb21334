// Run statuses
export const runStatuses = ['running', 'completed', 'failed', 'cancelled'] as const;
export type RunStatus = (typeof runStatuses)[number];
export type TerminalRunStatus = Exclude<RunStatus, 'running'>;

// Handler kinds
export type HandlerKind = 'deterministic' | 'decision';

// Guard operator types
export type GuardOperator = '==' | '!=' | '>' | '<' | '>=' | '<=';
export type GuardLogical = 'and' | 'or';

export type GuardLiteral = string | number | boolean | null;

// Guard expression: a single condition, a logical combination or a negation
export type GuardCondition = {
  field: string;
  operator: GuardOperator;
  value: GuardLiteral;
};

export type GuardExpression =
  | GuardCondition
  | { logic: GuardLogical; conditions: GuardExpression[] }
  | { not: GuardExpression };

export type NodeConfig = Readonly<Record<string, unknown>>;

export type FailurePolicy = {
  // Re-run the same node while retries remain.
  retry: boolean;
  // Error edge taken once the node can no longer be retried.
  fallbackTarget: string | null;
};

export type NodeOutputMapping = {
  key: string | null;
  fields: readonly string[] | null;
};

// Validated node within a workflow
export type WorkflowNode = {
  id: string;
  handler: string | null;
  promptTemplateRef: string | null;
  promptTemplate: string | null;
  terminal: boolean;
  config: NodeConfig;
  maxRetries: number | null;
  failurePolicy: FailurePolicy;
  output: NodeOutputMapping;
  failOnDeadEnd: boolean;
};

// Validated outgoing edge; order within a source is priority
export type WorkflowEdge = {
  source: string;
  target: string;
  condition: GuardExpression | null;
  conditionSource: string | null;
  isDefault: boolean;
};

// Validated, immutable workflow definition
export type WorkflowDefinition = {
  id: string;
  version: number;
  description: string | null;
  entryNode: string;
  nodes: ReadonlyMap<string, WorkflowNode>;
  edges: ReadonlyMap<string, readonly WorkflowEdge[]>;
};

export type RunContext = Record<string, unknown>;
export type HandlerOutput = Record<string, unknown>;

/**
 * Compares strings in locale-independent code-unit order.
 * Useful when deterministic ordering must not vary by runtime locale.
 */
export function compareStringsByCodeUnit(a: string, b: string): number {
  if (a < b) {
    return -1;
  }

  if (a > b) {
    return 1;
  }

  return 0;
}

export * from './runs.js';
export * from './model.js';
