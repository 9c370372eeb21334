export {
  DefinitionError,
  RenderError,
  HandlerError,
  UnknownHandlerError,
  ConditionSyntaxError,
  InvalidRunTransitionError,
  WorkflowNotFoundError,
  RunNotFoundError,
  ConfigurationError,
  toErrorMessage,
  type DefinitionErrorCode,
} from './errors.js';
export { getNode, getEntryNode, getOutgoingEdges, listNodeIds } from './workflow.js';
export { canTransitionRun, transitionRun, isRunTerminal } from './stateMachine.js';
export { evaluateGuard, resolveField, type GuardScope } from './guards.js';
export { parseCondition } from './conditions.js';
export { selectNextNode, type TransitionResult } from './transitions.js';
export { renderPrompt, listPlaceholders } from './promptRenderer.js';
export {
  createInMemoryTemplateSource,
  emptyTemplateSource,
  loadTemplateDirectory,
  PROMPT_TEMPLATE_EXTENSION,
  type PromptTemplateSource,
} from './templateSource.js';
export {
  createHandlerRegistry,
  defineDeterministicHandler,
  type HandlerMap,
  type HandlerRegistry,
  type HandlerRequest,
  type NodeHandler,
} from './handlerRegistry.js';
export {
  guardExpressionSchema,
  workflowDocumentSchema,
  type WorkflowDocument,
} from './definitionSchema.js';
export {
  loadWorkflowDefinition,
  loadWorkflowDirectory,
  loadWorkflowFile,
  loadWorkflowText,
  parseWorkflowDocument,
  WORKFLOW_FILE_EXTENSIONS,
  type LoadWorkflowOptions,
} from './workflowLoader.js';
export {
  appendStepRecord,
  createRunState,
  mergeStepOutput,
  projectStepOutput,
  snapshotContext,
  toRunSnapshot,
  toRunStatusView,
  transitionRunStatus,
  type CreateRunStateParams,
} from './runState.js';
export {
  defaultEngineConfig,
  engineConfigEnv,
  resolveEngineConfig,
  retryScopes,
  type EngineConfig,
  type RetryScope,
} from './config.js';
export {
  driveRun,
  executeRun,
  toStepError,
  type EngineEvent,
  type EngineEventListener,
  type ExecuteRunOptions,
  type RunExecutionOptions,
} from './engine.js';
export { createWorkflowCatalog, type WorkflowCatalog } from './catalog.js';
export { createInMemoryRunStore, type InMemoryRunStore } from './runStore.js';
export { createWorkflowRuntime, type WorkflowRuntime, type WorkflowRuntimeOptions } from './runtime.js';
export { runBatch, type BatchItemResult, type RunBatchOptions } from './batch.js';
export * from './handlers/index.js';
