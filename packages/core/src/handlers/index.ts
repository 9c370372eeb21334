export {
  createBuiltinHandlers,
  evaluateExpressionHandler,
  formatNumber,
  formatResultHandler,
  setValuesHandler,
  validateExpressionHandler,
  type BuiltinHandlerName,
} from './builtin-handlers.js';
export {
  createDecisionHandler,
  decisionNodeConfigSchema,
  decisionOutputSchema,
  type DecisionHandlerOptions,
  type DecisionNodeConfig,
  type DecisionOutput,
} from './decision-handler.js';
export { evaluateExpression, parseExpression, ExpressionError, type ExpressionErrorCode, type ExpressionNode } from './arithmetic.js';
export { decodeJsonObject, extractJsonPayload } from './response-parsing.js';
