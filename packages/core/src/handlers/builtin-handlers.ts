import type { HandlerOutput, RunContext } from '@flowpilot/shared';
import { HandlerError } from '../errors.js';
import { defineDeterministicHandler, type HandlerMap, type HandlerRequest } from '../handlerRegistry.js';
import { evaluateExpression, ExpressionError, parseExpression, usesAdvancedFunctions } from './arithmetic.js';

function readStringConfig(request: HandlerRequest, key: string, fallback: string): string {
  const value = request.node.config[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new HandlerError('INVALID_NODE_CONFIG', `Node "${request.node.id}" config "${key}" must be a non-empty string.`);
  }
  return value;
}

function readExpression(request: HandlerRequest): { field: string; expression: string } {
  const field = readStringConfig(request, 'field', 'expression');
  const expression = request.context[field];
  if (typeof expression !== 'string') {
    throw new HandlerError('MISSING_INPUT', `Node "${request.node.id}" expects a string "${field}" in the run context.`, {
      field,
    });
  }
  return { field, expression };
}

export const setValuesHandler = defineDeterministicHandler(request => {
  const values = request.node.config.values;
  if (values === null || typeof values !== 'object' || Array.isArray(values)) {
    throw new HandlerError('INVALID_NODE_CONFIG', `Node "${request.node.id}" config "values" must be an object.`);
  }
  return { ...values };
});

export const validateExpressionHandler = defineDeterministicHandler(request => {
  const { expression } = readExpression(request);

  try {
    const tree = parseExpression(expression);
    const operationType = usesAdvancedFunctions(tree) ? 'advanced' : 'arithmetic';
    return {
      parsedExpression: { original: expression, normalized: expression.trim(), valid: true },
      operationType,
    };
  } catch (error) {
    if (!(error instanceof ExpressionError)) {
      throw error;
    }
    return {
      parsedExpression: { original: expression, valid: false, error: error.message },
      error: `Failed to parse expression: ${error.message}`,
    };
  }
});

export const evaluateExpressionHandler = defineDeterministicHandler(request => {
  const { expression } = readExpression(request);

  try {
    return { result: evaluateExpression(expression), error: null };
  } catch (error) {
    if (!(error instanceof ExpressionError)) {
      throw error;
    }
    return { result: null, error: error.message };
  }
});

export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
}

function formatFromContext(context: Readonly<RunContext>): string {
  const error = context.error;
  if (typeof error === 'string' && error.length > 0) {
    return `Error: ${error}`;
  }

  const result = context.result;
  if (typeof result === 'number') {
    const expression = typeof context.expression === 'string' ? context.expression.trim() : 'result';
    return `${expression} = ${formatNumber(result)}`;
  }

  return 'No result available';
}

export const formatResultHandler = defineDeterministicHandler(
  (request): HandlerOutput => ({ formattedResult: formatFromContext(request.context) }),
);

export type BuiltinHandlerName = 'set_values' | 'validate_expression' | 'evaluate_expression' | 'format_result';

export function createBuiltinHandlers(): HandlerMap<BuiltinHandlerName> {
  return {
    set_values: setValuesHandler,
    validate_expression: validateExpressionHandler,
    evaluate_expression: evaluateExpressionHandler,
    format_result: formatResultHandler,
  };
}
