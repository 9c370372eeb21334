import type { GuardCondition, GuardExpression, HandlerOutput, RunContext } from '@flowpilot/shared';

export type GuardScope = {
  output: Readonly<HandlerOutput>;
  context: Readonly<RunContext>;
};

// Never traversed, so a condition cannot reach the prototype chain.
const blockedKeys: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

function readOwn(target: unknown, key: string): unknown {
  if (blockedKeys.has(key) || target === null || typeof target !== 'object') {
    return undefined;
  }

  if (!Object.prototype.hasOwnProperty.call(target, key)) {
    return undefined;
  }

  const value: unknown = Reflect.get(target, key);
  return value;
}

function resolvePath(root: unknown, parts: readonly string[]): unknown {
  let current = root;
  for (const part of parts) {
    current = readOwn(current, part);
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

export function resolveField(scope: GuardScope, field: string): unknown {
  const parts = field.split('.');
  const [head, ...rest] = parts;

  if (head === 'output' && rest.length > 0) {
    return resolvePath(scope.output, rest);
  }

  if (head === 'context' && rest.length > 0) {
    return resolvePath(scope.context, rest);
  }

  const fromOutput = resolvePath(scope.output, parts);
  if (fromOutput !== undefined) {
    return fromOutput;
  }

  return resolvePath(scope.context, parts);
}

function evaluateCondition(condition: GuardCondition, scope: GuardScope): boolean {
  const fieldValue = resolveField(scope, condition.field);
  const target = condition.value;

  switch (condition.operator) {
    case '==': return fieldValue === target || (fieldValue === undefined && target === null);
    case '!=': return !(fieldValue === target || (fieldValue === undefined && target === null));
    case '>': return typeof fieldValue === 'number' && typeof target === 'number' && fieldValue > target;
    case '<': return typeof fieldValue === 'number' && typeof target === 'number' && fieldValue < target;
    case '>=': return typeof fieldValue === 'number' && typeof target === 'number' && fieldValue >= target;
    case '<=': return typeof fieldValue === 'number' && typeof target === 'number' && fieldValue <= target;
  }
}

export function evaluateGuard(guard: GuardExpression, scope: GuardScope): boolean {
  if ('logic' in guard) {
    const results = guard.conditions.map(c => evaluateGuard(c, scope));
    return guard.logic === 'and'
      ? results.every(Boolean)
      : results.some(Boolean);
  }

  if ('not' in guard) {
    return !evaluateGuard(guard.not, scope);
  }

  return evaluateCondition(guard, scope);
}
