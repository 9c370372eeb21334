import type { RunContext } from '@flowpilot/shared';
import { RenderError } from './errors.js';

// $$ | $name | ${name} | ${dotted.path}
const placeholderPattern = /\$(?:(\$)|([A-Za-z_][A-Za-z0-9_]*)|\{([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\})/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function lookup(context: Readonly<RunContext>, placeholder: string): unknown {
  let current: unknown = context;
  for (const part of placeholder.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (value === null || typeof value !== 'object') {
    return String(value);
  }

  return JSON.stringify(value, null, 2);
}

/**
 * Substitutes `$name` / `${name}` placeholders from the supplied context only.
 * Every placeholder must resolve; the first missing one raises a RenderError and nothing is returned.
 */
export function renderPrompt(template: string, context: Readonly<RunContext>): string {
  return template.replace(
    placeholderPattern,
    (match: string, escaped: string | undefined, bare: string | undefined, braced: string | undefined) => {
      if (escaped !== undefined) {
        return '$';
      }

      const placeholder = bare ?? braced;
      if (placeholder === undefined) {
        return match;
      }

      const value = lookup(context, placeholder);
      if (value === undefined) {
        throw new RenderError(placeholder);
      }

      return formatValue(value);
    },
  );
}

export function listPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(placeholderPattern)) {
    const placeholder = match[2] ?? match[3];
    if (placeholder !== undefined) {
      names.add(placeholder);
    }
  }
  return [...names];
}
