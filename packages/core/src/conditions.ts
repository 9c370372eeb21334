import type { GuardExpression, GuardLiteral, GuardOperator } from '@flowpilot/shared';
import { ConditionSyntaxError } from './errors.js';

/*
 * Grammar for edge conditions written as strings:
 *
 *   expression := or
 *   or         := and (("or" | "||") and)*
 *   and        := unary (("and" | "&&") unary)*
 *   unary      := ("not" | "!") unary | "(" expression ")" | comparison
 *   comparison := path (operator literal)?
 *   literal    := number | quoted string | true | false | null | bare word
 *
 * A bare path is shorthand for `path == true`; a bare word literal is a string.
 */

type Token =
  | { type: 'path'; value: string; position: number }
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'operator'; value: GuardOperator; position: number }
  | { type: 'and' | 'or' | 'not' | 'lparen' | 'rparen' | 'end'; position: number };

const comparisonOperators: readonly GuardOperator[] = ['==', '!=', '>=', '<=', '>', '<'];
const identifierStart = /[A-Za-z_]/;
const identifierPart = /[A-Za-z0-9_]/;
const digit = /[0-9]/;

function readQuoted(source: string, start: number): { value: string; next: number } {
  const quote = source[start];
  let value = '';
  let index = start + 1;
  while (index < source.length) {
    const char = source[index];
    if (char === '\\' && index + 1 < source.length) {
      value += source[index + 1];
      index += 2;
      continue;
    }
    if (char === quote) {
      return { value, next: index + 1 };
    }
    value += char;
    index += 1;
  }

  throw new ConditionSyntaxError(source, start, 'unterminated string literal');
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '(') {
      tokens.push({ type: 'lparen', position: index });
      index += 1;
      continue;
    }

    if (char === ')') {
      tokens.push({ type: 'rparen', position: index });
      index += 1;
      continue;
    }

    if (char === '"' || char === "'") {
      const quoted = readQuoted(source, index);
      tokens.push({ type: 'string', value: quoted.value, position: index });
      index = quoted.next;
      continue;
    }

    if (source.startsWith('&&', index)) {
      tokens.push({ type: 'and', position: index });
      index += 2;
      continue;
    }

    if (source.startsWith('||', index)) {
      tokens.push({ type: 'or', position: index });
      index += 2;
      continue;
    }

    const operator = comparisonOperators.find(candidate => source.startsWith(candidate, index));
    if (operator) {
      tokens.push({ type: 'operator', value: operator, position: index });
      index += operator.length;
      continue;
    }

    if (char === '!') {
      tokens.push({ type: 'not', position: index });
      index += 1;
      continue;
    }

    if (digit.test(char) || (char === '-' && digit.test(source[index + 1] ?? ''))) {
      const match = /^-?\d+(\.\d+)?/.exec(source.slice(index));
      if (!match) {
        throw new ConditionSyntaxError(source, index, 'malformed number');
      }
      tokens.push({ type: 'number', value: Number(match[0]), position: index });
      index += match[0].length;
      continue;
    }

    if (identifierStart.test(char)) {
      const start = index;
      while (index < source.length && (identifierPart.test(source[index]) || source[index] === '.')) {
        index += 1;
      }
      const word = source.slice(start, index);
      if (word.startsWith('.') || word.endsWith('.') || word.includes('..')) {
        throw new ConditionSyntaxError(source, start, `malformed field path "${word}"`);
      }

      const lowered = word.toLowerCase();
      if (lowered === 'and' || lowered === 'or' || lowered === 'not') {
        tokens.push({ type: lowered, position: start });
      } else {
        tokens.push({ type: 'path', value: word, position: start });
      }
      continue;
    }

    throw new ConditionSyntaxError(source, index, `unexpected character "${char}"`);
  }

  tokens.push({ type: 'end', position: source.length });
  return tokens;
}

class ConditionParser {
  readonly #source: string;
  readonly #tokens: Token[];
  #index = 0;

  constructor(source: string) {
    this.#source = source;
    this.#tokens = tokenize(source);
  }

  parse(): GuardExpression {
    const expression = this.#parseOr();
    const trailing = this.#peek();
    if (trailing.type !== 'end') {
      throw new ConditionSyntaxError(this.#source, trailing.position, `unexpected ${trailing.type}`);
    }
    return expression;
  }

  #peek(): Token {
    return this.#tokens[this.#index];
  }

  #advance(): Token {
    const token = this.#tokens[this.#index];
    if (token.type !== 'end') {
      this.#index += 1;
    }
    return token;
  }

  #parseOr(): GuardExpression {
    const conditions = [this.#parseAnd()];
    while (this.#peek().type === 'or') {
      this.#advance();
      conditions.push(this.#parseAnd());
    }
    return conditions.length === 1 ? conditions[0] : { logic: 'or', conditions };
  }

  #parseAnd(): GuardExpression {
    const conditions = [this.#parseUnary()];
    while (this.#peek().type === 'and') {
      this.#advance();
      conditions.push(this.#parseUnary());
    }
    return conditions.length === 1 ? conditions[0] : { logic: 'and', conditions };
  }

  #parseUnary(): GuardExpression {
    const token = this.#peek();

    if (token.type === 'not') {
      this.#advance();
      return { not: this.#parseUnary() };
    }

    if (token.type === 'lparen') {
      this.#advance();
      const inner = this.#parseOr();
      const closing = this.#advance();
      if (closing.type !== 'rparen') {
        throw new ConditionSyntaxError(this.#source, closing.position, 'expected ")"');
      }
      return inner;
    }

    return this.#parseComparison();
  }

  #parseComparison(): GuardExpression {
    const fieldToken = this.#advance();
    if (fieldToken.type !== 'path') {
      throw new ConditionSyntaxError(this.#source, fieldToken.position, 'expected a field name');
    }

    const operatorToken = this.#peek();
    if (operatorToken.type !== 'operator') {
      return { field: fieldToken.value, operator: '==', value: true };
    }
    this.#advance();

    return {
      field: fieldToken.value,
      operator: operatorToken.value,
      value: this.#parseLiteral(),
    };
  }

  #parseLiteral(): GuardLiteral {
    const token = this.#advance();
    switch (token.type) {
      case 'number':
      case 'string':
        return token.value;
      case 'path':
        if (token.value === 'true') return true;
        if (token.value === 'false') return false;
        if (token.value === 'null') return null;
        if (token.value.includes('.')) {
          throw new ConditionSyntaxError(
            this.#source,
            token.position,
            `conditions compare against literals; quote "${token.value}" to use it as text`,
          );
        }
        return token.value;
      default:
        throw new ConditionSyntaxError(this.#source, token.position, 'expected a literal value');
    }
  }
}

export function parseCondition(source: string): GuardExpression {
  if (source.trim().length === 0) {
    throw new ConditionSyntaxError(source, 0, 'condition is empty');
  }

  return new ConditionParser(source).parse();
}
