export type ExpressionErrorCode = 'INVALID_EXPRESSION' | 'DIVISION_BY_ZERO' | 'NON_FINITE_RESULT';

export class ExpressionError extends Error {
  readonly code: ExpressionErrorCode;
  readonly position: number | null;

  constructor(code: ExpressionErrorCode, message: string, position: number | null = null) {
    super(message);
    this.name = 'ExpressionError';
    this.code = code;
    this.position = position;
  }
}

export type ExpressionNode =
  | { type: 'number'; value: number }
  | { type: 'unary'; operator: '-' | '+'; operand: ExpressionNode }
  | { type: 'binary'; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode }
  | { type: 'call'; name: FunctionName; argument: ExpressionNode };

type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '^';

const functions = {
  sqrt: Math.sqrt,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  log: Math.log,
  abs: Math.abs,
} as const satisfies Record<string, (value: number) => number>;

export type FunctionName = keyof typeof functions;

const constants: ReadonlyMap<string, number> = new Map([
  ['pi', Math.PI],
  ['e', Math.E],
]);

function isFunctionName(name: string): name is FunctionName {
  return Object.prototype.hasOwnProperty.call(functions, name);
}

type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'identifier'; value: string; position: number }
  | { type: 'symbol'; value: BinaryOperator | '(' | ')'; position: number }
  | { type: 'end'; position: number };

const symbols: ReadonlySet<string> = new Set(['+', '-', '*', '/', '%', '^', '(', ')']);

function isSymbol(char: string): char is BinaryOperator | '(' | ')' {
  return symbols.has(char);
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

    const number = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/.exec(source.slice(index));
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), position: index });
      index += number[0].length;
      continue;
    }

    const identifier = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(index));
    if (identifier) {
      tokens.push({ type: 'identifier', value: identifier[0].toLowerCase(), position: index });
      index += identifier[0].length;
      continue;
    }

    if (source.startsWith('**', index)) {
      tokens.push({ type: 'symbol', value: '^', position: index });
      index += 2;
      continue;
    }

    if (isSymbol(char)) {
      tokens.push({ type: 'symbol', value: char, position: index });
      index += 1;
      continue;
    }

    throw new ExpressionError('INVALID_EXPRESSION', `Unexpected character "${char}" at position ${index}`, index);
  }

  tokens.push({ type: 'end', position: source.length });
  return tokens;
}

/*
 *   expression := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "%") unary)*
 *   unary      := ("-" | "+") unary | power
 *   power      := primary ("^" unary)?
 *   primary    := number | constant | function "(" expression ")" | "(" expression ")"
 */
class ExpressionParser {
  readonly #tokens: Token[];
  #index = 0;

  constructor(source: string) {
    this.#tokens = tokenize(source);
  }

  parse(): ExpressionNode {
    if (this.#peek().type === 'end') {
      throw new ExpressionError('INVALID_EXPRESSION', 'Expression is empty', 0);
    }

    const node = this.#parseExpression();
    const trailing = this.#peek();
    if (trailing.type !== 'end') {
      throw new ExpressionError('INVALID_EXPRESSION', `Unexpected token at position ${trailing.position}`, trailing.position);
    }
    return node;
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

  #peekSymbol(...symbols: string[]): BinaryOperator | null {
    const token = this.#peek();
    if (token.type === 'symbol' && token.value !== '(' && token.value !== ')' && symbols.includes(token.value)) {
      return token.value;
    }
    return null;
  }

  #parseExpression(): ExpressionNode {
    let left = this.#parseTerm();
    let operator = this.#peekSymbol('+', '-');
    while (operator) {
      this.#advance();
      left = { type: 'binary', operator, left, right: this.#parseTerm() };
      operator = this.#peekSymbol('+', '-');
    }
    return left;
  }

  #parseTerm(): ExpressionNode {
    let left = this.#parseUnary();
    let operator = this.#peekSymbol('*', '/', '%');
    while (operator) {
      this.#advance();
      left = { type: 'binary', operator, left, right: this.#parseUnary() };
      operator = this.#peekSymbol('*', '/', '%');
    }
    return left;
  }

  #parseUnary(): ExpressionNode {
    const operator = this.#peekSymbol('+', '-');
    if (operator === '+' || operator === '-') {
      this.#advance();
      return { type: 'unary', operator, operand: this.#parseUnary() };
    }
    return this.#parsePower();
  }

  #parsePower(): ExpressionNode {
    const base = this.#parsePrimary();
    if (this.#peekSymbol('^')) {
      this.#advance();
      return { type: 'binary', operator: '^', left: base, right: this.#parseUnary() };
    }
    return base;
  }

  #expectClosing(): void {
    const token = this.#advance();
    if (token.type !== 'symbol' || token.value !== ')') {
      throw new ExpressionError('INVALID_EXPRESSION', `Expected ")" at position ${token.position}`, token.position);
    }
  }

  #parsePrimary(): ExpressionNode {
    const token = this.#advance();

    if (token.type === 'number') {
      return { type: 'number', value: token.value };
    }

    if (token.type === 'symbol' && token.value === '(') {
      const inner = this.#parseExpression();
      this.#expectClosing();
      return inner;
    }

    if (token.type === 'identifier') {
      if (isFunctionName(token.value)) {
        const open = this.#advance();
        if (open.type !== 'symbol' || open.value !== '(') {
          throw new ExpressionError('INVALID_EXPRESSION', `Function "${token.value}" must be called with parentheses`, open.position);
        }
        const argument = this.#parseExpression();
        this.#expectClosing();
        return { type: 'call', name: token.value, argument };
      }

      const constant = constants.get(token.value);
      if (constant !== undefined) {
        return { type: 'number', value: constant };
      }

      throw new ExpressionError('INVALID_EXPRESSION', `Unknown identifier "${token.value}"`, token.position);
    }

    if (token.type === 'end') {
      throw new ExpressionError('INVALID_EXPRESSION', 'Unexpected end of expression', token.position);
    }

    throw new ExpressionError('INVALID_EXPRESSION', `Unexpected token at position ${token.position}`, token.position);
  }
}

export function parseExpression(source: string): ExpressionNode {
  return new ExpressionParser(source).parse();
}

function evaluateNode(node: ExpressionNode): number {
  switch (node.type) {
    case 'number':
      return node.value;
    case 'unary': {
      const operand = evaluateNode(node.operand);
      return node.operator === '-' ? -operand : operand;
    }
    case 'call':
      return functions[node.name](evaluateNode(node.argument));
    case 'binary': {
      const left = evaluateNode(node.left);
      const right = evaluateNode(node.right);
      switch (node.operator) {
        case '+': return left + right;
        case '-': return left - right;
        case '*': return left * right;
        case '/':
        case '%':
          if (right === 0) {
            throw new ExpressionError('DIVISION_BY_ZERO', 'Division by zero is not allowed');
          }
          return node.operator === '/' ? left / right : left % right;
        case '^': return left ** right;
      }
    }
  }
}

export function usesAdvancedFunctions(node: ExpressionNode): boolean {
  switch (node.type) {
    case 'number': return false;
    case 'call': return true;
    case 'unary': return usesAdvancedFunctions(node.operand);
    case 'binary': return usesAdvancedFunctions(node.left) || usesAdvancedFunctions(node.right);
  }
}

/**
 * Evaluates an arithmetic expression without `eval`: numbers, `+ - * / % ^` (or `**`),
 * parentheses, unary signs, the constants `pi` and `e`, and `sqrt sin cos tan log abs`.
 */
export function evaluateExpression(source: string): number {
  const result = evaluateNode(parseExpression(source));
  if (!Number.isFinite(result)) {
    throw new ExpressionError('NON_FINITE_RESULT', `Expression "${source.trim()}" does not evaluate to a finite number`);
  }
  return result;
}
