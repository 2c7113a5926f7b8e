/**
 * `${{ }}` expressions.
 *
 * A small expression language for step names, inputs, environment values
 * and `if:` conditions. Values come from named contexts (matrix, env,
 * github, runner, steps, job); status functions read the job's current
 * failure/cancellation state.
 */

/** A value an expression can produce. */
export type ExprValue = string | number | boolean | null | ExprValue[] | { [key: string]: ExprValue };

export type BinaryOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type Expr =
  | { kind: 'literal'; value: string | number | boolean | null }
  | { kind: 'context'; name: string }
  | { kind: 'property'; object: Expr; name: string }
  | { kind: 'index'; object: Expr; index: Expr }
  | { kind: 'call'; name: string; args: Expr[] }
  | { kind: 'not'; operand: Expr }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: 'logical'; op: '&&' | '||'; left: Expr; right: Expr };

/** Status of the job at the moment a condition is evaluated. */
export interface JobStatusView {
  failed: boolean;
  canceled: boolean;
}

/** Named contexts plus the job status view. */
export interface ExpressionContext {
  contexts: Record<string, ExprValue>;
  status?: JobStatusView;
}

export const STATUS_FUNCTIONS = ['always', 'success', 'failure', 'cancelled'] as const;

const FUNCTION_ARITY: Record<string, { min: number; max: number }> = {
  always: { min: 0, max: 0 },
  success: { min: 0, max: 0 },
  failure: { min: 0, max: 0 },
  cancelled: { min: 0, max: 0 },
  contains: { min: 2, max: 2 },
  startsWith: { min: 2, max: 2 },
  endsWith: { min: 2, max: 2 },
  format: { min: 1, max: Infinity },
  join: { min: 1, max: 2 },
  toJSON: { min: 1, max: 1 },
};

/** Raised for malformed expressions. */
export class ExpressionError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

// --- Lexer ---

type Token =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'ident'; value: string }
  | { type: 'punct'; value: string }
  | { type: 'eof' };

const PUNCTUATORS = ['==', '!=', '<=', '>=', '&&', '||', '<', '>', '!', '(', ')', '[', ']', '.', ','];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "'") {
      let value = '';
      i++;
      for (;;) {
        if (i >= source.length) throw new ExpressionError('Unterminated string literal', source);
        if (source[i] === "'") {
          if (source[i + 1] === "'") {
            value += "'";
            i += 2;
            continue;
          }
          i++;
          break;
        }
        value += source[i];
        i++;
      }
      tokens.push({ type: 'string', value });
      continue;
    }
    const number = /^(?:0x[0-9a-fA-F]+|\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/.exec(source.slice(i));
    if (number && (tokens.length === 0 || !isPunct(tokens[tokens.length - 1], '.'))) {
      tokens.push({ type: 'number', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }
    const ident = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(i));
    if (ident) {
      tokens.push({ type: 'ident', value: ident[0] });
      i += ident[0].length;
      continue;
    }
    // Property names after a dot may start with a digit (steps.1st.outputs).
    const segment = /^[A-Za-z0-9_-]+/.exec(source.slice(i));
    if (segment) {
      tokens.push({ type: 'ident', value: segment[0] });
      i += segment[0].length;
      continue;
    }
    const punct = PUNCTUATORS.find((p) => source.startsWith(p, i));
    if (!punct) throw new ExpressionError(`Unexpected character "${ch}"`, source);
    tokens.push({ type: 'punct', value: punct });
    i += punct.length;
  }
  tokens.push({ type: 'eof' });
  return tokens;
}

function isPunct(token: Token, value: string): boolean {
  return token.type === 'punct' && token.value === value;
}

// --- Parser (precedence climbing: || < && < equality < comparison < unary < postfix) ---

class Parser {
  private pos = 0;

  constructor(private tokens: Token[], private source: string) {}

  parse(): Expr {
    const expr = this.parseOr();
    if (this.peek().type !== 'eof') {
      throw new ExpressionError('Unexpected trailing input', this.source);
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private acceptPunct(value: string): boolean {
    if (isPunct(this.peek(), value)) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expectPunct(value: string): void {
    if (!this.acceptPunct(value)) {
      throw new ExpressionError(`Expected "${value}"`, this.source);
    }
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.acceptPunct('||')) {
      left = { kind: 'logical', op: '||', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseEquality();
    while (this.acceptPunct('&&')) {
      left = { kind: 'logical', op: '&&', left, right: this.parseEquality() };
    }
    return left;
  }

  private parseEquality(): Expr {
    let left = this.parseComparison();
    for (;;) {
      if (this.acceptPunct('==')) left = { kind: 'binary', op: '==', left, right: this.parseComparison() };
      else if (this.acceptPunct('!=')) left = { kind: 'binary', op: '!=', left, right: this.parseComparison() };
      else return left;
    }
  }

  private parseComparison(): Expr {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.type === 'punct' && (token.value === '<' || token.value === '<=' || token.value === '>' || token.value === '>=')) {
        this.pos++;
        left = { kind: 'binary', op: token.value, left, right: this.parseUnary() };
      } else {
        return left;
      }
    }
  }

  private parseUnary(): Expr {
    if (this.acceptPunct('!')) {
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();
    for (;;) {
      if (this.acceptPunct('.')) {
        const token = this.next();
        if (token.type === 'ident') {
          expr = { kind: 'property', object: expr, name: token.value };
        } else if (token.type === 'number') {
          expr = { kind: 'property', object: expr, name: String(token.value) };
        } else {
          throw new ExpressionError('Expected a property name after "."', this.source);
        }
      } else if (this.acceptPunct('[')) {
        const index = this.parseOr();
        this.expectPunct(']');
        expr = { kind: 'index', object: expr, index };
      } else {
        return expr;
      }
    }
  }

  private parsePrimary(): Expr {
    const token = this.next();
    switch (token.type) {
      case 'string':
        return { kind: 'literal', value: token.value };
      case 'number':
        return { kind: 'literal', value: token.value };
      case 'ident': {
        if (token.value === 'true') return { kind: 'literal', value: true };
        if (token.value === 'false') return { kind: 'literal', value: false };
        if (token.value === 'null') return { kind: 'literal', value: null };
        if (this.acceptPunct('(')) {
          return this.parseCall(token.value);
        }
        return { kind: 'context', name: token.value };
      }
      case 'punct':
        if (token.value === '(') {
          const inner = this.parseOr();
          this.expectPunct(')');
          return inner;
        }
        throw new ExpressionError(`Unexpected "${token.value}"`, this.source);
      case 'eof':
        throw new ExpressionError('Unexpected end of expression', this.source);
    }
  }

  private parseCall(name: string): Expr {
    const arity = Object.keys(FUNCTION_ARITY).find((fn) => fn.toLowerCase() === name.toLowerCase());
    if (!arity) throw new ExpressionError(`Unknown function "${name}"`, this.source);
    const args: Expr[] = [];
    if (!this.acceptPunct(')')) {
      do {
        args.push(this.parseOr());
      } while (this.acceptPunct(','));
      this.expectPunct(')');
    }
    const { min, max } = FUNCTION_ARITY[arity];
    if (args.length < min || args.length > max) {
      throw new ExpressionError(`Function "${arity}" called with ${args.length} argument(s)`, this.source);
    }
    return { kind: 'call', name: arity, args };
  }
}

/** Parse an expression body (the text between `${{` and `}}`). */
export function parseExpression(source: string): Expr {
  return new Parser(tokenize(source), source).parse();
}

// --- Evaluation ---

/** String form used when a value is substituted into text. */
export function toText(value: ExprValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function isTruthy(value: ExprValue): boolean {
  if (value === null || value === false || value === '') return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return true;
}

function toNumber(value: ExprValue): number {
  if (value === null) return 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return value.trim() === '' ? 0 : Number(value);
  return NaN;
}

function isObject(value: ExprValue): value is ExprValue[] | { [key: string]: ExprValue } {
  return typeof value === 'object' && value !== null;
}

function looseEquals(left: ExprValue, right: ExprValue): boolean {
  if (isObject(left) || isObject(right)) return left === right;
  if (typeof left === 'string' && typeof right === 'string') {
    return left.toLowerCase() === right.toLowerCase();
  }
  if (typeof left === typeof right) return left === right;
  return toNumber(left) === toNumber(right);
}

function compare(left: ExprValue, right: ExprValue): number {
  if (typeof left === 'string' && typeof right === 'string') {
    const a = left.toLowerCase();
    const b = right.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const a = toNumber(left);
  const b = toNumber(right);
  if (Number.isNaN(a) || Number.isNaN(b)) return NaN;
  return a - b;
}

function lookup(object: ExprValue, key: string): ExprValue {
  if (Array.isArray(object)) {
    const index = Number(key);
    return Number.isInteger(index) && index >= 0 && index < object.length ? object[index] : null;
  }
  if (!isObject(object)) return null;
  if (Object.prototype.hasOwnProperty.call(object, key)) return object[key];
  // Property names are case-insensitive.
  const match = Object.keys(object).find((k) => k.toLowerCase() === key.toLowerCase());
  return match === undefined ? null : object[match];
}

function callFunction(name: string, args: ExprValue[], ctx: ExpressionContext): ExprValue {
  const status = ctx.status ?? { failed: false, canceled: false };
  switch (name) {
    case 'always':
      return true;
    case 'success':
      return !status.failed && !status.canceled;
    case 'failure':
      return status.failed && !status.canceled;
    case 'cancelled':
      return status.canceled;
    case 'contains': {
      const [haystack, needle] = args;
      if (Array.isArray(haystack)) return haystack.some((item) => looseEquals(item, needle));
      return toText(haystack).toLowerCase().includes(toText(needle).toLowerCase());
    }
    case 'startsWith':
      return toText(args[0]).toLowerCase().startsWith(toText(args[1]).toLowerCase());
    case 'endsWith':
      return toText(args[0]).toLowerCase().endsWith(toText(args[1]).toLowerCase());
    case 'format': {
      const [fmt, ...rest] = args;
      return toText(fmt)
        .replace(/\{\{/g, '\u0000')
        .replace(/\}\}/g, '\u0001')
        .replace(/\{(\d+)\}/g, (_m, i: string) => {
          const arg = rest[Number(i)];
          return arg === undefined ? '' : toText(arg);
        })
        .replace(/\u0000/g, '{')
        .replace(/\u0001/g, '}');
    }
    case 'join': {
      const [items, separator] = args;
      const sep = separator === undefined ? ',' : toText(separator);
      return Array.isArray(items) ? items.map(toText).join(sep) : toText(items);
    }
    case 'toJSON':
      return JSON.stringify(args[0], null, 2);
    default:
      return null;
  }
}

/** Evaluate a parsed expression. */
export function evaluate(expr: Expr, ctx: ExpressionContext): ExprValue {
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'context':
      return lookup(ctx.contexts, expr.name);
    case 'property':
      return lookup(evaluate(expr.object, ctx), expr.name);
    case 'index':
      return lookup(evaluate(expr.object, ctx), toText(evaluate(expr.index, ctx)));
    case 'call':
      return callFunction(expr.name, expr.args.map((arg) => evaluate(arg, ctx)), ctx);
    case 'not':
      return !isTruthy(evaluate(expr.operand, ctx));
    case 'logical': {
      const left = evaluate(expr.left, ctx);
      if (expr.op === '&&') return isTruthy(left) ? evaluate(expr.right, ctx) : left;
      return isTruthy(left) ? left : evaluate(expr.right, ctx);
    }
    case 'binary': {
      const left = evaluate(expr.left, ctx);
      const right = evaluate(expr.right, ctx);
      switch (expr.op) {
        case '==':
          return looseEquals(left, right);
        case '!=':
          return !looseEquals(left, right);
        case '<':
          return compare(left, right) < 0;
        case '<=':
          return compare(left, right) <= 0;
        case '>':
          return compare(left, right) > 0;
        case '>=':
          return compare(left, right) >= 0;
      }
    }
  }
}

// --- Analysis ---

/** Names of the contexts an expression reads. */
export function referencedContexts(expr: Expr): Set<string> {
  const names = new Set<string>();
  const visit = (node: Expr): void => {
    switch (node.kind) {
      case 'context':
        names.add(node.name.toLowerCase());
        break;
      case 'property':
        visit(node.object);
        break;
      case 'index':
        visit(node.object);
        visit(node.index);
        break;
      case 'call':
        node.args.forEach(visit);
        break;
      case 'not':
        visit(node.operand);
        break;
      case 'binary':
      case 'logical':
        visit(node.left);
        visit(node.right);
        break;
      case 'literal':
        break;
    }
  };
  visit(expr);
  return names;
}

/** Names of the functions an expression calls. */
export function calledFunctions(expr: Expr): Set<string> {
  const names = new Set<string>();
  const visit = (node: Expr): void => {
    switch (node.kind) {
      case 'call':
        names.add(node.name);
        node.args.forEach(visit);
        break;
      case 'property':
        visit(node.object);
        break;
      case 'index':
        visit(node.object);
        visit(node.index);
        break;
      case 'not':
        visit(node.operand);
        break;
      case 'binary':
      case 'logical':
        visit(node.left);
        visit(node.right);
        break;
      case 'context':
      case 'literal':
        break;
    }
  };
  visit(expr);
  return names;
}

// --- Templates ---

/** A `${{ }}` occurrence inside a template string. */
interface Placeholder {
  start: number;
  end: number;
  body: string;
}

/** Locate `${{ ... }}` placeholders, skipping `}}` inside quoted strings. */
export function findPlaceholders(template: string): Placeholder[] {
  const found: Placeholder[] = [];
  let from = 0;
  for (;;) {
    const start = template.indexOf('${{', from);
    if (start === -1) return found;
    let i = start + 3;
    let inString = false;
    let end = -1;
    while (i < template.length) {
      if (template[i] === "'") {
        inString = !inString;
      } else if (!inString && template.startsWith('}}', i)) {
        end = i + 2;
        break;
      }
      i++;
    }
    if (end === -1) {
      throw new ExpressionError('Unterminated "${{" placeholder', template);
    }
    found.push({ start, end, body: template.slice(start + 3, end - 2).trim() });
    from = end;
  }
}

export interface InterpolateOptions {
  /**
   * Only substitute placeholders that read exclusively from these contexts;
   * others are left verbatim for a later pass.
   */
  onlyContexts?: string[];
}

/** Substitute every `${{ expr }}` in a template with the text of its value. */
export function interpolate(template: string, ctx: ExpressionContext, options: InterpolateOptions = {}): string {
  const placeholders = findPlaceholders(template);
  if (placeholders.length === 0) return template;

  const allowed = options.onlyContexts?.map((c) => c.toLowerCase());
  let result = '';
  let cursor = 0;
  for (const placeholder of placeholders) {
    result += template.slice(cursor, placeholder.start);
    const expr = parseExpression(placeholder.body);
    const deferred = allowed !== undefined && [...referencedContexts(expr)].some((name) => !allowed.includes(name));
    result += deferred ? template.slice(placeholder.start, placeholder.end) : toText(evaluate(expr, ctx));
    cursor = placeholder.end;
  }
  return result + template.slice(cursor);
}

/** Interpolate every value of a string map. */
export function interpolateRecord(
  record: Record<string, string>,
  ctx: ExpressionContext,
  options: InterpolateOptions = {},
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = interpolate(value, ctx, options);
  }
  return out;
}

// --- Conditions ---

/** Strip a `${{ }}` wrapper around a whole condition, if present. */
export function conditionBody(condition: string): string {
  const trimmed = condition.trim();
  const placeholders = findPlaceholders(trimmed);
  if (placeholders.length === 1 && placeholders[0].start === 0 && placeholders[0].end === trimmed.length) {
    return placeholders[0].body;
  }
  return trimmed;
}

/**
 * Parse an `if:` condition. A missing condition means `success()`; a
 * condition that calls no status function is implicitly `success() && (...)`.
 */
export function parseCondition(condition: string | undefined): Expr {
  const success: Expr = { kind: 'call', name: 'success', args: [] };
  if (condition === undefined || condition.trim() === '') return success;
  const expr = parseExpression(conditionBody(condition));
  const functions = calledFunctions(expr);
  if (STATUS_FUNCTIONS.some((fn) => functions.has(fn))) return expr;
  return { kind: 'logical', op: '&&', left: success, right: expr };
}

/** Evaluate an `if:` condition to a boolean. */
export function evaluateCondition(condition: string | undefined, ctx: ExpressionContext): boolean {
  return isTruthy(evaluate(parseCondition(condition), ctx));
}

/** True when the condition runs regardless of earlier failures (calls always()). */
export function isUnconditional(condition: string | undefined): boolean {
  if (condition === undefined) return false;
  return calledFunctions(parseCondition(condition)).has('always');
}

/** Syntax check for validation; returns the error message or null. */
export function checkExpressionSyntax(template: string, asCondition = false): string | null {
  try {
    if (asCondition) {
      parseCondition(template);
    } else {
      for (const placeholder of findPlaceholders(template)) {
        parseExpression(placeholder.body);
      }
    }
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}
