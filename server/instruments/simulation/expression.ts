/**
 * Profile Expressions
 *
 * A small interpreter for the dynamic parts of a profile: `expr:` responses,
 * `expr:` set/inc/dec values, and error-rule conditions.
 *
 *   expr: state.voltage * 2
 *   expr: round(random.uniform(4.9, 5.1), 3)
 *   g1 > state.limits.voltage and state.output == "ON"
 *
 * The grammar is closed: literals, names, member access, indexing, calls,
 * arithmetic, comparisons, boolean logic and a ternary. Names resolve only to
 * the live `state`, the captures `g1..gn`, and the function table below.
 * There is no assignment, no attribute access outside state and the
 * namespaces, and nothing that reaches files, the network, or the process.
 */

import type { Result, StateMap, StateValue } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { SimulationError } from '../errors.js';
import { ScpiParser } from '../scpi-parser.js';
import { isStateMap } from './state-store.js';

const MAX_EXPRESSION_LENGTH = 1000;
const MAX_NESTING_DEPTH = 64;

// ============ Values ============

export class ExprNamespace {
  constructor(
    readonly name: string,
    readonly members: ReadonlyMap<string, ExprValue>
  ) {}
}

export class ExprFunction {
  constructor(
    readonly name: string,
    readonly call: (args: ExprValue[]) => ExprValue
  ) {}
}

export type ExprValue =
  | string
  | number
  | boolean
  | null
  | ExprValue[]
  | StateMap
  | ExprNamespace
  | ExprFunction;

export interface EvalScope {
  state: Readonly<StateMap>;
  /** Raw pattern captures; exposed as g1..gn */
  captures: readonly string[];
  /** Uniform random source in [0, 1) */
  random: () => number;
  now: () => Date;
}

// ============ Tokens ============

type Operator =
  | '+' | '-' | '*' | '/' | '//' | '%' | '**'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | 'and' | 'or' | 'not'
  | '(' | ')' | '[' | ']' | ',' | '.' | '?' | ':';

type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'literal'; value: boolean | null; pos: number }
  | { type: 'name'; value: string; pos: number }
  | { type: 'op'; value: Operator; pos: number }
  | { type: 'eof'; pos: number };

// Longest first, so "**" wins over "*"
const SYMBOLS: ReadonlyArray<[string, Operator]> = [
  ['**', '**'], ['//', '//'], ['==', '=='], ['!=', '!='], ['<=', '<='], ['>=', '>='],
  ['&&', 'and'], ['||', 'or'],
  ['+', '+'], ['-', '-'], ['*', '*'], ['/', '/'], ['%', '%'], ['<', '<'], ['>', '>'],
  ['!', 'not'], ['(', '('], [')', ')'], ['[', '['], [']', ']'], [',', ','], ['.', '.'],
  ['?', '?'], [':', ':'],
];

const KEYWORDS: ReadonlyMap<string, Operator | boolean | null> = new Map<string, Operator | boolean | null>([
  ['and', 'and'], ['or', 'or'], ['not', 'not'],
  ['true', true], ['True', true], ['false', false], ['False', false],
  ['null', null], ['None', null],
]);

class ParseError extends Error {}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const ch = source[index];

    if (/\s/.test(ch)) {
      index += 1;
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const match = /^\d+(?:\.\d*)?(?:[eE][+-]?\d+)?/.exec(source.slice(index));
      if (match) {
        tokens.push({ type: 'number', value: Number(match[0]), pos: index });
        index += match[0].length;
        continue;
      }
    }

    if (ch === '"' || ch === "'") {
      let cursor = index + 1;
      let value = '';
      let closed = false;
      while (cursor < source.length) {
        const next = source[cursor];
        if (next === '\\' && cursor + 1 < source.length) {
          const escaped = source[cursor + 1];
          value += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped;
          cursor += 2;
          continue;
        }
        if (next === ch) {
          closed = true;
          cursor += 1;
          break;
        }
        value += next;
        cursor += 1;
      }
      if (!closed) {
        throw new ParseError(`unterminated string literal at ${index}`);
      }
      tokens.push({ type: 'string', value, pos: index });
      index = cursor;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(index));
      const word = match ? match[0] : ch;
      const keyword = KEYWORDS.get(word);
      if (keyword === undefined) {
        tokens.push({ type: 'name', value: word, pos: index });
      } else if (typeof keyword === 'string') {
        tokens.push({ type: 'op', value: keyword, pos: index });
      } else {
        tokens.push({ type: 'literal', value: keyword, pos: index });
      }
      index += word.length;
      continue;
    }

    const symbol = SYMBOLS.find(([text]) => source.startsWith(text, index));
    if (!symbol) {
      throw new ParseError(`unexpected character '${ch}' at ${index}`);
    }
    tokens.push({ type: 'op', value: symbol[1], pos: index });
    index += symbol[0].length;
  }

  tokens.push({ type: 'eof', pos: source.length });
  return tokens;
}

// ============ AST ============

type ArithmeticOp = '+' | '-' | '*' | '/' | '//' | '%' | '**';
type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type Expr =
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'list'; items: Expr[] }
  | { type: 'name'; name: string }
  | { type: 'member'; object: Expr; property: string }
  | { type: 'index'; object: Expr; index: Expr }
  | { type: 'call'; callee: Expr; args: Expr[] }
  | { type: 'unary'; op: '-' | '+' | 'not'; operand: Expr }
  | { type: 'binary'; op: ArithmeticOp; left: Expr; right: Expr }
  | { type: 'compare'; first: Expr; rest: Array<{ op: CompareOp; operand: Expr }> }
  | { type: 'logical'; op: 'and' | 'or'; left: Expr; right: Expr }
  | { type: 'conditional'; test: Expr; consequent: Expr; alternate: Expr };

export interface CompiledExpression {
  source: string;
  ast: Expr;
}

const COMPARE_OPS: ReadonlySet<Operator> = new Set(['==', '!=', '<', '<=', '>', '>=']);

function isCompareOp(op: Operator): op is CompareOp {
  return COMPARE_OPS.has(op);
}

function parse(tokens: Token[]): Expr {
  let cursor = 0;
  let depth = 0;

  const peek = (): Token => tokens[cursor];

  function isOp(...ops: Operator[]): boolean {
    const token = peek();
    return token.type === 'op' && ops.includes(token.value);
  }

  function takeOp(): Operator {
    const token = tokens[cursor++];
    if (token.type !== 'op') throw new ParseError(`expected operator at ${token.pos}`);
    return token.value;
  }

  function expect(op: Operator): void {
    const token = peek();
    if (token.type !== 'op' || token.value !== op) {
      throw new ParseError(`expected '${op}' at ${token.pos}`);
    }
    cursor += 1;
  }

  function nested<T>(fn: () => T): T {
    depth += 1;
    if (depth > MAX_NESTING_DEPTH) {
      throw new ParseError('expression nested too deeply');
    }
    try {
      return fn();
    } finally {
      depth -= 1;
    }
  }

  function expression(): Expr {
    return nested<Expr>(() => {
      const test = orExpr();
      if (!isOp('?')) return test;
      cursor += 1;
      const consequent = expression();
      expect(':');
      const alternate = expression();
      return { type: 'conditional', test, consequent, alternate };
    });
  }

  function orExpr(): Expr {
    let left = andExpr();
    while (isOp('or')) {
      cursor += 1;
      left = { type: 'logical', op: 'or', left, right: andExpr() };
    }
    return left;
  }

  function andExpr(): Expr {
    let left = notExpr();
    while (isOp('and')) {
      cursor += 1;
      left = { type: 'logical', op: 'and', left, right: notExpr() };
    }
    return left;
  }

  function notExpr(): Expr {
    if (isOp('not')) {
      cursor += 1;
      return nested<Expr>(() => ({ type: 'unary', op: 'not', operand: notExpr() }));
    }
    return comparison();
  }

  function comparison(): Expr {
    const first = additive();
    const rest: Array<{ op: CompareOp; operand: Expr }> = [];
    for (;;) {
      const token = peek();
      if (token.type !== 'op' || !isCompareOp(token.value)) break;
      cursor += 1;
      rest.push({ op: token.value, operand: additive() });
    }
    return rest.length === 0 ? first : { type: 'compare', first, rest };
  }

  function additive(): Expr {
    let left = multiplicative();
    while (isOp('+', '-')) {
      const op = takeOp() === '+' ? '+' : '-';
      left = { type: 'binary', op, left, right: multiplicative() };
    }
    return left;
  }

  function multiplicative(): Expr {
    let left = unary();
    for (;;) {
      const token = peek();
      if (token.type !== 'op') break;
      const op = token.value;
      if (op !== '*' && op !== '/' && op !== '//' && op !== '%') break;
      cursor += 1;
      left = { type: 'binary', op, left, right: unary() };
    }
    return left;
  }

  function unary(): Expr {
    if (isOp('-', '+')) {
      const op = takeOp() === '-' ? '-' : '+';
      return nested<Expr>(() => ({ type: 'unary', op, operand: unary() }));
    }
    return power();
  }

  function power(): Expr {
    const base = postfix();
    if (!isOp('**')) return base;
    cursor += 1;
    // right-associative, and binds tighter than a unary minus on its left
    return { type: 'binary', op: '**', left: base, right: unary() };
  }

  function postfix(): Expr {
    let node = primary();
    for (;;) {
      if (isOp('.')) {
        cursor += 1;
        const token = tokens[cursor++];
        if (token.type !== 'name') throw new ParseError(`expected name after '.' at ${token.pos}`);
        node = { type: 'member', object: node, property: token.value };
      } else if (isOp('[')) {
        cursor += 1;
        const index = expression();
        expect(']');
        node = { type: 'index', object: node, index };
      } else if (isOp('(')) {
        cursor += 1;
        node = { type: 'call', callee: node, args: list(')') };
      } else {
        return node;
      }
    }
  }

  function list(close: ')' | ']'): Expr[] {
    const items: Expr[] = [];
    if (isOp(close)) {
      cursor += 1;
      return items;
    }
    for (;;) {
      items.push(expression());
      if (isOp(',')) {
        cursor += 1;
        continue;
      }
      expect(close);
      return items;
    }
  }

  function primary(): Expr {
    const token = tokens[cursor++];
    switch (token.type) {
      case 'number':
      case 'string':
      case 'literal':
        return { type: 'literal', value: token.value };
      case 'name':
        return { type: 'name', name: token.value };
      case 'op':
        if (token.value === '(') {
          const inner = expression();
          expect(')');
          return inner;
        }
        if (token.value === '[') {
          return nested<Expr>(() => ({ type: 'list', items: list(']') }));
        }
        throw new ParseError(`unexpected '${token.value}' at ${token.pos}`);
      case 'eof':
        throw new ParseError('unexpected end of expression');
    }
  }

  const ast = expression();
  const trailing = peek();
  if (trailing.type !== 'eof') {
    throw new ParseError(`unexpected input at ${trailing.pos}`);
  }
  return ast;
}

/**
 * Parse an expression once, at profile load time.
 */
export function compileExpression(source: string): Result<CompiledExpression, string> {
  const trimmed = source.trim();
  if (trimmed === '') return Err('empty expression');
  if (trimmed.length > MAX_EXPRESSION_LENGTH) return Err('expression too long');

  try {
    return Ok({ source: trimmed, ast: parse(tokenize(trimmed)) });
  } catch (err) {
    if (err instanceof ParseError) return Err(err.message);
    throw err;
  }
}

// ============ Coercion ============

function fail(message: string): never {
  throw new SimulationError(message);
}

function describe(value: ExprValue): string {
  if (value instanceof ExprNamespace) return `namespace ${value.name}`;
  if (value instanceof ExprFunction) return `function ${value.name}`;
  if (Array.isArray(value)) return 'list';
  if (value === null) return 'null';
  if (typeof value === 'object') return 'map';
  return `${typeof value} ${JSON.stringify(value)}`;
}

/** Number, boolean, or a string that is entirely a number */
function asNumber(value: ExprValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const parsed = ScpiParser.parseNumber(value);
    return parsed.ok ? parsed.value : undefined;
  }
  return undefined;
}

function toNumber(value: ExprValue, context: string): number {
  const n = asNumber(value);
  if (n === undefined) fail(`${context}: expected a number, got ${describe(value)}`);
  return n;
}

function toList(value: ExprValue, context: string): ExprValue[] {
  if (!Array.isArray(value)) fail(`${context}: expected a list, got ${describe(value)}`);
  return value;
}

export function isTruthy(value: ExprValue): boolean {
  if (value === null || value === false || value === 0 || value === '') return false;
  if (Array.isArray(value)) return value.length > 0;
  const asState = toStateValueOrUndefined(value);
  if (isStateMap(asState)) return Object.keys(asState).length > 0;
  return true;
}

export function stringifyValue(value: ExprValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof ExprNamespace) return `<namespace ${value.name}>`;
  if (value instanceof ExprFunction) return `<function ${value.name}>`;
  return JSON.stringify(value);
}

function toStateValueOrUndefined(value: ExprValue): StateValue | undefined {
  if (value instanceof ExprNamespace || value instanceof ExprFunction) return undefined;
  if (Array.isArray(value)) {
    const items: StateValue[] = [];
    for (const item of value) {
      const converted = toStateValueOrUndefined(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  return value;
}

/** Convert an evaluation result into something the state store can hold */
export function toStateValue(value: ExprValue): Result<StateValue, SimulationError> {
  const converted = toStateValueOrUndefined(value);
  return converted === undefined
    ? Err(new SimulationError(`Cannot store ${describe(value)} in state`))
    : Ok(converted);
}

/** Captures that look numeric evaluate as numbers: "15.0" > 10 holds */
export function coerceCapture(raw: string): number | string {
  return asNumber(raw) ?? raw;
}

function deepEqual(a: ExprValue, b: ExprValue): boolean {
  const na = asNumber(a);
  const nb = asNumber(b);
  if (na !== undefined && nb !== undefined) return na === nb;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return a === b;
  return stringifyValue(a) === stringifyValue(b);
}

// ============ Function table ============

type Arity = number | [min: number, max: number];

function checkArity(name: string, args: ExprValue[], arity: Arity): void {
  const [min, max] = typeof arity === 'number' ? [arity, arity] : arity;
  if (args.length < min || args.length > max) {
    fail(`${name}() takes ${min === max ? min : `${min} to ${max}`} argument(s), got ${args.length}`);
  }
}

function fn(name: string, arity: Arity, impl: (args: ExprValue[]) => ExprValue): ExprFunction {
  return new ExprFunction(name, (args) => {
    checkArity(name, args, arity);
    return impl(args);
  });
}

/** Function over numbers only */
function numFn(name: string, arity: Arity, impl: (...args: number[]) => number): ExprFunction {
  return fn(name, arity, (args) => {
    const result = impl(...args.map(a => toNumber(a, `${name}()`)));
    if (Number.isNaN(result)) fail(`${name}(): math domain error`);
    return result;
  });
}

/** Accept either a single list argument or several scalars */
function spread(name: string, args: ExprValue[]): number[] {
  const items = args.length === 1 && Array.isArray(args[0]) ? args[0] : args;
  return items.map(v => toNumber(v, `${name}()`));
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function variance(values: number[], sample: boolean): number {
  const m = mean(values);
  const squares = values.reduce((acc, v) => acc + (v - m) ** 2, 0);
  return squares / (values.length - (sample ? 1 : 0));
}

function dataPoints(name: string, args: ExprValue[], min: number): number[] {
  const values = toList(args[0], `${name}()`).map(v => toNumber(v, `${name}()`));
  if (values.length < min) fail(`${name}() requires at least ${min} data point(s)`);
  return values;
}

function namespace(name: string, members: Record<string, ExprValue>): ExprNamespace {
  return new ExprNamespace(name, new Map(Object.entries(members)));
}

const MATH = namespace('math', {
  pi: Math.PI,
  e: Math.E,
  sqrt: numFn('sqrt', 1, Math.sqrt),
  sin: numFn('sin', 1, Math.sin),
  cos: numFn('cos', 1, Math.cos),
  tan: numFn('tan', 1, Math.tan),
  asin: numFn('asin', 1, Math.asin),
  acos: numFn('acos', 1, Math.acos),
  atan: numFn('atan', 1, Math.atan),
  atan2: numFn('atan2', 2, Math.atan2),
  exp: numFn('exp', 1, Math.exp),
  log: numFn('log', [1, 2], (x, base) => (base === undefined ? Math.log(x) : Math.log(x) / Math.log(base))),
  log10: numFn('log10', 1, Math.log10),
  log2: numFn('log2', 1, Math.log2),
  pow: numFn('pow', 2, Math.pow),
  floor: numFn('floor', 1, Math.floor),
  ceil: numFn('ceil', 1, Math.ceil),
  trunc: numFn('trunc', 1, Math.trunc),
  fabs: numFn('fabs', 1, Math.abs),
  hypot: numFn('hypot', [1, 8], Math.hypot),
  radians: numFn('radians', 1, d => (d * Math.PI) / 180),
  degrees: numFn('degrees', 1, r => (r * 180) / Math.PI),
});

const STATISTICS = namespace('statistics', {
  mean: fn('mean', 1, args => mean(dataPoints('mean', args, 1))),
  median: fn('median', 1, args => {
    const sorted = [...dataPoints('median', args, 1)].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  }),
  stdev: fn('stdev', 1, args => Math.sqrt(variance(dataPoints('stdev', args, 2), true))),
  pstdev: fn('pstdev', 1, args => Math.sqrt(variance(dataPoints('pstdev', args, 1), false))),
  variance: fn('variance', 1, args => variance(dataPoints('variance', args, 2), true)),
});

const BUILTINS: ReadonlyMap<string, ExprValue> = new Map<string, ExprValue>([
  ['math', MATH],
  ['statistics', STATISTICS],
  ['abs', numFn('abs', 1, Math.abs)],
  ['min', fn('min', [1, Infinity], args => {
    const values = spread('min', args);
    if (values.length === 0) fail('min() of an empty list');
    return Math.min(...values);
  })],
  ['max', fn('max', [1, Infinity], args => {
    const values = spread('max', args);
    if (values.length === 0) fail('max() of an empty list');
    return Math.max(...values);
  })],
  ['sum', fn('sum', [1, 2], args => {
    const start = args.length === 2 ? toNumber(args[1], 'sum()') : 0;
    return toList(args[0], 'sum()').reduce<number>((acc, v) => acc + toNumber(v, 'sum()'), start);
  })],
  ['round', fn('round', [1, 2], args => {
    const digits = args.length === 2 ? Math.trunc(toNumber(args[1], 'round()')) : 0;
    return roundTo(toNumber(args[0], 'round()'), digits);
  })],
  ['len', fn('len', 1, ([value]) => {
    if (typeof value === 'string' || Array.isArray(value)) return value.length;
    const asState = toStateValueOrUndefined(value);
    if (isStateMap(asState)) return Object.keys(asState).length;
    return fail(`len(): unsupported ${describe(value)}`);
  })],
  ['float', fn('float', 1, ([value]) => toNumber(value, 'float()'))],
  ['int', fn('int', 1, ([value]) => Math.trunc(toNumber(value, 'int()')))],
  ['str', fn('str', 1, ([value]) => stringifyValue(value))],
  ['bool', fn('bool', 1, ([value]) => isTruthy(value))],
]);

function scopedNamespaces(scope: EvalScope): Map<string, ExprValue> {
  const uniform = (a: number, b: number): number => a + (b - a) * scope.random();

  return new Map<string, ExprValue>([
    ['random', namespace('random', {
      random: fn('random', 0, () => scope.random()),
      uniform: numFn('uniform', 2, uniform),
      randint: numFn('randint', 2, (a, b) => {
        if (!Number.isInteger(a) || !Number.isInteger(b) || a > b) {
          fail(`randint(): empty range (${a}, ${b})`);
        }
        return a + Math.floor(scope.random() * (b - a + 1));
      }),
      choice: fn('choice', 1, ([items]) => {
        const list = toList(items, 'choice()');
        if (list.length === 0) fail('choice(): empty list');
        return list[Math.floor(scope.random() * list.length)];
      }),
    })],
    ['datetime', namespace('datetime', {
      now: fn('now', 0, () => scope.now().toISOString()),
      timestamp: fn('timestamp', 0, () => scope.now().getTime() / 1000),
    })],
  ]);
}

// ============ Evaluation ============

function lookupMember(object: ExprValue, property: string): ExprValue {
  if (object instanceof ExprNamespace) {
    const member = object.members.get(property);
    if (member === undefined) fail(`${object.name} has no member '${property}'`);
    return member;
  }
  const asState = toStateValueOrUndefined(object);
  if (isStateMap(asState)) {
    if (!Object.prototype.hasOwnProperty.call(asState, property)) {
      fail(`unknown state key '${property}'`);
    }
    return asState[property];
  }
  return fail(`cannot read '${property}' of ${describe(object)}`);
}

function lookupIndex(object: ExprValue, index: ExprValue): ExprValue {
  if (Array.isArray(object) || typeof object === 'string') {
    const i = toNumber(index, 'index');
    if (!Number.isInteger(i)) fail(`index must be an integer, got ${i}`);
    const position = i < 0 ? object.length + i : i;
    if (position < 0 || position >= object.length) fail(`index ${i} out of range`);
    return object[position];
  }
  return lookupMember(object, stringifyValue(index));
}

function arithmetic(op: ArithmeticOp, left: ExprValue, right: ExprValue): number | string | ExprValue[] {
  if (op === '+') {
    const a = asNumber(left);
    const b = asNumber(right);
    if (a !== undefined && b !== undefined) return a + b;
    if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
    if (typeof left === 'string' || typeof right === 'string') {
      return stringifyValue(left) + stringifyValue(right);
    }
    return fail(`cannot add ${describe(left)} and ${describe(right)}`);
  }

  const a = toNumber(left, `'${op}'`);
  const b = toNumber(right, `'${op}'`);
  switch (op) {
    case '-': return a - b;
    case '*': return a * b;
    case '**': return a ** b;
    case '/':
    case '//':
    case '%':
      if (b === 0) fail('division by zero');
      if (op === '/') return a / b;
      if (op === '//') return Math.floor(a / b);
      return ((a % b) + b) % b;
  }
}

function compare(op: CompareOp, left: ExprValue, right: ExprValue): boolean {
  if (op === '==') return deepEqual(left, right);
  if (op === '!=') return !deepEqual(left, right);

  const a = asNumber(left);
  const b = asNumber(right);
  let order: number;
  if (a !== undefined && b !== undefined) {
    order = a - b;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    return fail(`cannot compare ${describe(left)} and ${describe(right)}`);
  }

  switch (op) {
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
  }
}

function evaluateNode(node: Expr, scope: EvalScope, names: Map<string, ExprValue>): ExprValue {
  const ev = (n: Expr): ExprValue => evaluateNode(n, scope, names);

  switch (node.type) {
    case 'literal':
      return node.value;

    case 'list':
      return node.items.map(ev);

    case 'name': {
      if (node.name === 'state') return scope.state;
      const capture = /^g(\d+)$/.exec(node.name);
      if (capture) {
        const raw = scope.captures[Number(capture[1]) - 1];
        if (raw === undefined) fail(`no capture ${node.name} for this command`);
        return coerceCapture(raw);
      }
      const value = names.get(node.name) ?? BUILTINS.get(node.name);
      if (value === undefined) fail(`unknown name '${node.name}'`);
      return value;
    }

    case 'member':
      return lookupMember(ev(node.object), node.property);

    case 'index':
      return lookupIndex(ev(node.object), ev(node.index));

    case 'call': {
      const callee = ev(node.callee);
      if (!(callee instanceof ExprFunction)) fail(`${describe(callee)} is not callable`);
      return callee.call(node.args.map(ev));
    }

    case 'unary': {
      const operand = ev(node.operand);
      if (node.op === 'not') return !isTruthy(operand);
      const n = toNumber(operand, `unary '${node.op}'`);
      return node.op === '-' ? -n : n;
    }

    case 'binary':
      return arithmetic(node.op, ev(node.left), ev(node.right));

    case 'compare': {
      let left = ev(node.first);
      for (const { op, operand } of node.rest) {
        const right = ev(operand);
        if (!compare(op, left, right)) return false;
        left = right;
      }
      return true;
    }

    case 'logical': {
      const left = ev(node.left);
      if (node.op === 'and') return isTruthy(left) ? ev(node.right) : left;
      return isTruthy(left) ? left : ev(node.right);
    }

    case 'conditional':
      return isTruthy(ev(node.test)) ? ev(node.consequent) : ev(node.alternate);
  }
}

/**
 * Evaluate a compiled expression against live state and captures.
 * Every failure comes back as a SimulationError naming the expression.
 */
export function evaluateExpression(
  expr: CompiledExpression,
  scope: EvalScope
): Result<ExprValue, SimulationError> {
  try {
    return Ok(evaluateNode(expr.ast, scope, scopedNamespaces(scope)));
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    return Err(new SimulationError(`Expression failed: ${expr.source}: ${cause.message}`, { cause }));
  }
}
