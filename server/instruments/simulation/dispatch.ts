/**
 * Dispatch Table
 *
 * Compiles the scpi map and error rules of a profile into:
 *   - an exact-match map, keyed by the upper-cased command
 *   - pattern rules, ordered most specific first
 *   - error rules with compiled patterns and conditions
 *
 * Key syntax:
 *   "*IDN?"            exact
 *   ":VOLT $1"         glob; $n and * capture, everything else is literal
 *   "MEAS:*?"          glob
 *   "re:^CH(\d):SCAL (.+)$"   regular expression
 *   "CH([1-4]):SCAL (.+)"     regular expression (contains regex syntax)
 *   ":MEAS:VOLT? (@$1)"       glob; with a placeholder, regex syntax is literal
 *
 * A lone "?" or "." never makes a key a pattern, so queries like ":VOLT?" and
 * keys like "SYST:VERS?" stay exact.
 */

import type { Result, StateValue } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ProfileError } from '../errors.js';
import { compileExpression, type CompiledExpression } from './expression.js';
import type { ActionMapSpec, ResponseEntrySpec, SimulationSpec } from './profile.js';

export const DYNAMIC_PREFIX = 'expr:';
// Older profiles mark dynamic values with "py:"
export const LEGACY_DYNAMIC_PREFIX = 'py:';
export const REGEX_PREFIX = 're:';

const PLACEHOLDER = /\$(\d+)/g;
// "*IDN?", "*RST": the leading star of a common command is literal
const COMMON_PREFIX = /^\*(?=[A-Za-z])/;
const REGEX_SYNTAX = /[[\](){}+|^\\]/;
const REGEX_WILDCARDS = /\\.|[*+?.[]/g;

// ============ Compiled entries ============

/** Where a set/inc/dec value or a response string comes from */
export type ValueSource =
  | { kind: 'literal'; value: StateValue }
  | { kind: 'template'; template: string }
  | { kind: 'dynamic'; expr: CompiledExpression };

export interface ActionMap {
  /** Seconds */
  delay: number;
  set: Array<[string, ValueSource]>;
  inc: Array<[string, ValueSource]>;
  dec: Array<[string, ValueSource]>;
  get?: string;
  response?: ValueSource;
}

export type ResponseEntry =
  | { kind: 'literal'; text: string }
  | { kind: 'template'; template: string }
  | { kind: 'dynamic'; expr: CompiledExpression }
  | { kind: 'actions'; actions: ActionMap };

export interface PatternRule {
  key: string;
  matcher: RegExp;
  entry: ResponseEntry;
  wildcards: number;
  literalLength: number;
  order: number;
}

export interface ErrorRule {
  matcher: RegExp;
  condition: CompiledExpression;
  code: number;
  message: string;
}

export interface DispatchTable {
  exact: Map<string, ResponseEntry>;
  patterns: PatternRule[];
  errors: ErrorRule[];
}

export interface DispatchMatch {
  key: string;
  entry: ResponseEntry;
  captures: string[];
}

// ============ Classification ============

export function isPatternKey(key: string): boolean {
  return (
    key.startsWith(REGEX_PREFIX) ||
    key.trim().replace(COMMON_PREFIX, '').includes('*') ||
    /\$\d/.test(key) ||
    REGEX_SYNTAX.test(key)
  );
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface CompiledKey {
  source: string;
  wildcards: number;
  literalLength: number;
}

function compileGlob(glob: string): CompiledKey {
  const prefix = COMMON_PREFIX.test(glob) ? '*' : '';
  const key = glob.slice(prefix.length);
  let source = escapeRegex(prefix);
  let wildcards = 0;
  let literalLength = prefix.length;
  const token = /\*|\$\d+/g;
  let last = 0;

  for (const match of key.matchAll(token)) {
    const at = match.index ?? last;
    const literal = key.slice(last, at);
    source += escapeRegex(literal);
    literalLength += literal.length;
    source += match[0] === '*' ? '(.*?)' : '(.+?)';
    wildcards++;
    last = at + match[0].length;
  }

  const tail = key.slice(last);
  source += escapeRegex(tail);
  literalLength += tail.length;
  return { source, wildcards, literalLength };
}

function compileRegexKey(body: string): CompiledKey {
  const wildcards = (body.match(REGEX_WILDCARDS) ?? []).filter(t => !t.startsWith('\\')).length;
  const literalLength = body.replace(REGEX_WILDCARDS, m => (m.startsWith('\\') ? 'x' : '')).length;
  return { source: body, wildcards, literalLength };
}

/** Anchored, case-insensitive full match */
function anchored(source: string): RegExp {
  return new RegExp(`^(?:${source})$`, 'i');
}

// ============ Entry compilation ============

function dynamicBody(value: string): string | undefined {
  const trimmed = value.trimStart();
  const prefix = [DYNAMIC_PREFIX, LEGACY_DYNAMIC_PREFIX].find(p => trimmed.startsWith(p));
  return prefix === undefined ? undefined : trimmed.slice(prefix.length);
}

function compileValue(value: StateValue, where: string, source: string): Result<ValueSource, ProfileError> {
  if (typeof value !== 'string') {
    return Ok({ kind: 'literal', value });
  }
  const body = dynamicBody(value);
  if (body !== undefined) {
    const compiled = compileExpression(body);
    if (!compiled.ok) {
      return Err(new ProfileError(source, `Invalid expression in ${where}: ${compiled.error}`));
    }
    return Ok({ kind: 'dynamic', expr: compiled.value });
  }
  if (/\$\d/.test(value)) {
    return Ok({ kind: 'template', template: value });
  }
  return Ok({ kind: 'literal', value });
}

function compileAssignments(
  values: Record<string, StateValue> | undefined,
  where: string,
  source: string
): Result<Array<[string, ValueSource]>, ProfileError> {
  const out: Array<[string, ValueSource]> = [];
  for (const [key, value] of Object.entries(values ?? {})) {
    const compiled = compileValue(value, `${where}.${key}`, source);
    if (!compiled.ok) return compiled;
    out.push([key, compiled.value]);
  }
  return Ok(out);
}

function compileActions(spec: ActionMapSpec, where: string, source: string): Result<ActionMap, ProfileError> {
  const set = compileAssignments(spec.set, `${where}.set`, source);
  if (!set.ok) return set;
  const inc = compileAssignments(spec.inc, `${where}.inc`, source);
  if (!inc.ok) return inc;
  const dec = compileAssignments(spec.dec, `${where}.dec`, source);
  if (!dec.ok) return dec;

  let response: ValueSource | undefined;
  if (spec.response !== undefined) {
    const compiled = compileValue(spec.response, `${where}.response`, source);
    if (!compiled.ok) return compiled;
    response = compiled.value;
  }

  return Ok({
    delay: spec.delay ?? 0,
    set: set.value,
    inc: inc.value,
    dec: dec.value,
    get: spec.get,
    response,
  });
}

export function compileEntry(
  spec: ResponseEntrySpec,
  where: string,
  source: string
): Result<ResponseEntry, ProfileError> {
  if (typeof spec !== 'string') {
    const actions = compileActions(spec, where, source);
    return actions.ok ? Ok({ kind: 'actions', actions: actions.value }) : actions;
  }

  const value = compileValue(spec, where, source);
  if (!value.ok) return value;

  const compiled = value.value;
  switch (compiled.kind) {
    case 'dynamic':
      return Ok({ kind: 'dynamic', expr: compiled.expr });
    case 'template':
      return Ok({ kind: 'template', template: compiled.template });
    case 'literal':
      return Ok({ kind: 'literal', text: spec });
  }
}

// ============ Table ============

function compareSpecificity(a: PatternRule, b: PatternRule): number {
  return a.wildcards - b.wildcards || b.literalLength - a.literalLength || a.order - b.order;
}

/**
 * Compile one scpi entry into the table. A key that is already present is
 * replaced in place, keeping its position among equally specific patterns.
 */
export function addRule(
  table: DispatchTable,
  key: string,
  spec: ResponseEntrySpec,
  source: string
): Result<void, ProfileError> {
  const where = `scpi["${key}"]`;
  const entry = compileEntry(spec, where, source);
  if (!entry.ok) return entry;

  if (!isPatternKey(key)) {
    table.exact.set(key.trim().toUpperCase(), entry.value);
    return Ok(undefined);
  }

  const existing = table.patterns.find(rule => rule.key === key);
  if (existing) {
    existing.entry = entry.value;
    return Ok(undefined);
  }

  // $n placeholders mean glob syntax, so "(@$1)" keeps its parentheses literal
  const isRegex = key.startsWith(REGEX_PREFIX) || (REGEX_SYNTAX.test(key) && !/\$\d/.test(key));
  const compiled = isRegex
    ? compileRegexKey(key.startsWith(REGEX_PREFIX) ? key.slice(REGEX_PREFIX.length) : key)
    : compileGlob(key.trim());

  let matcher: RegExp;
  try {
    matcher = anchored(compiled.source);
  } catch (err) {
    return Err(new ProfileError(source, `Invalid pattern ${where}`, { cause: err }));
  }

  table.patterns.push({
    key,
    matcher,
    entry: entry.value,
    wildcards: compiled.wildcards,
    literalLength: compiled.literalLength,
    order: table.patterns.length,
  });
  table.patterns.sort(compareSpecificity);
  return Ok(undefined);
}

export function buildDispatchTable(simulation: SimulationSpec, source: string): Result<DispatchTable, ProfileError> {
  const table: DispatchTable = { exact: new Map(), patterns: [], errors: [] };

  for (const [key, spec] of Object.entries(simulation.scpi)) {
    const added = addRule(table, key, spec, source);
    if (!added.ok) return added;
  }

  for (const [index, spec] of simulation.errors.entries()) {
    const where = `errors[${index}]`;
    let matcher: RegExp;
    try {
      matcher = anchored(spec.pattern);
    } catch (err) {
      return Err(new ProfileError(source, `Invalid pattern in ${where}`, { cause: err }));
    }

    const condition = compileExpression(spec.condition);
    if (!condition.ok) {
      return Err(new ProfileError(source, `Invalid condition in ${where}: ${condition.error}`));
    }

    table.errors.push({ matcher, condition: condition.value, code: spec.code, message: spec.message });
  }

  return Ok(table);
}

// ============ Lookup ============

function groupsOf(match: RegExpExecArray): string[] {
  return match.slice(1).map(group => group ?? '');
}

/**
 * Find the entry for a command: exact match first, then the first pattern
 * rule (in specificity order) that fully matches.
 */
export function matchCommand(table: DispatchTable, command: string): DispatchMatch | undefined {
  const stripped = command.trim();
  const upper = stripped.toUpperCase();

  const exact = table.exact.get(upper);
  if (exact) {
    return { key: upper, entry: exact, captures: [] };
  }

  for (const rule of table.patterns) {
    const match = rule.matcher.exec(stripped);
    if (match) {
      return { key: rule.key, entry: rule.entry, captures: groupsOf(match) };
    }
  }
  return undefined;
}

/**
 * Error rules whose pattern matches the command, each with the captures its
 * condition sees: the rule's own groups when its pattern has any, otherwise
 * the captures of the dispatch match.
 */
export function matchErrorRules(
  table: DispatchTable,
  command: string,
  dispatchCaptures: string[]
): Array<{ rule: ErrorRule; captures: string[] }> {
  const stripped = command.trim();
  const matched: Array<{ rule: ErrorRule; captures: string[] }> = [];
  for (const rule of table.errors) {
    const match = rule.matcher.exec(stripped);
    if (!match) continue;
    const own = groupsOf(match);
    matched.push({ rule, captures: own.length > 0 ? own : dispatchCaptures });
  }
  return matched;
}

/** Replace $1..$n with captures; placeholders without a capture stay as written */
export function substituteCaptures(template: string, captures: readonly string[]): string {
  return template.replace(PLACEHOLDER, (placeholder, digits: string) => {
    const index = Number(digits) - 1;
    return index >= 0 && index < captures.length ? captures[index] : placeholder;
  });
}
