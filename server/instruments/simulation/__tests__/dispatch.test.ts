import { describe, it, expect } from 'vitest';
import {
  addRule,
  buildDispatchTable,
  compileEntry,
  isPatternKey,
  matchCommand,
  matchErrorRules,
  substituteCaptures,
  type DispatchTable,
} from '../dispatch.js';
import type { ErrorSpec, ResponseEntrySpec } from '../profile.js';

function build(scpi: Record<string, ResponseEntrySpec>, errors: ErrorSpec[] = []): DispatchTable {
  const result = buildDispatchTable({ initial_state: {}, scpi, errors }, 'test.json');
  if (!result.ok) throw result.error;
  return result.value;
}

function responseOf(table: DispatchTable, command: string): string | undefined {
  const match = matchCommand(table, command);
  if (!match || match.entry.kind !== 'literal') return undefined;
  return match.entry.text;
}

describe('Dispatch', () => {
  describe('isPatternKey', () => {
    it('should keep plain commands and queries exact', () => {
      expect(isPatternKey('*IDN?')).toBe(false);
      expect(isPatternKey('*RST')).toBe(false);
      expect(isPatternKey(':VOLT?')).toBe(false);
      expect(isPatternKey('SYST:VERS?')).toBe(false);
      expect(isPatternKey(':MEAS:VOLT:DC?')).toBe(false);
    });

    it('should detect globs, placeholders and regular expressions', () => {
      expect(isPatternKey(':VOLT $1')).toBe(true);
      expect(isPatternKey('MEAS:*?')).toBe(true);
      expect(isPatternKey('*ESE $1')).toBe(true);
      expect(isPatternKey('re:^A$')).toBe(true);
      expect(isPatternKey('CH([1-4]):SCAL (.+)')).toBe(true);
    });
  });

  describe('matchCommand', () => {
    it('should match exact keys case-insensitively after trimming', () => {
      const table = build({ '*IDN?': 'ACME,X,0,1' });
      expect(matchCommand(table, '  *idn? ')).toEqual({
        key: '*IDN?',
        entry: { kind: 'literal', text: 'ACME,X,0,1' },
        captures: [],
      });
    });

    it('should capture placeholder values', () => {
      const table = build({ ':VOLT $1': { set: { voltage: '$1' } } });
      expect(matchCommand(table, ':VOLT 5.0')?.captures).toEqual(['5.0']);
      expect(matchCommand(table, ':volt 12')?.captures).toEqual(['12']);
      expect(matchCommand(table, ':VOLT?')).toBeUndefined();
    });

    it('should treat the glob star as a capture', () => {
      const table = build({ 'MEAS:*?': 'reading' });
      expect(matchCommand(table, 'MEAS:CURR?')?.captures).toEqual(['CURR']);
    });

    it('should prefer an exact match over any pattern', () => {
      const table = build({ 'MEAS:*?': 'pattern', 'MEAS:VOLT?': 'exact' });
      expect(responseOf(table, 'MEAS:VOLT?')).toBe('exact');
      expect(responseOf(table, 'MEAS:CURR?')).toBe('pattern');
    });

    it('should try more specific patterns first', () => {
      const table = build({ '*': 'anything', ':VOLT *': 'volt' });
      expect(responseOf(table, ':VOLT 5')).toBe('volt');
      expect(responseOf(table, 'OTHER')).toBe('anything');
    });

    it('should break ties by declaration order', () => {
      const table = build({ '*:X': 'first', 'Y:*': 'second' });
      expect(responseOf(table, 'Y:X')).toBe('first');
    });

    it('should order patterns the same way on every build', () => {
      const scpi = { '*': 'a', 'A:*': 'b', 'B:*:*': 'c', 'C:*': 'd' };
      const keys = (table: DispatchTable) => table.patterns.map(rule => rule.key);
      expect(keys(build(scpi))).toEqual(keys(build(scpi)));
      expect(keys(build(scpi))).toEqual(['A:*', 'C:*', '*', 'B:*:*']);
    });

    it('should match regular expression keys with their groups', () => {
      const table = build({ 're:CH(\\d):SCAL (.+)': 'ok' });
      expect(matchCommand(table, 'ch2:scal 0.5')?.captures).toEqual(['2', '0.5']);
    });

    it('should keep regex characters literal in keys with placeholders', () => {
      const table = build({ ':MEAS:VOLT? (@$1)': 'V$1' });
      expect(matchCommand(table, ':MEAS:VOLT? (@1)')?.captures).toEqual(['1']);
      expect(matchCommand(table, ':meas:volt? (@101:104)')?.captures).toEqual(['101:104']);
      expect(matchCommand(table, ':MEAS:VOLT? @1')).toBeUndefined();
    });

    it('should anchor patterns to the whole command', () => {
      const table = build({ ':VOLT *': 'volt' });
      expect(matchCommand(table, 'X:VOLT 5')).toBeUndefined();
    });
  });

  describe('buildDispatchTable errors', () => {
    it('should reject an invalid regular expression', () => {
      const result = buildDispatchTable({ initial_state: {}, scpi: { 're:CH(': 'x' }, errors: [] }, 'test.json');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Invalid pattern scpi["re:CH("] (test.json)');
    });

    it('should reject an invalid expression', () => {
      const result = buildDispatchTable({ initial_state: {}, scpi: { 'A?': 'expr: 1 +' }, errors: [] }, 'test.json');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Invalid expression in scpi["A?"]: unexpected end of expression (test.json)');
      }
    });

    it('should reject an invalid error condition', () => {
      const result = buildDispatchTable(
        { initial_state: {}, scpi: {}, errors: [{ pattern: 'A', condition: '(', code: -1, message: 'x' }] },
        'test.json'
      );
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Invalid condition in errors[0]: unexpected end of expression (test.json)');
      }
    });
  });

  describe('compileEntry', () => {
    it('should classify scalar entries', () => {
      expect(compileEntry('5.0', 'k', 'test.json')).toEqual({ ok: true, value: { kind: 'literal', text: '5.0' } });
      expect(compileEntry('$1 V', 'k', 'test.json')).toEqual({ ok: true, value: { kind: 'template', template: '$1 V' } });

      const dynamic = compileEntry('expr: 1 + 1', 'k', 'test.json');
      expect(dynamic.ok && dynamic.value.kind).toBe('dynamic');
    });

    it('should accept py: as a dynamic marker', () => {
      const legacy = compileEntry('py: 1 + 1', 'k', 'test.json');
      expect(legacy.ok && legacy.value.kind).toBe('dynamic');

      const invalid = compileEntry('py: 1 +', 'k', 'test.json');
      expect(invalid.ok).toBe(false);
    });

    it('should compile action maps', () => {
      const result = compileEntry(
        { set: { a: '$1', b: 3, c: 'expr: g1 * 2' }, get: 'a', delay: 0.5 },
        'k',
        'test.json'
      );
      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind !== 'actions') return;

      const { actions } = result.value;
      expect(actions.delay).toBe(0.5);
      expect(actions.get).toBe('a');
      expect(actions.set.map(([key, value]) => [key, value.kind])).toEqual([
        ['a', 'template'],
        ['b', 'literal'],
        ['c', 'dynamic'],
      ]);
      expect(actions.inc).toEqual([]);
    });
  });

  describe('substituteCaptures', () => {
    it('should replace placeholders and keep unknown ones', () => {
      expect(substituteCaptures('$1-$2-$3', ['a', 'b'])).toBe('a-b-$3');
      expect(substituteCaptures('no placeholders', ['a'])).toBe('no placeholders');
    });
  });

  describe('matchErrorRules', () => {
    const errors: ErrorSpec[] = [
      { pattern: ':VOLT (.+)', condition: 'g1 > 30', code: -222, message: 'Data out of range' },
      { pattern: ':VOLT .*', condition: 'true', code: -1, message: 'any volt' },
    ];

    it('should give each rule its own groups, or the dispatch captures', () => {
      const table = build({}, errors);
      const matched = matchErrorRules(table, ':volt 35', ['from-dispatch']);

      expect(matched.map(m => [m.rule.code, m.captures])).toEqual([
        [-222, ['35']],
        [-1, ['from-dispatch']],
      ]);
    });

    it('should skip rules that do not match', () => {
      const table = build({}, errors);
      expect(matchErrorRules(table, ':CURR 1', [])).toEqual([]);
    });
  });

  describe('addRule', () => {
    it('should replace an existing pattern in place', () => {
      const table = build({ ':VOLT $1': 'old', 'A:*': 'a' });
      expect(addRule(table, ':VOLT $1', 'new', 'test.json').ok).toBe(true);

      expect(table.patterns).toHaveLength(2);
      expect(responseOf(table, ':VOLT 1')).toBe('new');
    });

    it('should add exact entries', () => {
      const table = build({});
      addRule(table, ':OUTP?', 'ON', 'test.json');
      expect(responseOf(table, ':outp?')).toBe('ON');
    });
  });
});
