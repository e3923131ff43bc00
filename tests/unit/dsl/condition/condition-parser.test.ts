import { describe, it, expect } from 'vitest';
import { parseCondition, resolveConditionKind } from '../../../../src/dsl/condition/condition-parser.js';
import { RuleParseError } from '../../../../src/dsl/helpers/errors.js';

describe('resolveConditionKind', () => {
  it('maps aliases to the same kind', () => {
    expect(resolveConditionKind('regex')).toBe('pattern');
    expect(resolveConditionKind('within_range')).toBe('range');
    expect(resolveConditionKind('fire')).toBe('pass');
    expect(resolveConditionKind('fail')).toBe('never_fire');
    expect(resolveConditionKind('all_pass')).toBe('all');
    expect(resolveConditionKind('any_pass')).toBe('any');
  });

  it('ignores case and the may_ prefix', () => {
    expect(resolveConditionKind('MAY_Fire')).toBe('pass');
  });

  it('returns undefined for unknown names', () => {
    expect(resolveConditionKind('eventually')).toBeUndefined();
  });
});

describe('parseCondition', () => {
  describe('pattern', () => {
    it('accepts a bare string', () => {
      expect(parseCondition('Pattern', '^OK')).toEqual({
        name: 'pattern',
        advisory: false,
        spec: { kind: 'pattern', pattern: '^OK' }
      });
    });

    it('accepts { pattern } and { reg_pattern } objects', () => {
      expect(parseCondition('regex', { pattern: 'a+' }).spec).toEqual({ kind: 'pattern', pattern: 'a+' });
      expect(parseCondition('regex', { reg_pattern: 'b+' }).spec).toEqual({ kind: 'pattern', pattern: 'b+' });
    });

    it('turns numbers into pattern text', () => {
      expect(parseCondition('pattern', 200).spec).toEqual({ kind: 'pattern', pattern: '200' });
    });

    it('rejects an invalid regular expression', () => {
      expect(() => parseCondition('pattern', '(')).toThrow(/invalid regular expression "\("/);
    });

    it('rejects a missing pattern', () => {
      expect(() => parseCondition('pattern', null)).toThrow(RuleParseError);
    });
  });

  describe('range', () => {
    it('accepts [min, max]', () => {
      expect(parseCondition('within_range', [1, 5]).spec).toEqual({ kind: 'range', min: 1, max: 5 });
    });

    it('accepts { min, max } and { minimum, maximum }', () => {
      expect(parseCondition('range', { min: 0, max: 3 }).spec).toEqual({ kind: 'range', min: 0, max: 3 });
      expect(parseCondition('range', { minimum: -2, maximum: 2 }).spec).toEqual({ kind: 'range', min: -2, max: 2 });
    });

    it('rejects min greater than max', () => {
      expect(() => parseCondition('range', [5, 1])).toThrow('range min (5) must not exceed max (1)');
    });

    it('rejects a wrong number of bounds', () => {
      expect(() => parseCondition('range', [1, 2, 3])).toThrow('range must have exactly two bounds [min, max], got 3');
    });

    it('rejects non-numeric bounds with the bound path', () => {
      try {
        parseCondition('range', ['a', 2], {}, 'states.s.range');
        expect.fail('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RuleParseError);
        expect((err as RuleParseError).path).toBe('states.s.range[0]');
      }
    });
  });

  describe('never_fire', () => {
    it('keeps an optional message', () => {
      expect(parseCondition('fail', 'must not retry').spec).toEqual({ kind: 'never_fire', message: 'must not retry' });
      expect(parseCondition('never_fire', { msg: 'no' }).spec).toEqual({ kind: 'never_fire', message: 'no' });
      expect(parseCondition('never_fire', null).spec).toEqual({ kind: 'never_fire' });
    });
  });

  describe('advisory prefix', () => {
    it('marks may_ conditions as advisory', () => {
      const definition = parseCondition('may_regex', { pattern: 'x' });

      expect(definition.advisory).toBe(true);
      expect(definition.name).toBe('may_regex');
      expect(definition.spec).toEqual({ kind: 'pattern', pattern: 'x' });
    });
  });

  describe('code', () => {
    it('is rejected unless allowed', () => {
      expect(() => parseCondition('code', 'return true')).toThrow(/code rules are disabled/);
    });

    it('accepts a script or { block } when allowed', () => {
      expect(parseCondition('code', 'return true', { allowCode: true }).spec).toEqual({
        kind: 'code',
        source: 'return true'
      });
      expect(parseCondition('code', { block: 'return 1' }, { allowCode: true }).spec).toEqual({
        kind: 'code',
        source: 'return 1'
      });
    });

    it('rejects an empty script', () => {
      expect(() => parseCondition('code', '  ', { allowCode: true })).toThrow(RuleParseError);
    });
  });

  describe('json', () => {
    it('parses conditions per key', () => {
      expect(parseCondition('json', { status: { pattern: 'ok' }, code: { range: [200, 299] } }).spec).toEqual({
        kind: 'json',
        fields: [
          { key: 'status', conditions: [{ name: 'pattern', advisory: false, spec: { kind: 'pattern', pattern: 'ok' } }] },
          { key: 'code', conditions: [{ name: 'range', advisory: false, spec: { kind: 'range', min: 200, max: 299 } }] }
        ]
      });
    });

    it('rejects an empty mapping', () => {
      expect(() => parseCondition('json', {})).toThrow('json rule must check at least one key');
    });
  });

  describe('combinators', () => {
    it('accepts a mapping of children', () => {
      const definition = parseCondition('all_pass', { pattern: 'a', range: [1, 2] });

      expect(definition.spec.kind).toBe('all');
      if (definition.spec.kind === 'all') {
        expect(definition.spec.rules.map((rule) => rule.spec.kind)).toEqual(['pattern', 'range']);
      }
    });

    it('accepts a list of single-key mappings with repeated conditions', () => {
      const definition = parseCondition('any', [{ pattern: 'a' }, { pattern: 'b' }]);

      expect(definition.spec).toEqual({
        kind: 'any',
        rules: [
          { name: 'pattern', advisory: false, spec: { kind: 'pattern', pattern: 'a' } },
          { name: 'pattern', advisory: false, spec: { kind: 'pattern', pattern: 'b' } }
        ]
      });
    });

    it('rejects list items with several keys', () => {
      expect(() => parseCondition('any', [{ pattern: 'a', fire: null }], {}, 'c')).toThrow(
        'c[0]: must be a mapping with exactly one key, got 2'
      );
    });

    it('rejects an empty combinator', () => {
      expect(() => parseCondition('all', [])).toThrow('combinator needs at least one condition');
    });
  });

  describe('unknown conditions', () => {
    it('throws with the path by default', () => {
      try {
        parseCondition('eventually', 1, {}, 'states.a.verify.triggers[0].Status.eventually');
        expect.fail('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RuleParseError);
        expect((err as RuleParseError).path).toBe('states.a.verify.triggers[0].Status.eventually');
        expect((err as RuleParseError).message).toContain('unknown condition "eventually"');
      }
    });

    it('becomes an unknown rule in lenient mode', () => {
      expect(parseCondition('May_Eventually', 1, { lenient: true })).toEqual({
        name: 'may_eventually',
        advisory: true,
        spec: { kind: 'unknown', name: 'eventually' }
      });
    });
  });
});
