import * as path from 'path';
import { ConfigurationError } from '../common/errors';
import { loadRuleTables, parseCondition, parseRuleTable } from './rule-table.parser';

describe('rule table parser', () => {
  const rule = (overrides: Record<string, unknown> = {}) => ({
    name: 'near_park',
    when: { fact: 'distance.park', op: 'lt', value: 400 },
    delta: 0.1,
    reason: 'Park nearby',
    ...overrides,
  });

  describe('parseRuleTable', () => {
    it('should parse a valid table and default the base to 0.5', () => {
      const table = parseRuleTable('gym', { category: 'gym', rules: [rule()] });

      expect(table).toEqual({
        name: 'gym',
        category: 'gym',
        base: 0.5,
        rules: [
          {
            name: 'near_park',
            when: { fact: 'distance.park', op: 'lt', value: 400 },
            delta: 0.1,
            reason: 'Park nearby',
          },
        ],
      });
      expect(Object.isFrozen(table)).toBe(true);
    });

    it('should reject a base outside [0, 1]', () => {
      expect(() => parseRuleTable('gym', { category: 'gym', base: 1.5, rules: [] })).toThrow(
        "Rule table 'gym' base must be within [0, 1]",
      );
    });

    it('should reject duplicate rule names', () => {
      expect(() => parseRuleTable('gym', { category: 'gym', rules: [rule(), rule()] })).toThrow(
        "gym.rules[1]: duplicate rule 'near_park'",
      );
    });

    it('should reject a non-numeric delta', () => {
      expect(() =>
        parseRuleTable('gym', { category: 'gym', rules: [rule({ delta: '0.1' })] }),
      ).toThrow(ConfigurationError);
    });

    it('should reject a table without a category', () => {
      expect(() => parseRuleTable('gym', { rules: [] })).toThrow(
        "Rule table 'gym' needs a category",
      );
    });
  });

  describe('parseCondition', () => {
    it('should parse nested any/all conditions', () => {
      const condition = parseCondition(
        {
          any: [
            { fact: 'distance.transit', op: 'absent' },
            { all: [{ fact: 'density.gyms', op: 'between', min: 2, max: 3 }] },
          ],
        },
        'test',
      );

      expect(condition).toEqual({
        any: [
          { fact: 'distance.transit', op: 'absent' },
          { all: [{ fact: 'density.gyms', op: 'between', min: 2, max: 3 }] },
        ],
      });
    });

    it('should reject unknown operators', () => {
      expect(() => parseCondition({ fact: 'x', op: 'near' }, 'test')).toThrow(
        "test: unknown operator 'near'",
      );
    });

    it('should reject an inverted range', () => {
      expect(() => parseCondition({ fact: 'x', op: 'between', min: 5, max: 1 }, 'test')).toThrow(
        "test: 'between' needs numeric min <= max",
      );
    });

    it('should reject a numeric comparison against a string', () => {
      expect(() => parseCondition({ fact: 'x', op: 'gt', value: 'high' }, 'test')).toThrow(
        "test: 'gt' needs a numeric value",
      );
    });
  });

  describe('loadRuleTables', () => {
    it('should load every shipped table', () => {
      const tables = loadRuleTables(path.resolve(__dirname, '../../data/rules'));

      expect([...tables.keys()]).toEqual(['cafe', 'grid', 'gym']);
      expect(tables.get('gym')?.rules).toHaveLength(15);
      expect(tables.get('cafe')?.rules).toHaveLength(17);
    });

    it('should fail with a ConfigurationError for a missing directory', () => {
      expect(() => loadRuleTables(path.resolve(__dirname, 'no-such-dir'))).toThrow(
        ConfigurationError,
      );
    });
  });
});
