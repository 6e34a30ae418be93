import * as path from 'path';
import scoringConfig from '../config/scoring.config';
import { ConfigurationError, NotFoundError } from '../common/errors';
import { parseRuleTable } from './rule-table.parser';
import { RuleEngineService } from './rule-engine.service';

describe('RuleEngineService', () => {
  const config = {
    ...scoringConfig(),
    rulesDir: path.resolve(__dirname, '../../data/rules'),
    pointCategories: ['gym', 'cafe'],
    gridRuleTable: 'grid',
  };
  let engine: RuleEngineService;

  beforeEach(() => {
    engine = new RuleEngineService(config);
  });

  it('should load the shipped tables on init', () => {
    engine.onModuleInit();

    expect(engine.tableNames.sort()).toEqual(['cafe', 'grid', 'gym']);
  });

  it('should refuse a table set missing a configured category', () => {
    const gym = parseRuleTable('gym', { category: 'gym', rules: [] });

    expect(() => engine.useTables(new Map([['gym', gym]]))).toThrow(
      new ConfigurationError('Missing rule table(s): cafe, grid'),
    );
  });

  it('should report grid evaluations under the requested category', () => {
    engine.onModuleInit();

    const result = engine.evaluateGrid('cafe', {
      'grid.businessCount': 0,
      'grid.demandSignals': 10,
    });

    expect(result.category).toBe('cafe');
    expect(result.trace.map(entry => entry.ruleName)).toEqual(['no_competition', 'limited_demand']);
    expect(result.score).toBe(0.55);
  });

  it('should raise NotFoundError for an unknown table', () => {
    engine.onModuleInit();

    expect(() => engine.evaluateCategory('bakery', {})).toThrow(NotFoundError);
  });
});
