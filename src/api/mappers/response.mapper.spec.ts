import { CategoryScore } from '../../scoring/interfaces/score.interface';
import { toCategoryScoreModel } from './response.mapper';

describe('toCategoryScoreModel', () => {
  const score = (overrides: Partial<CategoryScore> = {}): CategoryScore => ({
    category: 'gym',
    score: 0.79996,
    ruleScore: 0.79996,
    contextualProbability: null,
    suitability: 'good',
    reasoning: 'Rule-based score (fast mode)',
    positiveFactors: [],
    concerns: [],
    trace: [],
    ruleOnly: true,
    ...overrides,
  });

  it('should round scores for display and keep the tier computed at full precision', () => {
    const model = toCategoryScoreModel(score());

    expect(model.score).toBe(0.8);
    expect(model.rule_score).toBe(0.8);
    expect(model.suitability).toBe('good');
    expect(model.contextual_probability).toBeNull();
    expect(model).not.toHaveProperty('rule_table_score');
  });

  it('should include the rule table score when present', () => {
    const model = toCategoryScoreModel(
      score({ ruleTableScore: 0.650000001, contextualProbability: 0.123456 }),
    );

    expect(model.rule_table_score).toBe(0.65);
    expect(model.contextual_probability).toBe(0.1235);
  });
});
