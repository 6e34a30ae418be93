import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import scoringConfig from '../config/scoring.config';
import { clamp } from '../common/utils/math.util';
import { ContextualAssessment } from '../contextual/interfaces/contextual.interface';
import { RuleScore } from './interfaces/rule.interface';
import { CategoryScore, ProcessingMode } from './interfaces/score.interface';
import { suitabilityFor, suitabilityMessage } from './suitability';
import { validateWeights } from './weights';

export const FAST_MODE_REASONING = 'Rule-based score (fast mode)';
export const FALLBACK_REASONING = 'Contextual assessment unavailable; rule-based score used';

@Injectable()
export class ScoreCombinerService {
  private readonly ruleWeight: number;
  private readonly contextualWeight: number;

  constructor(
    @Inject(scoringConfig.KEY)
    config: ConfigType<typeof scoringConfig>,
  ) {
    const weights = validateWeights(
      { rule: config.ruleWeight, contextual: config.contextualWeight },
      'Score blend',
    );
    this.ruleWeight = weights.rule;
    this.contextualWeight = weights.contextual;
  }

  /**
   * Blends a rule score with the contextual probability for its category.
   * In full mode without a usable probability the rule score stands alone
   * and the result is flagged `ruleOnly`.
   */
  combine(
    rule: RuleScore,
    mode: ProcessingMode,
    assessment?: ContextualAssessment | null,
  ): CategoryScore {
    const probability = mode === 'full' ? probabilityFor(assessment, rule.category) : null;

    let score = rule.score;
    let reasoning = FAST_MODE_REASONING;
    if (mode === 'full') {
      if (assessment && probability !== null) {
        score = this.ruleWeight * rule.score + this.contextualWeight * probability;
        reasoning =
          assessment.reasoning[rule.category] ?? `Contextual assessment by ${assessment.model}`;
      } else {
        reasoning = FALLBACK_REASONING;
      }
    }
    score = clamp(score);

    return {
      category: rule.category,
      score,
      ruleScore: rule.score,
      ...(rule.tableScore !== undefined ? { ruleTableScore: rule.tableScore } : {}),
      contextualProbability: probability,
      suitability: suitabilityFor(score),
      reasoning,
      positiveFactors: [...rule.positiveFactors],
      concerns: [...rule.concerns],
      trace: [...rule.trace],
      ruleOnly: probability === null,
    };
  }

  /**
   * Highest score wins; ties go to the category listed first.
   */
  best(scores: readonly CategoryScore[]): CategoryScore | null {
    return scores.reduce<CategoryScore | null>(
      (best, candidate) => (best === null || candidate.score > best.score ? candidate : best),
      null,
    );
  }

  message(best: CategoryScore): string {
    return suitabilityMessage(best.suitability, best.category);
  }
}

function probabilityFor(
  assessment: ContextualAssessment | null | undefined,
  category: string,
): number | null {
  const probability = assessment?.probabilities[category];
  return typeof probability === 'number' && Number.isFinite(probability) ? clamp(probability) : null;
}
