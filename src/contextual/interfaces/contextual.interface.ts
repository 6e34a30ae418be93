import { BusinessEnvironmentVector } from '../../environment/interfaces/bev.interface';

export const CONTEXTUAL_EVALUATOR = 'CONTEXTUAL_EVALUATOR';

export interface ContextualAssessment {
  /** Success probability per category, each in [0, 1]. */
  probabilities: Record<string, number>;
  reasoning: Record<string, string>;
  keyFactors: string[];
  risks: string[];
  recommendation?: string;
  model: string;
}

/**
 * Judges a neighbourhood as a whole. Implementations must honour `signal`
 * and reject with ContextualEvaluatorError on any failure.
 */
export interface ContextualEvaluator {
  readonly name: string;
  assess(
    bev: BusinessEnvironmentVector,
    categories: readonly string[],
    signal?: AbortSignal,
  ): Promise<ContextualAssessment>;
}
