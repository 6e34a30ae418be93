import { RuleTraceEntry } from './rule.interface';

export type ProcessingMode = 'fast' | 'full';

export const PROCESSING_MODES: readonly ProcessingMode[] = ['fast', 'full'];

export type Suitability = 'excellent' | 'good' | 'moderate' | 'poor' | 'not_recommended';

export interface CategoryScore {
  category: string;
  score: number;
  ruleScore: number;
  /** Set when the trace belongs to a rule table whose score is not `ruleScore`. */
  ruleTableScore?: number;
  /** Null in fast mode or when the contextual evaluator gave nothing usable. */
  contextualProbability: number | null;
  suitability: Suitability;
  reasoning: string;
  positiveFactors: string[];
  concerns: string[];
  trace: RuleTraceEntry[];
  /** True whenever the contextual weight was not applied. */
  ruleOnly: boolean;
}

export interface GridOpportunity {
  gridId: string;
  category: string;
  score: number;
  confidence: number;
}
