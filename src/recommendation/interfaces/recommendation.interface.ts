import { Coordinate } from '../../common/interfaces/geo.interface';
import { BusinessEnvironmentVector } from '../../environment/interfaces/bev.interface';
import { Evidence, LevelLabels } from '../../explainability/interfaces/explanation.interface';
import { GridMetrics } from '../../metrics/interfaces/metrics.interface';
import { CategoryScore, ProcessingMode } from '../../scoring/interfaces/score.interface';

export const PIPELINE_STAGES = [
  'Received',
  'Aggregating',
  'Normalizing',
  'RuleScoring',
  'ContextualPending',
  'Combining',
  'Explaining',
  'Done',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface PipelineTiming {
  totalMs: number;
  /** Wall-clock milliseconds per stage entered. */
  stages: Partial<Record<PipelineStage, number>>;
}

export interface RequestOptions {
  mode?: ProcessingMode;
  signal?: AbortSignal;
  /** Point queries: attach the environment vector the scores were built from. */
  debug?: boolean;
}

/** What the contextual evaluator said beyond its probabilities. */
export interface ContextualSummary {
  model: string;
  keyFactors: string[];
  risks: string[];
  recommendation: string | null;
}

export interface Recommendation {
  /** Null for a point outside every configured region. */
  gridId: string | null;
  region: string | null;
  point: Coordinate;
  scores: Record<string, CategoryScore>;
  bestCategory: string;
  opportunityScore: number;
  confidence: number;
  rationale: string;
  message: string;
  evidence: Evidence;
  /** Grid sweeps only. */
  metrics?: GridMetrics;
  /** Full mode, when the contextual evaluator answered. */
  contextual?: ContextualSummary;
  /** Point queries in debug mode. */
  environment?: BusinessEnvironmentVector;
  processingMode: ProcessingMode;
  degraded: boolean;
  lowConfidence: boolean;
  warnings: string[];
  timing: PipelineTiming;
}

export interface RankResult {
  region: string;
  category: string;
  processingMode: ProcessingMode;
  totalGrids: number;
  recommendations: Recommendation[];
  lowConfidence: boolean;
  warnings: string[];
  timing: PipelineTiming;
}

export interface PointQuery {
  lat: number;
  lon: number;
  radiusM?: number;
}

export interface BatchEntry {
  index: number;
  query: PointQuery;
  result: Recommendation | null;
  error: string | null;
}

export interface GridListingRow extends GridMetrics {
  opportunityScore: number;
  confidence: number;
}

export interface GridListing {
  region: string;
  category: string;
  grids: GridListingRow[];
  lowConfidence: boolean;
  warnings: string[];
}

export interface GridExplanation {
  gridId: string;
  region: string;
  category: string;
  center: Coordinate;
  metrics: GridMetrics;
  opportunityScore: number;
  confidence: number;
  rationale: string;
  narrative: string;
  levels: LevelLabels;
  evidence: Evidence;
  lowConfidence: boolean;
  warnings: string[];
}
