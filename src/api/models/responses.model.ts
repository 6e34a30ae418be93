import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CoordinateModel {
  @ApiProperty({ example: 24.8138 })
  lat!: number;

  @ApiProperty({ example: 67.0311 })
  lon!: number;
}

export class BoundsModel {
  @ApiProperty({ example: 24.822 })
  north!: number;

  @ApiProperty({ example: 24.81 })
  south!: number;

  @ApiProperty({ example: 67.036 })
  east!: number;

  @ApiProperty({ example: 67.02 })
  west!: number;
}

export class RuleTraceModel {
  @ApiProperty({ example: 'no_competition' })
  rule_name!: string;

  @ApiProperty({ example: 0.15 })
  delta!: number;

  @ApiProperty({ example: 0.15, description: 'Change left after clamping to [0, 1]' })
  applied_delta!: number;

  @ApiProperty({ example: 'No direct competitors in this grid' })
  reason!: string;
}

export class CategoryScoreModel {
  @ApiProperty({ example: 0.9132 })
  score!: number;

  @ApiProperty({ example: 0.9132 })
  rule_score!: number;

  @ApiPropertyOptional({
    example: 0.75,
    description: 'Score of the rule table behind the trace, when the rule score comes from elsewhere',
  })
  rule_table_score?: number;

  @ApiProperty({ example: null, nullable: true, type: Number })
  contextual_probability!: number | null;

  @ApiProperty({ example: 'excellent' })
  suitability!: string;

  @ApiProperty({ example: 'Rule-based score (fast mode)' })
  reasoning!: string;

  @ApiProperty({ type: [String] })
  positive_factors!: string[];

  @ApiProperty({ type: [String] })
  concerns!: string[];

  @ApiProperty({ type: [RuleTraceModel] })
  trace!: RuleTraceModel[];

  @ApiProperty({ example: true })
  rule_only!: boolean;
}

export class TopPostModel {
  @ApiProperty({ example: 'post-184' })
  id!: string;

  @ApiProperty({ example: 'Any decent gym around Clifton block 2?' })
  text!: string;

  @ApiProperty({ example: 'demand' })
  signal_type!: string;

  @ApiProperty({ example: 128 })
  engagement_score!: number;

  @ApiProperty({ example: '2026-09-30T08:15:00.000Z' })
  timestamp!: string;
}

export class CompetitorModel {
  @ApiProperty({ example: 'biz-42' })
  id!: string;

  @ApiProperty({ example: 'Iron Works Fitness' })
  name!: string;

  @ApiProperty({ example: 4.3, nullable: true, type: Number })
  rating!: number | null;

  @ApiProperty({ example: 212 })
  review_count!: number;

  @ApiProperty({ example: 0.12 })
  distance_km!: number;
}

export class EvidenceModel {
  @ApiProperty({ type: [TopPostModel] })
  top_posts!: TopPostModel[];

  @ApiProperty({ type: [CompetitorModel] })
  competitors!: CompetitorModel[];
}

export class TimingModel {
  @ApiProperty({ example: 12.4 })
  total_ms!: number;

  @ApiProperty({ example: { Aggregating: 3.1, Normalizing: 0.2, RuleScoring: 1.5 } })
  stages!: Record<string, number>;
}

export class GridMetricsModel {
  @ApiProperty({ example: 'clifton-block2-000-000' })
  grid_id!: string;

  @ApiProperty({ example: 0 })
  business_count!: number;

  @ApiProperty({ example: 28 })
  instagram_volume!: number;

  @ApiProperty({ example: 47 })
  reddit_mentions!: number;

  @ApiProperty({ example: null, nullable: true, type: Number })
  avg_rating!: number | null;

  @ApiProperty({ example: 0 })
  total_reviews!: number;

  @ApiProperty({ example: 0 })
  supply_norm!: number;

  @ApiProperty({ example: 0.7368 })
  demand_instagram_norm!: number;

  @ApiProperty({ example: 0.94 })
  demand_reddit_norm!: number;
}

export class ContextualSummaryModel {
  @ApiProperty({ example: 'stub' })
  model!: string;

  @ApiProperty({ type: [String], example: ['Transit within 500m'] })
  key_factors!: string[];

  @ApiProperty({ type: [String], example: ['No established businesses nearby'] })
  risks!: string[];

  @ApiProperty({ example: null, nullable: true, type: String })
  recommendation!: string | null;
}

export class EconomicFeaturesModel {
  @ApiProperty({ example: 4.2, nullable: true, type: Number })
  avg_rating!: number | null;

  @ApiProperty({ example: 135.5 })
  avg_review_count!: number;

  @ApiProperty({ example: 24 })
  total_businesses!: number;

  @ApiProperty({ example: 6 })
  premium_count!: number;

  @ApiProperty({ example: 3 })
  economy_count!: number;

  @ApiProperty({ example: 0.25 })
  premium_ratio!: number;

  @ApiProperty({ example: 'mid' })
  income_level!: string;

  @ApiProperty({ example: 0.0076, description: 'Businesses per 100 m² of the search circle' })
  competition_density!: number;
}

export class ProximityFlagsModel {
  @ApiProperty({ example: false })
  mall_within_1km!: boolean;

  @ApiProperty({ example: false })
  university_within_1km!: boolean;

  @ApiProperty({ example: true })
  transit_within_500m!: boolean;

  @ApiProperty({ example: false })
  park_within_500m!: boolean;
}

export class EnvironmentModel {
  @ApiProperty()
  point!: CoordinateModel;

  @ApiProperty({ example: 1000 })
  radius_m!: number;

  @ApiProperty({ description: 'Places per bucket', type: 'object', additionalProperties: true })
  density!: Record<string, number>;

  @ApiProperty({
    description: 'Metres to the nearest landmark, null when none is in range',
    type: 'object',
    additionalProperties: true,
  })
  distance!: Record<string, number | null>;

  @ApiProperty()
  economic!: EconomicFeaturesModel;

  @ApiProperty()
  flags!: ProximityFlagsModel;

  @ApiProperty({ example: '2026-10-18T09:00:00.000Z' })
  generated_at!: string;
}

export class RecommendationModel {
  @ApiProperty({ example: 'clifton-block2-000-000', nullable: true, type: String })
  grid_id!: string | null;

  @ApiProperty({ example: 'clifton-block2', nullable: true, type: String })
  region!: string | null;

  @ApiProperty()
  point!: CoordinateModel;

  @ApiProperty({ description: 'Score per category', type: 'object', additionalProperties: true })
  scores!: Record<string, CategoryScoreModel>;

  @ApiProperty({ example: 'gym' })
  best_category!: string;

  @ApiProperty({ example: 0.9132 })
  opportunity_score!: number;

  @ApiProperty({ example: 0.956 })
  confidence!: number;

  @ApiProperty({ example: 'High demand (75 posts), low competition (0 businesses)' })
  rationale!: string;

  @ApiProperty({ example: 'This location is EXCELLENT for a GYM. Strong recommendation to proceed.' })
  message!: string;

  @ApiProperty()
  evidence!: EvidenceModel;

  @ApiPropertyOptional({ description: 'Grid sweeps only' })
  metrics?: GridMetricsModel;

  @ApiPropertyOptional({ description: 'Full mode, when the contextual evaluator answered' })
  contextual?: ContextualSummaryModel;

  @ApiPropertyOptional({ description: 'Point queries with debug set' })
  environment?: EnvironmentModel;

  @ApiProperty({ example: 'fast' })
  processing_mode!: string;

  @ApiProperty({ example: false })
  degraded!: boolean;

  @ApiProperty({ example: false })
  low_confidence!: boolean;

  @ApiProperty({ type: [String] })
  warnings!: string[];

  @ApiProperty()
  timing!: TimingModel;
}

export class RankResponseModel {
  @ApiProperty({ example: 'clifton-block2' })
  region!: string;

  @ApiProperty({ example: 'gym' })
  category!: string;

  @ApiProperty({ example: 'fast' })
  processing_mode!: string;

  @ApiProperty({ example: 204 })
  total_grids!: number;

  @ApiProperty({ type: [RecommendationModel] })
  recommendations!: RecommendationModel[];

  @ApiProperty({ example: false })
  low_confidence!: boolean;

  @ApiProperty({ type: [String] })
  warnings!: string[];

  @ApiProperty()
  timing!: TimingModel;
}

export class BatchEntryModel {
  @ApiProperty({ example: 0 })
  index!: number;

  @ApiProperty()
  location!: CoordinateModel;

  @ApiProperty({ nullable: true, type: RecommendationModel })
  result!: RecommendationModel | null;

  @ApiProperty({ example: null, nullable: true, type: String })
  error!: string | null;
}

export class BatchResponseModel {
  @ApiProperty({ example: 2 })
  total!: number;

  @ApiProperty({ example: 1 })
  succeeded!: number;

  @ApiProperty({ example: 1 })
  failed!: number;

  @ApiProperty({ type: [BatchEntryModel] })
  results!: BatchEntryModel[];
}

export class RegionModel {
  @ApiProperty({ example: 'clifton-block2' })
  name!: string;

  @ApiProperty({ example: 'Clifton Block 2' })
  display_name!: string;

  @ApiProperty()
  bounds!: BoundsModel;

  @ApiProperty({ example: 100 })
  cell_size_m!: number;

  @ApiProperty({ example: 14 })
  rows!: number;

  @ApiProperty({ example: 16 })
  cols!: number;

  @ApiProperty({ example: 224 })
  cell_count!: number;
}

export class RegionListModel {
  @ApiProperty({ type: [RegionModel] })
  regions!: RegionModel[];
}

export class GridListingRowModel extends GridMetricsModel {
  @ApiProperty({ example: 0.9132 })
  opportunity_score!: number;

  @ApiProperty({ example: 0.956 })
  confidence!: number;
}

export class GridListingModel {
  @ApiProperty({ example: 'clifton-block2' })
  region!: string;

  @ApiProperty({ example: 'gym' })
  category!: string;

  @ApiProperty({ type: [GridListingRowModel] })
  grids!: GridListingRowModel[];

  @ApiProperty({ example: false })
  low_confidence!: boolean;

  @ApiProperty({ type: [String] })
  warnings!: string[];
}

export class LevelsModel {
  @ApiProperty({ example: 'High' })
  opportunity!: string;

  @ApiProperty({ example: 'High' })
  confidence!: string;

  @ApiProperty({ example: 'High' })
  demand!: string;

  @ApiProperty({ example: 'None' })
  competition!: string;
}

export class GridExplanationModel {
  @ApiProperty({ example: 'clifton-block2-000-000' })
  grid_id!: string;

  @ApiProperty({ example: 'clifton-block2' })
  region!: string;

  @ApiProperty({ example: 'gym' })
  category!: string;

  @ApiProperty()
  center!: CoordinateModel;

  @ApiProperty()
  metrics!: GridMetricsModel;

  @ApiProperty({ example: 0.9132 })
  opportunity_score!: number;

  @ApiProperty({ example: 0.956 })
  confidence!: number;

  @ApiProperty()
  rationale!: string;

  @ApiProperty()
  narrative!: string;

  @ApiProperty()
  levels!: LevelsModel;

  @ApiProperty()
  evidence!: EvidenceModel;

  @ApiProperty({ example: false })
  low_confidence!: boolean;

  @ApiProperty({ type: [String] })
  warnings!: string[];
}
