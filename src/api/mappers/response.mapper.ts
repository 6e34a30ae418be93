import { round } from '../../common/utils/math.util';
import { BusinessEnvironmentVector } from '../../environment/interfaces/bev.interface';
import { Evidence } from '../../explainability/interfaces/explanation.interface';
import { RegionSummary } from '../../grid/interfaces/grid.interface';
import { GridMetrics } from '../../metrics/interfaces/metrics.interface';
import {
  BatchEntry,
  ContextualSummary,
  GridExplanation,
  GridListing,
  PipelineTiming,
  RankResult,
  Recommendation,
} from '../../recommendation/interfaces/recommendation.interface';
import { CategoryScore } from '../../scoring/interfaces/score.interface';
import {
  BatchResponseModel,
  CategoryScoreModel,
  ContextualSummaryModel,
  EnvironmentModel,
  EvidenceModel,
  GridExplanationModel,
  GridListingModel,
  GridMetricsModel,
  RankResponseModel,
  RecommendationModel,
  RegionModel,
  TimingModel,
} from '../models/responses.model';

// Wire field names are snake_case and part of the public contract

const SCORE_DECIMALS = 4;

// Scores keep full precision until they leave the process
const displayScore = (value: number): number => round(value, SCORE_DECIMALS);

export function toCategoryScoreModel(score: CategoryScore): CategoryScoreModel {
  return {
    score: displayScore(score.score),
    rule_score: displayScore(score.ruleScore),
    ...(score.ruleTableScore !== undefined
      ? { rule_table_score: displayScore(score.ruleTableScore) }
      : {}),
    contextual_probability:
      score.contextualProbability === null ? null : displayScore(score.contextualProbability),
    suitability: score.suitability,
    reasoning: score.reasoning,
    positive_factors: score.positiveFactors,
    concerns: score.concerns,
    trace: score.trace.map(entry => ({
      rule_name: entry.ruleName,
      delta: entry.delta,
      applied_delta: entry.appliedDelta,
      reason: entry.reason,
    })),
    rule_only: score.ruleOnly,
  };
}

export function toEvidenceModel(evidence: Evidence): EvidenceModel {
  return {
    top_posts: evidence.topPosts.map(post => ({
      id: post.id,
      text: post.text,
      signal_type: post.signalType,
      engagement_score: post.engagementScore,
      timestamp: post.timestamp.toISOString(),
    })),
    competitors: evidence.competitors.map(competitor => ({
      id: competitor.id,
      name: competitor.name,
      rating: competitor.rating,
      review_count: competitor.reviewCount,
      distance_km: competitor.distanceKm,
    })),
  };
}

export function toTimingModel(timing: PipelineTiming): TimingModel {
  const stages: Record<string, number> = {};
  for (const [stage, ms] of Object.entries(timing.stages)) {
    if (ms !== undefined) {
      stages[stage] = ms;
    }
  }
  return { total_ms: timing.totalMs, stages };
}

export function toGridMetricsModel(metrics: GridMetrics): GridMetricsModel {
  return {
    grid_id: metrics.gridId,
    business_count: metrics.businessCount,
    instagram_volume: metrics.instagramVolume,
    reddit_mentions: metrics.redditMentions,
    avg_rating: metrics.avgRating,
    total_reviews: metrics.totalReviews,
    supply_norm: metrics.supplyNorm,
    demand_instagram_norm: metrics.demandInstagramNorm,
    demand_reddit_norm: metrics.demandRedditNorm,
  };
}

export function toContextualSummaryModel(summary: ContextualSummary): ContextualSummaryModel {
  return {
    model: summary.model,
    key_factors: [...summary.keyFactors],
    risks: [...summary.risks],
    recommendation: summary.recommendation,
  };
}

export function toEnvironmentModel(bev: BusinessEnvironmentVector): EnvironmentModel {
  const { economic, flags } = bev;
  return {
    point: { ...bev.point },
    radius_m: bev.radiusM,
    density: { ...bev.density },
    distance: { ...bev.distance },
    economic: {
      avg_rating: economic.avgRating,
      avg_review_count: economic.avgReviewCount,
      total_businesses: economic.totalBusinesses,
      premium_count: economic.premiumCount,
      economy_count: economic.economyCount,
      premium_ratio: economic.premiumRatio,
      income_level: economic.incomeLevel,
      competition_density: economic.competitionDensity,
    },
    flags: {
      mall_within_1km: flags.mallWithin1km,
      university_within_1km: flags.universityWithin1km,
      transit_within_500m: flags.transitWithin500m,
      park_within_500m: flags.parkWithin500m,
    },
    generated_at: bev.generatedAt.toISOString(),
  };
}

export function toRecommendationModel(recommendation: Recommendation): RecommendationModel {
  const scores: Record<string, CategoryScoreModel> = {};
  for (const [category, score] of Object.entries(recommendation.scores)) {
    scores[category] = toCategoryScoreModel(score);
  }

  return {
    grid_id: recommendation.gridId,
    region: recommendation.region,
    point: { ...recommendation.point },
    scores,
    best_category: recommendation.bestCategory,
    opportunity_score: displayScore(recommendation.opportunityScore),
    confidence: recommendation.confidence,
    rationale: recommendation.rationale,
    message: recommendation.message,
    evidence: toEvidenceModel(recommendation.evidence),
    ...(recommendation.metrics ? { metrics: toGridMetricsModel(recommendation.metrics) } : {}),
    ...(recommendation.contextual
      ? { contextual: toContextualSummaryModel(recommendation.contextual) }
      : {}),
    ...(recommendation.environment
      ? { environment: toEnvironmentModel(recommendation.environment) }
      : {}),
    processing_mode: recommendation.processingMode,
    degraded: recommendation.degraded,
    low_confidence: recommendation.lowConfidence,
    warnings: recommendation.warnings,
    timing: toTimingModel(recommendation.timing),
  };
}

export function toRankResponse(result: RankResult): RankResponseModel {
  return {
    region: result.region,
    category: result.category,
    processing_mode: result.processingMode,
    total_grids: result.totalGrids,
    recommendations: result.recommendations.map(toRecommendationModel),
    low_confidence: result.lowConfidence,
    warnings: result.warnings,
    timing: toTimingModel(result.timing),
  };
}

export function toBatchResponse(entries: readonly BatchEntry[]): BatchResponseModel {
  const succeeded = entries.filter(entry => entry.result !== null).length;
  return {
    total: entries.length,
    succeeded,
    failed: entries.length - succeeded,
    results: entries.map(entry => ({
      index: entry.index,
      location: { lat: entry.query.lat, lon: entry.query.lon },
      result: entry.result ? toRecommendationModel(entry.result) : null,
      error: entry.error,
    })),
  };
}

export function toRegionModel(region: RegionSummary): RegionModel {
  return {
    name: region.name,
    display_name: region.displayName,
    bounds: { ...region.bounds },
    cell_size_m: region.cellSizeM,
    rows: region.rows,
    cols: region.cols,
    cell_count: region.cellCount,
  };
}

export function toGridListingModel(listing: GridListing): GridListingModel {
  return {
    region: listing.region,
    category: listing.category,
    grids: listing.grids.map(row => ({
      ...toGridMetricsModel(row),
      opportunity_score: displayScore(row.opportunityScore),
      confidence: row.confidence,
    })),
    low_confidence: listing.lowConfidence,
    warnings: listing.warnings,
  };
}

export function toGridExplanationModel(explanation: GridExplanation): GridExplanationModel {
  return {
    grid_id: explanation.gridId,
    region: explanation.region,
    category: explanation.category,
    center: { ...explanation.center },
    metrics: toGridMetricsModel(explanation.metrics),
    opportunity_score: displayScore(explanation.opportunityScore),
    confidence: explanation.confidence,
    rationale: explanation.rationale,
    narrative: explanation.narrative,
    levels: { ...explanation.levels },
    evidence: toEvidenceModel(explanation.evidence),
    low_confidence: explanation.lowConfidence,
    warnings: explanation.warnings,
  };
}
