import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import scoringConfig from '../config/scoring.config';
import { clamp, round } from '../common/utils/math.util';
import { GridMetrics } from '../metrics/interfaces/metrics.interface';
import { GridOpportunity } from './interfaces/score.interface';
import { validateWeights } from './weights';

const BOTH_CHANNELS_BONUS = 0.2;

/**
 * Deterministic grid opportunity score (GOS): low supply and high demand on
 * both social channels.
 */
@Injectable()
export class OpportunityScorerService {
  private readonly weights: { supplyWeight: number; instagramWeight: number; redditWeight: number };

  constructor(
    @Inject(scoringConfig.KEY)
    config: ConfigType<typeof scoringConfig>,
  ) {
    this.weights = validateWeights({ ...config.opportunity }, 'Opportunity score');
  }

  score(metrics: GridMetrics): number {
    const { supplyWeight, instagramWeight, redditWeight } = this.weights;
    const value =
      (1 - metrics.supplyNorm) * supplyWeight +
      metrics.demandInstagramNorm * instagramWeight +
      metrics.demandRedditNorm * redditWeight;
    return clamp(value);
  }

  /**
   * Grows with the amount of social evidence behind a grid, independent of
   * whether that evidence is favourable.
   */
  confidence(instagramVolume: number, redditMentions: number): number {
    let value = Math.log1p(instagramVolume) / 5 + Math.log1p(redditMentions) / 3;
    if (instagramVolume > 0 && redditMentions > 0) {
      value += BOTH_CHANNELS_BONUS;
    }
    return round(Math.min(1, value), 3);
  }

  assess(metrics: GridMetrics): GridOpportunity {
    return {
      gridId: metrics.gridId,
      category: metrics.category,
      score: this.score(metrics),
      confidence: this.confidence(metrics.instagramVolume, metrics.redditMentions),
    };
  }
}
