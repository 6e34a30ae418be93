import { GridMetrics } from '../metrics/interfaces/metrics.interface';
import { Facts } from '../scoring/interfaces/rule.interface';

/**
 * Exposes a grid's metrics to the grid rule table as `grid.*` facts.
 */
export function gridFacts(metrics: GridMetrics): Facts {
  return {
    'grid.businessCount': metrics.businessCount,
    'grid.instagramVolume': metrics.instagramVolume,
    'grid.redditMentions': metrics.redditMentions,
    'grid.demandSignals': metrics.instagramVolume + metrics.redditMentions,
    'grid.avgRating': metrics.avgRating,
    'grid.totalReviews': metrics.totalReviews,
    'grid.supplyNorm': metrics.supplyNorm,
    'grid.demandInstagramNorm': metrics.demandInstagramNorm,
    'grid.demandRedditNorm': metrics.demandRedditNorm,
  };
}
