import { Injectable, Logger } from '@nestjs/common';
import { BusinessRecord, SocialSignal } from '../common/interfaces/records.interface';
import { round } from '../common/utils/math.util';
import { CHANNEL_BY_SIGNAL, RawGridMetrics } from './interfaces/metrics.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AggregationOptions {
  /** Only count signals from the last `windowDays` days. */
  windowDays?: number;
  now?: Date;
}

interface Accumulator {
  businessCount: number;
  instagramVolume: number;
  redditMentions: number;
  ratingSum: number;
  ratedCount: number;
  totalReviews: number;
}

/**
 * Counts competing businesses and social signals per grid for one category.
 */
@Injectable()
export class MetricsAggregatorService {
  private readonly logger = new Logger(MetricsAggregatorService.name);

  /**
   * Returns one row per entry of `gridIds`, zero-filled where nothing matched.
   * Records of other categories, without a grid, or on an unknown grid are
   * ignored.
   */
  aggregate(
    category: string,
    gridIds: readonly string[],
    businesses: readonly BusinessRecord[],
    signals: readonly SocialSignal[],
    options: AggregationOptions = {},
  ): RawGridMetrics[] {
    const wanted = category.toLowerCase();
    const accumulators = new Map<string, Accumulator>(
      gridIds.map(gridId => [gridId, emptyAccumulator()]),
    );
    let unplaced = 0;

    for (const business of businesses) {
      if (business.category.toLowerCase() !== wanted) {
        continue;
      }
      const acc = business.gridId ? accumulators.get(business.gridId) : undefined;
      if (!acc) {
        unplaced++;
        continue;
      }
      acc.businessCount++;
      acc.totalReviews += business.reviewCount;
      if (business.rating !== null) {
        acc.ratingSum += business.rating;
        acc.ratedCount++;
      }
    }

    const since = this.windowStart(options);
    let outsideWindow = 0;

    for (const signal of signals) {
      if (signal.category.toLowerCase() !== wanted) {
        continue;
      }
      if (since !== null && signal.timestamp.getTime() < since) {
        outsideWindow++;
        continue;
      }
      const acc = signal.gridId ? accumulators.get(signal.gridId) : undefined;
      if (!acc) {
        unplaced++;
        continue;
      }
      if (CHANNEL_BY_SIGNAL[signal.signalType] === 'instagram') {
        acc.instagramVolume++;
      } else {
        acc.redditMentions++;
      }
    }

    if (unplaced > 0 || outsideWindow > 0) {
      this.logger.debug(
        `Aggregation for '${category}' skipped ${unplaced} unplaced record(s) and ${outsideWindow} signal(s) outside the window`,
      );
    }

    return gridIds.map(gridId => {
      const acc = accumulators.get(gridId) ?? emptyAccumulator();
      return {
        gridId,
        category,
        businessCount: acc.businessCount,
        instagramVolume: acc.instagramVolume,
        redditMentions: acc.redditMentions,
        avgRating: acc.ratedCount > 0 ? round(acc.ratingSum / acc.ratedCount, 2) : null,
        totalReviews: acc.totalReviews,
      };
    });
  }

  private windowStart(options: AggregationOptions): number | null {
    if (!options.windowDays || options.windowDays <= 0) {
      return null;
    }
    const now = options.now ?? new Date();
    return now.getTime() - options.windowDays * DAY_MS;
  }
}

function emptyAccumulator(): Accumulator {
  return {
    businessCount: 0,
    instagramVolume: 0,
    redditMentions: 0,
    ratingSum: 0,
    ratedCount: 0,
    totalReviews: 0,
  };
}
