import { Injectable } from '@nestjs/common';
import { clamp } from '../common/utils/math.util';
import {
  COUNT_FIELDS,
  CountField,
  GridMetrics,
  MaxValues,
  RawGridMetrics,
} from './interfaces/metrics.interface';

/**
 * Rescales raw counts against the run-wide maximum so grids of one sweep are
 * comparable.
 */
@Injectable()
export class NormalizerService {
  /**
   * Per-field maximum. Empty input or an all-zero field yields 1.0 so that
   * normalizing never divides by zero.
   */
  computeMax(metrics: readonly RawGridMetrics[]): MaxValues {
    const max: MaxValues = { businessCount: 1, instagramVolume: 1, redditMentions: 1 };

    for (const field of COUNT_FIELDS) {
      const observed = metrics.reduce((highest, row) => Math.max(highest, countOf(row, field)), 0);
      max[field] = observed > 0 ? observed : 1;
    }

    return max;
  }

  normalize(metrics: RawGridMetrics, max: MaxValues): GridMetrics {
    return {
      ...metrics,
      supplyNorm: ratio(countOf(metrics, 'businessCount'), max.businessCount),
      demandInstagramNorm: ratio(countOf(metrics, 'instagramVolume'), max.instagramVolume),
      demandRedditNorm: ratio(countOf(metrics, 'redditMentions'), max.redditMentions),
    };
  }

  normalizeAll(metrics: readonly RawGridMetrics[]): { max: MaxValues; metrics: GridMetrics[] } {
    const max = this.computeMax(metrics);
    return { max, metrics: metrics.map(row => this.normalize(row, max)) };
  }
}

// Missing or non-finite counts are treated as zero
function countOf(metrics: RawGridMetrics, field: CountField): number {
  const value = metrics[field];
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function ratio(value: number, max: number): number {
  return max > 0 ? clamp(value / max) : 0;
}
