import { NormalizerService } from './normalizer.service';
import { RawGridMetrics } from './interfaces/metrics.interface';

describe('NormalizerService', () => {
  let normalizer: NormalizerService;

  const raw = (gridId: string, counts: Partial<RawGridMetrics>): RawGridMetrics => ({
    gridId,
    category: 'gym',
    businessCount: 0,
    instagramVolume: 0,
    redditMentions: 0,
    avgRating: null,
    totalReviews: 0,
    ...counts,
  });

  beforeEach(() => {
    normalizer = new NormalizerService();
  });

  describe('computeMax', () => {
    it('should return 1.0 for every field of an empty list', () => {
      expect(normalizer.computeMax([])).toEqual({
        businessCount: 1,
        instagramVolume: 1,
        redditMentions: 1,
      });
    });

    it('should return 1.0 for all-zero fields', () => {
      const max = normalizer.computeMax([raw('a', { businessCount: 3 }), raw('b', {})]);

      expect(max).toEqual({ businessCount: 3, instagramVolume: 1, redditMentions: 1 });
    });

    it('should take the maximum across grids', () => {
      const max = normalizer.computeMax([
        raw('a', { businessCount: 4, instagramVolume: 10, redditMentions: 50 }),
        raw('b', { businessCount: 1, instagramVolume: 38, redditMentions: 47 }),
      ]);

      expect(max).toEqual({ businessCount: 4, instagramVolume: 38, redditMentions: 50 });
    });
  });

  describe('normalize', () => {
    it('should divide each count by its maximum', () => {
      const row = normalizer.normalize(
        raw('a', { businessCount: 0, instagramVolume: 28, redditMentions: 47 }),
        { businessCount: 4, instagramVolume: 38, redditMentions: 50 },
      );

      expect(row.supplyNorm).toBe(0);
      expect(row.demandInstagramNorm).toBeCloseTo(0.7368, 4);
      expect(row.demandRedditNorm).toBe(0.94);
    });

    it('should normalize the run-wide maximum to exactly 1', () => {
      const { metrics } = normalizer.normalizeAll([
        raw('a', { businessCount: 4, redditMentions: 50 }),
        raw('b', { businessCount: 2, redditMentions: 7 }),
      ]);

      expect(metrics[0].supplyNorm).toBe(1);
      expect(metrics[0].demandRedditNorm).toBe(1);
      expect(metrics[1].supplyNorm).toBe(0.5);
    });

    it('should yield zeros, not NaN, for an all-zero list', () => {
      const { metrics } = normalizer.normalizeAll([raw('a', {}), raw('b', {})]);

      for (const row of metrics) {
        expect([row.supplyNorm, row.demandInstagramNorm, row.demandRedditNorm]).toEqual([0, 0, 0]);
      }
    });

    it('should treat missing counts as zero and clamp values above the maximum', () => {
      const partial = { ...raw('a', { instagramVolume: 80 }), redditMentions: Number.NaN };

      const row = normalizer.normalize(partial, {
        businessCount: 1,
        instagramVolume: 40,
        redditMentions: 10,
      });

      expect(row.demandRedditNorm).toBe(0);
      expect(row.demandInstagramNorm).toBe(1);
    });

    it('should keep every normalized field within [0, 1]', () => {
      const rows = [
        raw('a', { businessCount: 9, instagramVolume: 3, redditMentions: 12 }),
        raw('b', { businessCount: 1, instagramVolume: 30, redditMentions: 0 }),
        raw('c', { businessCount: 5, instagramVolume: 0, redditMentions: 6 }),
      ];

      for (const row of normalizer.normalizeAll(rows).metrics) {
        for (const value of [row.supplyNorm, row.demandInstagramNorm, row.demandRedditNorm]) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(1);
        }
      }
    });
  });
});
