import { BusinessRecord, SocialSignal } from '../common/interfaces/records.interface';
import { MetricsAggregatorService } from './metrics-aggregator.service';

describe('MetricsAggregatorService', () => {
  let aggregator: MetricsAggregatorService;

  const now = new Date('2024-06-01T00:00:00Z');
  const daysAgo = (days: number) => new Date(now.getTime() - days * 24 * 60 * 60 * 1000);

  const business = (overrides: Partial<BusinessRecord>): BusinessRecord => ({
    id: 'b',
    name: 'Iron Temple',
    category: 'gym',
    location: { lat: 24.82, lon: 67.03 },
    rating: 4,
    reviewCount: 10,
    gridId: 'g-000-000',
    ...overrides,
  });

  const signal = (overrides: Partial<SocialSignal>): SocialSignal => ({
    id: 's',
    category: 'gym',
    text: 'Need a gym nearby',
    timestamp: daysAgo(1),
    signalType: 'demand',
    engagementScore: 5,
    gridId: 'g-000-000',
    ...overrides,
  });

  beforeEach(() => {
    aggregator = new MetricsAggregatorService();
  });

  it('should count businesses and signals per channel', () => {
    const [row] = aggregator.aggregate(
      'gym',
      ['g-000-000'],
      [business({ id: 'b1', rating: 4.5, reviewCount: 20 }), business({ id: 'b2', rating: 3.2 })],
      [
        signal({ id: 's1', signalType: 'mention' }),
        signal({ id: 's2', signalType: 'mention' }),
        signal({ id: 's3', signalType: 'demand' }),
        signal({ id: 's4', signalType: 'complaint' }),
      ],
    );

    expect(row).toEqual({
      gridId: 'g-000-000',
      category: 'gym',
      businessCount: 2,
      instagramVolume: 2,
      redditMentions: 2,
      avgRating: 3.85,
      totalReviews: 30,
    });
  });

  it('should emit zero rows for every known grid and nothing for unknown ones', () => {
    const rows = aggregator.aggregate(
      'gym',
      ['g-000-000', 'g-000-001'],
      [business({ gridId: 'elsewhere-000-000' })],
      [signal({ gridId: null })],
    );

    expect(rows.map(row => row.gridId)).toEqual(['g-000-000', 'g-000-001']);
    expect(rows.every(row => row.businessCount === 0 && row.redditMentions === 0)).toBe(true);
    expect(rows[0].avgRating).toBeNull();
  });

  it('should ignore other categories', () => {
    const [row] = aggregator.aggregate(
      'gym',
      ['g-000-000'],
      [business({ category: 'cafe' }), business({ category: 'GYM' })],
      [signal({ category: 'cafe' })],
    );

    expect(row.businessCount).toBe(1);
    expect(row.redditMentions).toBe(0);
  });

  it('should leave unrated businesses out of the average', () => {
    const [row] = aggregator.aggregate(
      'gym',
      ['g-000-000'],
      [business({ id: 'b1', rating: null }), business({ id: 'b2', rating: 4 })],
      [],
    );

    expect(row.businessCount).toBe(2);
    expect(row.avgRating).toBe(4);
  });

  it('should drop signals older than the window', () => {
    const [row] = aggregator.aggregate(
      'gym',
      ['g-000-000'],
      [],
      [
        signal({ id: 'fresh', timestamp: daysAgo(30) }),
        signal({ id: 'edge', timestamp: daysAgo(90) }),
        signal({ id: 'stale', timestamp: daysAgo(91) }),
      ],
      { windowDays: 90, now },
    );

    expect(row.redditMentions).toBe(2);
  });

  it('should count every signal when no window is given', () => {
    const [row] = aggregator.aggregate(
      'gym',
      ['g-000-000'],
      [],
      [signal({ id: 'old', timestamp: daysAgo(400) })],
      { windowDays: 0, now },
    );

    expect(row.redditMentions).toBe(1);
  });
});
