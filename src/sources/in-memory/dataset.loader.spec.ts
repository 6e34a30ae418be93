import { ConfigurationError } from '../../common/errors';
import { parseDataset } from './dataset.loader';

describe('parseDataset', () => {
  const now = new Date('2026-06-01T00:00:00Z');

  it('should parse businesses with defaults for missing fields', () => {
    const dataset = parseDataset(
      {
        businesses: [{ id: 'b1', category: 'gym', location: { lat: 24.82, lon: 67.03 } }],
      },
      now,
    );

    expect(dataset.businesses).toEqual([
      {
        id: 'b1',
        name: 'b1',
        category: 'gym',
        location: { lat: 24.82, lon: 67.03 },
        rating: null,
        reviewCount: 0,
        gridId: undefined,
        types: undefined,
        priceLevel: null,
      },
    ]);
    expect(dataset.signals).toEqual([]);
  });

  it('should resolve ageDays against the load time', () => {
    const dataset = parseDataset(
      {
        signals: [
          { id: 's1', category: 'gym', signalType: 'demand', ageDays: 2, text: 'Need a gym' },
          { id: 's2', category: 'gym', signalType: 'mention', timestamp: '2026-05-01T12:00:00Z' },
        ],
      },
      now,
    );

    expect(dataset.signals[0].timestamp).toEqual(new Date('2026-05-30T00:00:00Z'));
    expect(dataset.signals[0].location).toBeNull();
    expect(dataset.signals[1].timestamp).toEqual(new Date('2026-05-01T12:00:00Z'));
  });

  it('should reject unknown signal types', () => {
    expect(() =>
      parseDataset({ signals: [{ id: 's1', category: 'gym', signalType: 'like', ageDays: 1 }] }),
    ).toThrow("Signal #0 has unknown signal type 'like'");
  });

  it('should reject a business without a location', () => {
    expect(() => parseDataset({ businesses: [{ id: 'b1', category: 'gym' }] })).toThrow(
      ConfigurationError,
    );
  });
});
