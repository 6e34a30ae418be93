import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import sourcesConfig from '../../config/sources.config';
import { UpstreamUnavailableError } from '../../common/errors';
import { BusinessEntity } from './entities/business.entity';
import { SocialPostEntity } from './entities/social-post.entity';
import { PostgresBusinessSource } from './postgres-business.source';
import { PostgresSocialSource } from './postgres-social.source';

describe('PostgreSQL sources', () => {
  let module: TestingModule;
  let businessSource: PostgresBusinessSource;
  let socialSource: PostgresSocialSource;

  const queryBuilder = {
    where: jest.fn().mockReturnThis(),
    andWhere: jest.fn().mockReturnThis(),
    getMany: jest.fn(),
  };
  const repository = { createQueryBuilder: jest.fn(() => queryBuilder) };

  const bounds = { north: 24.83, south: 24.82, east: 67.04, west: 67.03 };

  const businessRow = (id: string, lat: number, lon: number) => ({
    id,
    name: `Gym ${id}`,
    category: 'gym',
    lat,
    lon,
    rating: 4.2,
    reviewCount: 12,
    gridId: null,
    types: ['gym'],
    priceLevel: 2,
  });

  beforeEach(async () => {
    jest.clearAllMocks();

    module = await Test.createTestingModule({
      providers: [
        PostgresBusinessSource,
        PostgresSocialSource,
        { provide: getRepositoryToken(BusinessEntity), useValue: repository },
        { provide: getRepositoryToken(SocialPostEntity), useValue: repository },
        {
          provide: sourcesConfig.KEY,
          useValue: { ...sourcesConfig(), maxRetries: 2, retryDelayMs: 1, maxRetryDelayMs: 2 },
        },
      ],
    }).compile();

    businessSource = module.get(PostgresBusinessSource);
    socialSource = module.get(PostgresSocialSource);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('PostgresBusinessSource', () => {
    it('should query the bounds and map rows to records', async () => {
      queryBuilder.getMany.mockResolvedValueOnce([businessRow('b1', 24.825, 67.035)]);

      const records = await businessSource.fetch({ kind: 'bounds', bounds, category: 'Gym' });

      expect(queryBuilder.where).toHaveBeenCalledWith(
        'business.lat >= :south AND business.lat < :north',
        bounds,
      );
      expect(queryBuilder.andWhere).toHaveBeenCalledWith('LOWER(business.category) = :category', {
        category: 'gym',
      });
      expect(records).toEqual([
        {
          id: 'b1',
          name: 'Gym b1',
          category: 'gym',
          location: { lat: 24.825, lon: 67.035 },
          rating: 4.2,
          reviewCount: 12,
          gridId: null,
          types: ['gym'],
          priceLevel: 2,
        },
      ]);
    });

    it('should trim radius queries to the circle', async () => {
      queryBuilder.getMany.mockResolvedValueOnce([
        businessRow('near', 24.8251, 67.0351),
        businessRow('corner', 24.8259, 67.0359),
      ]);

      const records = await businessSource.fetch({
        kind: 'radius',
        center: { lat: 24.825, lon: 67.035 },
        radiusM: 100,
      });

      expect(records.map(r => r.id)).toEqual(['near']);
    });

    it('should retry and then report the source unavailable', async () => {
      queryBuilder.getMany.mockRejectedValue(new Error('connection refused'));

      await expect(businessSource.fetch({ kind: 'bounds', bounds })).rejects.toThrow(
        UpstreamUnavailableError,
      );
      expect(queryBuilder.getMany).toHaveBeenCalledTimes(3);
    });
  });

  describe('PostgresSocialSource', () => {
    it('should map rows and skip unknown signal types', async () => {
      queryBuilder.getMany.mockResolvedValueOnce([
        {
          id: 'p1',
          category: 'gym',
          text: 'Need a gym nearby',
          timestamp: new Date('2026-05-01T00:00:00Z'),
          lat: null,
          lon: null,
          signalType: 'demand',
          engagementScore: 7,
          gridId: 'test-town-000-000',
        },
        {
          id: 'p2',
          category: 'gym',
          text: 'Liked',
          timestamp: new Date('2026-05-01T00:00:00Z'),
          lat: 24.825,
          lon: 67.035,
          signalType: 'like',
          engagementScore: 1,
          gridId: null,
        },
      ]);

      const signals = await socialSource.fetch('gym', bounds, 90);

      expect(signals).toEqual([
        {
          id: 'p1',
          category: 'gym',
          text: 'Need a gym nearby',
          timestamp: new Date('2026-05-01T00:00:00Z'),
          location: null,
          signalType: 'demand',
          engagementScore: 7,
          gridId: 'test-town-000-000',
        },
      ]);
      expect(queryBuilder.andWhere).toHaveBeenCalledWith('post.timestamp >= :since', {
        since: expect.any(Date),
      });
    });

    it('should not add a time filter without a window', async () => {
      queryBuilder.getMany.mockResolvedValueOnce([]);

      await socialSource.fetch('gym', bounds);

      expect(queryBuilder.andWhere).toHaveBeenCalledTimes(1);
    });
  });
});
