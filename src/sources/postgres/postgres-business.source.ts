import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import sourcesConfig from '../../config/sources.config';
import { BusinessRecord } from '../../common/interfaces/records.interface';
import { boundsAround, haversineMeters } from '../../common/utils/geo.util';
import { withRetry } from '../../common/utils/retry.util';
import { BusinessQuery, BusinessSource } from '../interfaces/source.interface';
import { BusinessEntity } from './entities/business.entity';

export function toBusinessRecord(row: BusinessEntity): BusinessRecord {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    location: { lat: row.lat, lon: row.lon },
    rating: row.rating,
    reviewCount: row.reviewCount,
    gridId: row.gridId,
    types: row.types ?? undefined,
    priceLevel: row.priceLevel,
  };
}

@Injectable()
export class PostgresBusinessSource implements BusinessSource {
  readonly name = 'postgres-businesses';
  private readonly logger = new Logger(PostgresBusinessSource.name);

  constructor(
    @InjectRepository(BusinessEntity)
    private readonly repository: Repository<BusinessEntity>,
    @Inject(sourcesConfig.KEY)
    private readonly config: ConfigType<typeof sourcesConfig>,
  ) {}

  async fetch(query: BusinessQuery): Promise<BusinessRecord[]> {
    // Radius queries are cut to their bounding box in SQL, then by distance
    const bounds = query.kind === 'bounds' ? query.bounds : boundsAround(query.center, query.radiusM);

    const rows = await withRetry(
      () => {
        const builder = this.repository
          .createQueryBuilder('business')
          .where('business.lat >= :south AND business.lat < :north', { ...bounds })
          .andWhere('business.lon >= :west AND business.lon < :east', { ...bounds });
        if (query.category) {
          builder.andWhere('LOWER(business.category) = :category', {
            category: query.category.toLowerCase(),
          });
        }
        return builder.getMany();
      },
      {
        source: this.name,
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryDelayMs,
        maxDelayMs: this.config.maxRetryDelayMs,
        logger: this.logger,
      },
    );

    const records = rows.map(toBusinessRecord);
    return query.kind === 'radius'
      ? records.filter(record => haversineMeters(query.center, record.location) <= query.radiusM)
      : records;
  }
}
