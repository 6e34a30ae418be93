import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import sourcesConfig from '../../config/sources.config';
import { BoundingBox } from '../../common/interfaces/geo.interface';
import { isSignalType, SocialSignal } from '../../common/interfaces/records.interface';
import { withRetry } from '../../common/utils/retry.util';
import { SocialSource } from '../interfaces/source.interface';
import { SocialPostEntity } from './entities/social-post.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

export function toSocialSignal(row: SocialPostEntity): SocialSignal | null {
  if (!isSignalType(row.signalType)) {
    return null;
  }
  return {
    id: row.id,
    category: row.category,
    text: row.text,
    timestamp: row.timestamp,
    location: row.lat !== null && row.lon !== null ? { lat: row.lat, lon: row.lon } : null,
    signalType: row.signalType,
    engagementScore: row.engagementScore,
    gridId: row.gridId,
  };
}

@Injectable()
export class PostgresSocialSource implements SocialSource {
  readonly name = 'postgres-social';
  private readonly logger = new Logger(PostgresSocialSource.name);

  constructor(
    @InjectRepository(SocialPostEntity)
    private readonly repository: Repository<SocialPostEntity>,
    @Inject(sourcesConfig.KEY)
    private readonly config: ConfigType<typeof sourcesConfig>,
  ) {}

  async fetch(category: string, bounds: BoundingBox, windowDays?: number): Promise<SocialSignal[]> {
    const rows = await withRetry(
      () => {
        const builder = this.repository
          .createQueryBuilder('post')
          .where('LOWER(post.category) = :category', { category: category.toLowerCase() })
          .andWhere(
            '((post.lat >= :south AND post.lat < :north AND post.lon >= :west AND post.lon < :east)' +
              ' OR (post.lat IS NULL AND post.gridId IS NOT NULL))',
            { ...bounds },
          );
        if (windowDays && windowDays > 0) {
          builder.andWhere('post.timestamp >= :since', {
            since: new Date(Date.now() - windowDays * DAY_MS),
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

    const signals: SocialSignal[] = [];
    let skipped = 0;
    for (const row of rows) {
      const signal = toSocialSignal(row);
      if (signal) {
        signals.push(signal);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} post(s) with an unknown signal type`);
    }
    return signals;
  }
}
