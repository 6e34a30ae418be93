import { registerAs } from '@nestjs/config';
import * as path from 'path';
import { intFromEnv, stringFromEnv } from './env.util';

export type DataSourceKind = 'memory' | 'postgres';

export function dataSourceKind(): DataSourceKind {
  return stringFromEnv('DATA_SOURCE', 'memory') === 'postgres' ? 'postgres' : 'memory';
}

export default registerAs('sources', () => ({
  kind: dataSourceKind(),
  // Dataset served by the in-memory sources
  datasetFile: path.resolve(process.cwd(), stringFromEnv('DATASET_FILE', 'data/dataset.json')),
  placeBucketsFile: path.resolve(
    process.cwd(),
    stringFromEnv('PLACE_BUCKETS_FILE', 'data/place-buckets.json'),
  ),

  // Retry policy of the collaborators
  maxRetries: intFromEnv('SOURCE_MAX_RETRIES', 3),
  retryDelayMs: intFromEnv('SOURCE_RETRY_DELAY_MS', 200),
  maxRetryDelayMs: intFromEnv('SOURCE_MAX_RETRY_DELAY_MS', 2000),

  postgres: {
    host: stringFromEnv('POSTGRES_HOST', 'localhost'),
    port: intFromEnv('POSTGRES_PORT', 5432),
    database: stringFromEnv('POSTGRES_DB', 'gridscout'),
    username: stringFromEnv('POSTGRES_USER', 'postgres'),
    password: process.env.POSTGRES_PASSWORD,
    ssl: process.env.POSTGRES_SSL === 'true',
  },
}));
