import { ConfigurationError } from '../common/errors';
import { errorMessage } from '../common/utils/error.util';
import { isRecord, readJsonFile } from '../common/utils/json.util';
import {
  DENSITY_BUCKETS,
  DensityBucket,
  LANDMARKS,
  Landmark,
  PlaceBucket,
  PlaceBucketCatalog,
} from './interfaces/bev.interface';

export const PLACE_BUCKETS = 'PLACE_BUCKETS';

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigurationError(`${where} must be a list of strings`);
  }
  return value.map(item => String(item).toLowerCase());
}

export function parsePlaceBucketCatalog(raw: unknown): PlaceBucketCatalog {
  if (!isRecord(raw) || !isRecord(raw.density) || !isRecord(raw.landmarks)) {
    throw new ConfigurationError('Place bucket catalog needs density and landmarks sections');
  }
  const density = raw.density;
  const landmarks = raw.landmarks;

  const buckets = new Map<DensityBucket, PlaceBucket>();
  for (const bucket of DENSITY_BUCKETS) {
    const entry = density[bucket];
    if (!isRecord(entry)) {
      throw new ConfigurationError(`Place bucket '${bucket}' is missing`);
    }
    buckets.set(bucket, {
      types: new Set(stringList(entry.types, `density.${bucket}.types`)),
      categories: new Set(stringList(entry.categories ?? [], `density.${bucket}.categories`)),
    });
  }

  const landmarkTypes = new Map<Landmark, ReadonlySet<string>>();
  for (const landmark of LANDMARKS) {
    landmarkTypes.set(landmark, new Set(stringList(landmarks[landmark], `landmarks.${landmark}`)));
  }

  return { density: buckets, landmarks: landmarkTypes };
}

export function loadPlaceBucketCatalog(file: string): PlaceBucketCatalog {
  let raw: unknown;
  try {
    raw = readJsonFile(file);
  } catch (error) {
    throw new ConfigurationError(`Cannot read place buckets ${file}: ${errorMessage(error)}`);
  }
  return parsePlaceBucketCatalog(raw);
}
