import { Coordinate } from '../../common/interfaces/geo.interface';

export const DENSITY_BUCKETS = [
  'restaurants',
  'cafes',
  'bakeries',
  'bars',
  'gyms',
  'spas',
  'healthcare',
  'schools',
  'universities',
  'training_centers',
  'offices',
  'malls',
  'stores',
  'banks',
  'cinemas',
  'parks',
  'transit_stations',
  'gas_stations',
  'residential',
] as const;

export type DensityBucket = (typeof DENSITY_BUCKETS)[number];

export const LANDMARKS = ['mall', 'cinema', 'university', 'hospital', 'transit', 'park'] as const;

export type Landmark = (typeof LANDMARKS)[number];

export type DensityFeatures = Record<DensityBucket, number>;

/** Metres to the nearest instance; null when none was found in range. */
export type DistanceFeatures = Record<Landmark | 'mainRoad', number | null>;

export type IncomeLevel = 'high' | 'mid' | 'low';

export interface EconomicFeatures {
  avgRating: number | null;
  avgReviewCount: number;
  totalBusinesses: number;
  premiumCount: number;
  economyCount: number;
  premiumRatio: number;
  incomeLevel: IncomeLevel;
  /** Businesses per 100 m² of the search circle. */
  competitionDensity: number;
}

export interface ProximityFlags {
  mallWithin1km: boolean;
  universityWithin1km: boolean;
  transitWithin500m: boolean;
  parkWithin500m: boolean;
}

export interface BusinessEnvironmentVector {
  point: Coordinate;
  radiusM: number;
  density: DensityFeatures;
  distance: DistanceFeatures;
  economic: EconomicFeatures;
  flags: ProximityFlags;
  generatedAt: Date;
}

export interface PlaceBucket {
  types: ReadonlySet<string>;
  categories: ReadonlySet<string>;
}

export interface PlaceBucketCatalog {
  density: ReadonlyMap<DensityBucket, PlaceBucket>;
  landmarks: ReadonlyMap<Landmark, ReadonlySet<string>>;
}
