import { Inject, Injectable, Logger } from '@nestjs/common';
import { Coordinate } from '../common/interfaces/geo.interface';
import { BusinessRecord } from '../common/interfaces/records.interface';
import { haversineMeters } from '../common/utils/geo.util';
import { round } from '../common/utils/math.util';
import { Facts } from '../scoring/interfaces/rule.interface';
import { BUSINESS_SOURCE, BusinessSource } from '../sources/interfaces/source.interface';
import {
  BusinessEnvironmentVector,
  DENSITY_BUCKETS,
  DensityFeatures,
  DistanceFeatures,
  EconomicFeatures,
  IncomeLevel,
  LANDMARKS,
  PlaceBucketCatalog,
  ProximityFlags,
} from './interfaces/bev.interface';
import { PLACE_BUCKETS } from './place-bucket.catalog';

const INCOME_THRESHOLDS: ReadonlyArray<{ level: IncomeLevel; avgRating: number; premiumRatio: number }> = [
  { level: 'high', avgRating: 4.3, premiumRatio: 0.4 },
  { level: 'mid', avgRating: 3.8, premiumRatio: 0.2 },
];

// Main roads are assumed to run just short of the nearest transit stop
const MAIN_ROAD_OFFSET_M = 50;
const MAIN_ROAD_MIN_M = 50;

export interface GeneratedEnvironment {
  bev: BusinessEnvironmentVector;
  /** Businesses the vector was derived from. */
  records: BusinessRecord[];
}

/**
 * Builds a Business Environment Vector for an arbitrary point from the
 * businesses within a search radius.
 */
@Injectable()
export class BevGeneratorService {
  private readonly logger = new Logger(BevGeneratorService.name);

  constructor(
    @Inject(BUSINESS_SOURCE)
    private readonly businesses: BusinessSource,
    @Inject(PLACE_BUCKETS)
    private readonly catalog: PlaceBucketCatalog,
  ) {}

  async generate(point: Coordinate, radiusM: number): Promise<GeneratedEnvironment> {
    const records = await this.businesses.fetch({ kind: 'radius', center: point, radiusM });
    const bev = this.build(point, radiusM, records);

    this.logger.debug(
      `BEV at (${point.lat}, ${point.lon}) r=${radiusM}m from ${records.length} business(es)`,
    );
    return { bev, records };
  }

  build(point: Coordinate, radiusM: number, records: readonly BusinessRecord[]): BusinessEnvironmentVector {
    const distance = this.distances(point, records);
    return {
      point: { ...point },
      radiusM,
      density: this.densities(records),
      distance,
      economic: this.economics(records, radiusM),
      flags: flagsFor(distance),
      generatedAt: new Date(),
    };
  }

  /**
   * Flattens the vector into the dot-keyed facts the rule tables read.
   */
  toFacts(bev: BusinessEnvironmentVector): Facts {
    const facts: Record<string, number | string | boolean | null> = {};

    for (const bucket of DENSITY_BUCKETS) {
      facts[`density.${bucket}`] = bev.density[bucket];
    }
    for (const [landmark, metres] of Object.entries(bev.distance)) {
      facts[`distance.${landmark}`] = metres;
    }
    for (const [key, value] of Object.entries(bev.economic)) {
      facts[`economic.${key}`] = value;
    }
    for (const [key, value] of Object.entries(bev.flags)) {
      facts[`flags.${key}`] = value;
    }
    facts.radiusM = bev.radiusM;

    return facts;
  }

  private densities(records: readonly BusinessRecord[]): DensityFeatures {
    const density = emptyDensity();

    for (const record of records) {
      const types = typesOf(record);
      const category = record.category.toLowerCase();
      for (const bucket of DENSITY_BUCKETS) {
        const definition = this.catalog.density.get(bucket);
        if (!definition) {
          continue;
        }
        if (definition.categories.has(category) || types.some(type => definition.types.has(type))) {
          density[bucket]++;
        }
      }
    }

    return density;
  }

  private distances(point: Coordinate, records: readonly BusinessRecord[]): DistanceFeatures {
    const distance: DistanceFeatures = {
      mall: null,
      cinema: null,
      university: null,
      hospital: null,
      transit: null,
      park: null,
      mainRoad: null,
    };

    for (const record of records) {
      const types = typesOf(record);
      if (types.length === 0) {
        continue;
      }
      const metres = round(haversineMeters(point, record.location), 1);

      for (const landmark of LANDMARKS) {
        const landmarkTypes = this.catalog.landmarks.get(landmark);
        if (!landmarkTypes || !types.some(type => landmarkTypes.has(type))) {
          continue;
        }
        const current = distance[landmark];
        if (current === null || metres < current) {
          distance[landmark] = metres;
        }
      }
    }

    if (distance.transit !== null) {
      distance.mainRoad = Math.max(MAIN_ROAD_MIN_M, distance.transit - MAIN_ROAD_OFFSET_M);
    }
    return distance;
  }

  private economics(records: readonly BusinessRecord[], radiusM: number): EconomicFeatures {
    const ratings = records
      .map(record => record.rating)
      .filter((rating): rating is number => rating !== null && rating > 0);
    const reviewCounts = records.map(record => record.reviewCount).filter(count => count > 0);

    let premiumCount = 0;
    let economyCount = 0;
    for (const record of records) {
      if (record.priceLevel === undefined || record.priceLevel === null) {
        continue;
      }
      if (record.priceLevel >= 3) {
        premiumCount++;
      } else {
        economyCount++;
      }
    }

    const avgRating = ratings.length > 0 ? round(mean(ratings), 2) : null;
    const premiumRatio =
      economyCount > 0 ? round(premiumCount / economyCount, 2) : premiumCount > 0 ? 2 : 0;
    const area100m2 = (Math.PI * radiusM * radiusM) / 100;

    return {
      avgRating,
      avgReviewCount: reviewCounts.length > 0 ? round(mean(reviewCounts), 1) : 0,
      totalBusinesses: records.length,
      premiumCount,
      economyCount,
      premiumRatio,
      incomeLevel: incomeLevel(avgRating ?? 0, premiumRatio),
      competitionDensity: area100m2 > 0 ? round(records.length / area100m2, 4) : 0,
    };
  }
}

export function incomeLevel(avgRating: number, premiumRatio: number): IncomeLevel {
  const match = INCOME_THRESHOLDS.find(
    threshold => avgRating >= threshold.avgRating && premiumRatio >= threshold.premiumRatio,
  );
  return match ? match.level : 'low';
}

function flagsFor(distance: DistanceFeatures): ProximityFlags {
  const within = (metres: number | null, limit: number) => metres !== null && metres <= limit;
  return {
    mallWithin1km: within(distance.mall, 1000),
    universityWithin1km: within(distance.university, 1000),
    transitWithin500m: within(distance.transit, 500),
    parkWithin500m: within(distance.park, 500),
  };
}

function typesOf(record: BusinessRecord): string[] {
  return (record.types ?? []).map(type => type.toLowerCase());
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function emptyDensity(): DensityFeatures {
  return {
    restaurants: 0,
    cafes: 0,
    bakeries: 0,
    bars: 0,
    gyms: 0,
    spas: 0,
    healthcare: 0,
    schools: 0,
    universities: 0,
    training_centers: 0,
    offices: 0,
    malls: 0,
    stores: 0,
    banks: 0,
    cinemas: 0,
    parks: 0,
    transit_stations: 0,
    gas_stations: 0,
    residential: 0,
  };
}
