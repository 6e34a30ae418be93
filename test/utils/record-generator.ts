import { faker } from '@faker-js/faker';
import { Coordinate } from '../../src/common/interfaces/geo.interface';
import { BusinessRecord, SocialSignal } from '../../src/common/interfaces/records.interface';
import {
  BusinessEnvironmentVector,
  DensityFeatures,
} from '../../src/environment/interfaces/bev.interface';

const NO_DENSITY: DensityFeatures = {
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

export class RecordGenerator {
  /**
   * Generate a business with random name and rating at `location`
   */
  static business(
    location: Coordinate,
    overrides: Partial<BusinessRecord> = {},
  ): BusinessRecord {
    return {
      id: faker.string.uuid(),
      name: faker.company.name(),
      category: 'gym',
      location,
      rating: faker.number.float({ min: 3, max: 5, fractionDigits: 1 }),
      reviewCount: faker.number.int({ min: 1, max: 400 }),
      ...overrides,
    };
  }

  /**
   * Generate a social post at `location`, dated within the last week of `now`
   */
  static signal(
    location: Coordinate,
    overrides: Partial<SocialSignal> = {},
    now = new Date(),
  ): SocialSignal {
    return {
      id: faker.string.uuid(),
      category: 'gym',
      text: faker.lorem.sentence(),
      timestamp: faker.date.recent({ days: 7, refDate: now }),
      location,
      signalType: 'demand',
      engagementScore: faker.number.int({ min: 0, max: 500 }),
      ...overrides,
    };
  }

  /**
   * Build a BEV with zeroed densities and no landmarks in range
   */
  static bev(
    overrides: {
      density?: Partial<DensityFeatures>;
      transitWithin500m?: boolean;
      point?: Coordinate;
    } = {},
  ): BusinessEnvironmentVector {
    const transit = overrides.transitWithin500m ? 200 : null;

    return {
      point: overrides.point ?? { lat: 24.82, lon: 67.03 },
      radiusM: 1000,
      density: { ...NO_DENSITY, ...overrides.density },
      distance: {
        mall: null,
        cinema: null,
        university: null,
        hospital: null,
        transit,
        park: null,
        mainRoad: transit === null ? null : 150,
      },
      economic: {
        avgRating: 4.1,
        avgReviewCount: 85,
        totalBusinesses: 12,
        premiumCount: 2,
        economyCount: 6,
        premiumRatio: 0.33,
        incomeLevel: 'mid',
        competitionDensity: 0.0004,
      },
      flags: {
        mallWithin1km: false,
        universityWithin1km: false,
        transitWithin500m: overrides.transitWithin500m ?? false,
        parkWithin500m: false,
      },
      generatedAt: new Date('2026-01-15T10:00:00Z'),
    };
  }
}
