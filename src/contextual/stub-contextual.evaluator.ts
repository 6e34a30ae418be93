import { Injectable } from '@nestjs/common';
import { ContextualEvaluatorError } from '../common/errors';
import { clamp, round } from '../common/utils/math.util';
import { BusinessEnvironmentVector, DensityBucket } from '../environment/interfaces/bev.interface';
import { ContextualAssessment, ContextualEvaluator } from './interfaces/contextual.interface';

interface CategoryProfile {
  drivers: DensityBucket[];
  competitors: DensityBucket;
  competitorPenalty: number;
}

const PROFILES: Readonly<Record<string, CategoryProfile>> = {
  gym: { drivers: ['offices', 'residential', 'universities'], competitors: 'gyms', competitorPenalty: 0.05 },
  cafe: { drivers: ['offices', 'universities', 'malls'], competitors: 'cafes', competitorPenalty: 0.03 },
};

const BASE_PROBABILITY = 0.4;
const DRIVER_STEP = 0.01;
const DRIVER_CAP = 20;
const COMPETITOR_CAP = 5;
const TRANSIT_BONUS = 0.05;

/**
 * Deterministic evaluator for local runs and tests: demand drivers push the
 * probability up, same-category competitors pull it down.
 */
@Injectable()
export class StubContextualEvaluator implements ContextualEvaluator {
  readonly name = 'stub';

  async assess(
    bev: BusinessEnvironmentVector,
    categories: readonly string[],
    signal?: AbortSignal,
  ): Promise<ContextualAssessment> {
    if (signal?.aborted) {
      throw new ContextualEvaluatorError('Contextual assessment cancelled');
    }

    const assessment: ContextualAssessment = {
      probabilities: {},
      reasoning: {},
      keyFactors: [],
      risks: [],
      model: this.name,
    };

    for (const category of categories) {
      const profile = PROFILES[category.toLowerCase()];
      if (!profile) {
        assessment.probabilities[category] = 0.5;
        assessment.reasoning[category] = `No profile for ${category}; neutral estimate`;
        continue;
      }

      const drivers = profile.drivers.reduce((sum, bucket) => sum + bev.density[bucket], 0);
      const competitors = bev.density[profile.competitors];
      let probability =
        BASE_PROBABILITY +
        DRIVER_STEP * Math.min(drivers, DRIVER_CAP) -
        profile.competitorPenalty * Math.min(competitors, COMPETITOR_CAP);
      if (bev.flags.transitWithin500m) {
        probability += TRANSIT_BONUS;
      }

      assessment.probabilities[category] = round(clamp(probability), 4);
      assessment.reasoning[category] =
        `${drivers} demand driver(s) and ${competitors} competitor(s) within ${bev.radiusM}m`;
    }

    if (bev.flags.transitWithin500m) {
      assessment.keyFactors.push('Transit within 500m');
    }
    if (bev.economic.incomeLevel === 'high') {
      assessment.keyFactors.push('High income area');
    }
    if (bev.economic.totalBusinesses === 0) {
      assessment.risks.push('No established businesses nearby');
    }

    return assessment;
  }
}
