import { Inject, Injectable } from '@nestjs/common';
import { BusinessRecord } from '../../common/interfaces/records.interface';
import { containsPoint, haversineMeters } from '../../common/utils/geo.util';
import { BusinessQuery, BusinessSource } from '../interfaces/source.interface';
import { IN_MEMORY_DATASET, InMemoryDataset } from './dataset.loader';

@Injectable()
export class InMemoryBusinessSource implements BusinessSource {
  readonly name = 'memory-businesses';

  constructor(@Inject(IN_MEMORY_DATASET) private readonly dataset: InMemoryDataset) {}

  async fetch(query: BusinessQuery): Promise<BusinessRecord[]> {
    const category = query.category?.toLowerCase();

    return this.dataset.businesses.filter(business => {
      if (category && business.category.toLowerCase() !== category) {
        return false;
      }
      return query.kind === 'bounds'
        ? containsPoint(query.bounds, business.location)
        : haversineMeters(query.center, business.location) <= query.radiusM;
    });
  }
}
