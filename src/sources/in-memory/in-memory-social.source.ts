import { Inject, Injectable } from '@nestjs/common';
import { BoundingBox } from '../../common/interfaces/geo.interface';
import { SocialSignal } from '../../common/interfaces/records.interface';
import { containsPoint } from '../../common/utils/geo.util';
import { SocialSource } from '../interfaces/source.interface';
import { IN_MEMORY_DATASET, InMemoryDataset } from './dataset.loader';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class InMemorySocialSource implements SocialSource {
  readonly name = 'memory-social';

  constructor(@Inject(IN_MEMORY_DATASET) private readonly dataset: InMemoryDataset) {}

  /**
   * Posts without a location are kept when they already carry a grid id.
   */
  async fetch(category: string, bounds: BoundingBox, windowDays?: number): Promise<SocialSignal[]> {
    const wanted = category.toLowerCase();
    const since = windowDays && windowDays > 0 ? Date.now() - windowDays * DAY_MS : null;

    return this.dataset.signals.filter(signal => {
      if (signal.category.toLowerCase() !== wanted) {
        return false;
      }
      if (since !== null && signal.timestamp.getTime() < since) {
        return false;
      }
      return signal.location ? containsPoint(bounds, signal.location) : Boolean(signal.gridId);
    });
  }
}
