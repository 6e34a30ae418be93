import { Injectable, Logger } from '@nestjs/common';
import { Coordinate } from '../common/interfaces/geo.interface';
import { containsPoint } from '../common/utils/geo.util';
import { GridCell } from './interfaces/grid.interface';

export interface Locatable {
  gridId?: string | null;
  location?: Coordinate | null;
}

/**
 * Maps coordinates to grid cells. A cell owns its south and west edges; its
 * north and east edges belong to the neighbouring cell.
 */
@Injectable()
export class PointToGridAssignerService {
  private readonly logger = new Logger(PointToGridAssignerService.name);

  assign(point: Coordinate, cells: readonly GridCell[]): GridCell | null {
    for (const cell of cells) {
      if (containsPoint(cell.bounds, point)) {
        return cell;
      }
    }

    this.logger.debug(`Point (${point.lat}, ${point.lon}) is outside all ${cells.length} cells`);
    return null;
  }

  /**
   * Tags records that carry no grid assignment. Records already assigned and
   * records without a location are returned unchanged.
   */
  assignAll<T extends Locatable>(records: readonly T[], cells: readonly GridCell[]): T[] {
    let assigned = 0;
    let outside = 0;

    const tagged = records.map(record => {
      if (record.gridId || !record.location) {
        return record;
      }
      const cell = this.assign(record.location, cells);
      if (cell) {
        assigned++;
      } else {
        outside++;
      }
      return { ...record, gridId: cell ? cell.id : null };
    });

    if (assigned > 0 || outside > 0) {
      this.logger.debug(`Assigned ${assigned} record(s) to grids, ${outside} outside the region`);
    }
    return tagged;
  }
}
