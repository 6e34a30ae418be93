import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import gridConfig from '../config/grid.config';
import { ConfigurationError, DataIntegrityError } from '../common/errors';
import { BoundingBox } from '../common/interfaces/geo.interface';
import { boundsAreaM2, centerOf, metersToDegrees } from '../common/utils/geo.util';
import { isFiniteNumber } from '../common/utils/json.util';
import { GridCell } from './interfaces/grid.interface';

// Absorbs floating point noise when the span is an exact multiple of the step
const STEP_EPSILON = 1e-9;
// Edge tolerance for externally built partitions, in degrees (~0.1 mm)
const EDGE_TOLERANCE = 1e-9;

export function formatGridId(region: string, row: number, col: number): string {
  return `${region}-${String(row).padStart(3, '0')}-${String(col).padStart(3, '0')}`;
}

/**
 * Splits a region rectangle into a regular lattice of cells roughly
 * `cellSizeM` metres on a side.
 */
@Injectable()
export class GridPartitionerService {
  private readonly logger = new Logger(GridPartitionerService.name);

  constructor(
    @Inject(gridConfig.KEY)
    private readonly config: ConfigType<typeof gridConfig>,
  ) {}

  partition(
    region: string,
    bounds: BoundingBox,
    cellSizeM: number = this.config.defaultCellSizeM,
  ): GridCell[] {
    this.assertValid(region, bounds, cellSizeM);

    const step = metersToDegrees(cellSizeM, centerOf(bounds).lat);
    const rows = Math.max(1, Math.ceil((bounds.north - bounds.south) / step.lat - STEP_EPSILON));
    const cols = Math.max(1, Math.ceil((bounds.east - bounds.west) / step.lon - STEP_EPSILON));

    const cells: GridCell[] = [];
    for (let row = 0; row < rows; row++) {
      const south = bounds.south + row * step.lat;
      const north = row === rows - 1 ? bounds.north : bounds.south + (row + 1) * step.lat;

      for (let col = 0; col < cols; col++) {
        const west = bounds.west + col * step.lon;
        const east = col === cols - 1 ? bounds.east : bounds.west + (col + 1) * step.lon;
        const cellBounds: BoundingBox = { north, south, east, west };

        cells.push(
          Object.freeze({
            id: formatGridId(region, row, col),
            region,
            row,
            col,
            center: Object.freeze(centerOf(cellBounds)),
            bounds: Object.freeze(cellBounds),
            areaM2: boundsAreaM2(cellBounds),
          }),
        );
      }
    }

    this.logger.log(
      `Partitioned region '${region}' into ${rows}x${cols} cells of ~${cellSizeM}m`,
    );
    return cells;
  }

  /**
   * Checks that `cells` tile `bounds` exactly: a full row/col lattice whose
   * rows and columns abut without gaps or overlaps and meet the region edges.
   */
  validatePartition(region: string, cells: readonly GridCell[], bounds: BoundingBox): void {
    if (cells.length === 0) {
      throw new DataIntegrityError(`Region '${region}' has no grid cells`);
    }

    const ids = new Set<string>();
    const rows = new Map<number, GridCell[]>();
    const cols = new Map<number, GridCell[]>();
    for (const cell of cells) {
      if (ids.has(cell.id)) {
        throw new DataIntegrityError(`Duplicate grid cell '${cell.id}' in region '${region}'`);
      }
      ids.add(cell.id);
      addToBand(rows, cell.row, cell);
      addToBand(cols, cell.col, cell);
    }

    if (rows.size * cols.size !== cells.length) {
      throw new DataIntegrityError(
        `Region '${region}' is not a full lattice: ${cells.length} cells for ${rows.size} rows x ${cols.size} cols`,
      );
    }

    this.checkAxis(region, 'row', rows, bounds.south, bounds.north, cell => [
      cell.bounds.south,
      cell.bounds.north,
    ]);
    this.checkAxis(region, 'col', cols, bounds.west, bounds.east, cell => [
      cell.bounds.west,
      cell.bounds.east,
    ]);
  }

  private checkAxis(
    region: string,
    axis: 'row' | 'col',
    bands: Map<number, GridCell[]>,
    start: number,
    end: number,
    edges: (cell: GridCell) => [number, number],
  ): void {
    let expectedLow = start;

    for (let band = 0; band < bands.size; band++) {
      const members = bands.get(band);
      if (!members) {
        throw new DataIntegrityError(`Region '${region}' is missing ${axis} ${band}`);
      }

      const [low, high] = edges(members[0]);
      for (const cell of members) {
        const [cellLow, cellHigh] = edges(cell);
        if (!near(cellLow, low) || !near(cellHigh, high)) {
          throw new DataIntegrityError(`Cell '${cell.id}' is misaligned with its ${axis}`);
        }
      }

      if (high <= low) {
        throw new DataIntegrityError(`Region '${region}' has an empty ${axis} ${band}`);
      }
      if (!near(low, expectedLow)) {
        const kind = low > expectedLow ? 'a gap' : 'an overlap';
        throw new DataIntegrityError(`Region '${region}' has ${kind} before ${axis} ${band}`);
      }
      expectedLow = high;
    }

    if (!near(expectedLow, end)) {
      const kind = expectedLow < end ? 'a gap' : 'an overlap';
      throw new DataIntegrityError(`Region '${region}' has ${kind} at its last ${axis}`);
    }
  }

  private assertValid(region: string, bounds: BoundingBox, cellSizeM: number): void {
    if (!region) {
      throw new ConfigurationError('Region name is required');
    }

    const { minCellSizeM, maxCellSizeM } = this.config;
    if (!isFiniteNumber(cellSizeM) || cellSizeM < minCellSizeM || cellSizeM > maxCellSizeM) {
      throw new ConfigurationError(
        `Cell size ${cellSizeM}m for region '${region}' is outside ${minCellSizeM}-${maxCellSizeM}m`,
      );
    }

    const edges = [bounds.north, bounds.south, bounds.east, bounds.west];
    if (!edges.every(isFiniteNumber)) {
      throw new ConfigurationError(`Region '${region}' has non-numeric bounds`);
    }
    if (bounds.north <= bounds.south || bounds.east <= bounds.west) {
      throw new ConfigurationError(`Region '${region}' has a degenerate bounding rectangle`);
    }
  }
}

function addToBand(bands: Map<number, GridCell[]>, key: number, cell: GridCell): void {
  const band = bands.get(key);
  if (band) {
    band.push(cell);
  } else {
    bands.set(key, [cell]);
  }
}

function near(a: number, b: number): boolean {
  return Math.abs(a - b) <= EDGE_TOLERANCE;
}
