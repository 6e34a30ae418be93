import { BoundingBox, Coordinate } from '../../common/interfaces/geo.interface';

/**
 * One cell of a region lattice. Cells are created by the partitioner and never
 * mutated afterwards.
 */
export interface GridCell {
  readonly id: string;
  readonly region: string;
  readonly row: number;
  readonly col: number;
  readonly center: Coordinate;
  readonly bounds: BoundingBox;
  readonly areaM2: number;
}

export interface RegionDefinition {
  name: string;
  displayName?: string;
  bounds: BoundingBox;
  cellSizeM?: number;
}

export interface RegionSummary {
  name: string;
  displayName: string;
  bounds: BoundingBox;
  cellSizeM: number;
  rows: number;
  cols: number;
  cellCount: number;
}
