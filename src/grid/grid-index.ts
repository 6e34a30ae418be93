import { BoundingBox } from '../common/interfaces/geo.interface';
import { GridCell, RegionSummary } from './interfaces/grid.interface';

/**
 * Immutable, validated cell set of one region. Built by the grid store and
 * handed to the pipeline for the duration of a request.
 */
export class GridIndex {
  readonly cells: readonly GridCell[];
  private readonly byId: ReadonlyMap<string, GridCell>;

  constructor(
    readonly region: string,
    readonly displayName: string,
    readonly bounds: BoundingBox,
    readonly cellSizeM: number,
    cells: readonly GridCell[],
  ) {
    this.cells = Object.freeze([...cells]);
    this.byId = new Map(cells.map(cell => [cell.id, cell]));
    Object.freeze(this);
  }

  get size(): number {
    return this.cells.length;
  }

  get(gridId: string): GridCell | undefined {
    return this.byId.get(gridId);
  }

  has(gridId: string): boolean {
    return this.byId.has(gridId);
  }

  get gridIds(): string[] {
    return this.cells.map(cell => cell.id);
  }

  summary(): RegionSummary {
    const rows = new Set(this.cells.map(cell => cell.row)).size;
    const cols = new Set(this.cells.map(cell => cell.col)).size;
    return {
      name: this.region,
      displayName: this.displayName,
      bounds: { ...this.bounds },
      cellSizeM: this.cellSizeM,
      rows,
      cols,
      cellCount: this.cells.length,
    };
  }
}
