import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import gridConfig from '../config/grid.config';
import { ConfigurationError, NotFoundError } from '../common/errors';
import { BoundingBox } from '../common/interfaces/geo.interface';
import { isFiniteNumber, isRecord, readJsonFile } from '../common/utils/json.util';
import { errorMessage } from '../common/utils/error.util';
import { GridIndex } from './grid-index';
import { GridPartitionerService } from './grid-partitioner.service';
import { GridCell, RegionDefinition, RegionSummary } from './interfaces/grid.interface';

export function parseRegionDefinitions(raw: unknown): RegionDefinition[] {
  const list = isRecord(raw) && Array.isArray(raw.regions) ? raw.regions : raw;
  if (!Array.isArray(list)) {
    throw new ConfigurationError('Region catalogue must be an array or { "regions": [...] }');
  }

  return list.map((entry, position) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || !isRecord(entry.bounds)) {
      throw new ConfigurationError(`Region entry #${position} needs a name and bounds`);
    }
    const { north, south, east, west } = entry.bounds;
    if (![north, south, east, west].every(isFiniteNumber)) {
      throw new ConfigurationError(`Region '${entry.name}' has non-numeric bounds`);
    }
    const bounds: BoundingBox = {
      north: Number(north),
      south: Number(south),
      east: Number(east),
      west: Number(west),
    };
    return {
      name: entry.name,
      displayName: typeof entry.displayName === 'string' ? entry.displayName : undefined,
      bounds,
      cellSizeM: isFiniteNumber(entry.cellSizeM) ? entry.cellSizeM : undefined,
    };
  });
}

/**
 * Owns the validated grid partitions. Sweeps borrow an immutable index through
 * {@link withRegion}; {@link reload} swaps the whole set only when no sweep is
 * in flight.
 */
@Injectable()
export class GridStoreService implements OnModuleInit {
  private readonly logger = new Logger(GridStoreService.name);
  private indexes: ReadonlyMap<string, GridIndex> = new Map();
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];
  private reloading: Promise<void> | null = null;

  constructor(
    @Inject(gridConfig.KEY)
    private readonly config: ConfigType<typeof gridConfig>,
    private readonly partitioner: GridPartitionerService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.reload();
  }

  /**
   * Rebuilds every region. Definitions default to the configured regions file.
   */
  async reload(definitions?: RegionDefinition[]): Promise<void> {
    while (this.reloading) {
      await this.reloading;
    }

    const run = (async () => {
      const defs = definitions ?? this.readDefinitions();
      const next = this.buildIndexes(defs);
      await this.waitForIdle();
      this.indexes = next;
      this.logger.log(`Loaded ${next.size} region(s): ${[...next.keys()].join(', ') || 'none'}`);
    })();

    // The gate settles either way; the failure itself goes to this caller
    this.reloading = run.catch(() => undefined);
    try {
      await run;
    } finally {
      this.reloading = null;
    }
  }

  load(region: string): readonly GridCell[] {
    return this.getIndex(region).cells;
  }

  getIndex(region: string): GridIndex {
    const index = this.indexes.get(region);
    if (!index) {
      throw new NotFoundError('region', region);
    }
    return index;
  }

  findCell(gridId: string): { index: GridIndex; cell: GridCell } {
    for (const index of this.indexes.values()) {
      const cell = index.get(gridId);
      if (cell) {
        return { index, cell };
      }
    }
    throw new NotFoundError('grid', gridId);
  }

  listRegions(): RegionSummary[] {
    return [...this.indexes.values()].map(index => index.summary());
  }

  snapshot(): GridIndex[] {
    return [...this.indexes.values()];
  }

  /**
   * Runs `work` against the current index of `region`, counting it as in
   * flight so a concurrent reload waits for it.
   */
  async withRegion<T>(region: string, work: (index: GridIndex) => Promise<T>): Promise<T> {
    while (this.reloading) {
      await this.reloading;
    }

    const index = this.getIndex(region);
    this.inFlight++;
    try {
      return await work(index);
    } finally {
      this.inFlight--;
      if (this.inFlight === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
      }
    }
  }

  get sweepsInFlight(): number {
    return this.inFlight;
  }

  private waitForIdle(): Promise<void> {
    if (this.inFlight === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private readDefinitions(): RegionDefinition[] {
    let raw: unknown;
    try {
      raw = readJsonFile(this.config.regionsFile);
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read regions file ${this.config.regionsFile}: ${errorMessage(error)}`,
      );
    }
    return parseRegionDefinitions(raw);
  }

  private buildIndexes(definitions: RegionDefinition[]): Map<string, GridIndex> {
    const indexes = new Map<string, GridIndex>();

    for (const definition of definitions) {
      if (indexes.has(definition.name)) {
        throw new ConfigurationError(`Region '${definition.name}' is defined twice`);
      }
      const cellSizeM = definition.cellSizeM ?? this.config.defaultCellSizeM;
      const cells = this.partitioner.partition(definition.name, definition.bounds, cellSizeM);
      this.partitioner.validatePartition(definition.name, cells, definition.bounds);

      indexes.set(
        definition.name,
        new GridIndex(
          definition.name,
          definition.displayName ?? definition.name,
          definition.bounds,
          cellSizeM,
          cells,
        ),
      );
    }

    return indexes;
  }
}
