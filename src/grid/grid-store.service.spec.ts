import { Test, TestingModule } from '@nestjs/testing';
import * as path from 'path';
import gridConfig from '../config/grid.config';
import { ConfigurationError, NotFoundError } from '../common/errors';
import { GridPartitionerService } from './grid-partitioner.service';
import { GridStoreService, parseRegionDefinitions } from './grid-store.service';
import { RegionDefinition } from './interfaces/grid.interface';

describe('GridStoreService', () => {
  let store: GridStoreService;

  const testTown: RegionDefinition = {
    name: 'test-town',
    bounds: { north: 24.822655, south: 24.82, east: 67.0329197, west: 67.03 },
    cellSizeM: 100,
  };
  const harbour: RegionDefinition = {
    name: 'harbour',
    displayName: 'Harbour',
    bounds: { north: 24.8118, south: 24.81, east: 67.0218, west: 67.02 },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GridPartitionerService,
        GridStoreService,
        {
          provide: gridConfig.KEY,
          useValue: {
            regionsFile: path.resolve(__dirname, '../../test/fixtures/regions.json'),
            defaultCellSizeM: 100,
            minCellSizeM: 50,
            maxCellSizeM: 150,
          },
        },
      ],
    }).compile();

    store = module.get<GridStoreService>(GridStoreService);
  });

  it('should load the configured regions file on init', async () => {
    await store.onModuleInit();

    expect(store.listRegions()).toEqual([
      {
        name: 'test-town',
        displayName: 'Test Town',
        bounds: { north: 24.822655, south: 24.82, east: 67.0329197, west: 67.03 },
        cellSizeM: 100,
        rows: 3,
        cols: 3,
        cellCount: 9,
      },
    ]);
  });

  it('should raise NotFoundError for an unknown region', async () => {
    await store.reload([testTown]);

    expect(() => store.load('atlantis')).toThrow(NotFoundError);
    expect(() => store.findCell('atlantis-000-000')).toThrow("Unknown grid 'atlantis-000-000'");
  });

  it('should find a cell and its region by grid id', async () => {
    await store.reload([testTown, harbour]);

    const { index, cell } = store.findCell('harbour-001-000');

    expect(index.region).toBe('harbour');
    expect(cell.row).toBe(1);
    expect(cell.col).toBe(0);
  });

  it('should fall back to the default cell size', async () => {
    await store.reload([harbour]);

    expect(store.getIndex('harbour').cellSizeM).toBe(100);
  });

  it('should reject duplicate region names', async () => {
    await expect(store.reload([testTown, testTown])).rejects.toThrow(ConfigurationError);
  });

  it('should keep the previous regions when a reload fails', async () => {
    await store.reload([testTown]);

    await expect(
      store.reload([{ ...harbour, bounds: { ...harbour.bounds, north: harbour.bounds.south } }]),
    ).rejects.toThrow(ConfigurationError);
    expect(store.load('test-town')).toHaveLength(9);
  });

  it('should wait for in-flight sweeps before swapping regions', async () => {
    await store.reload([testTown]);

    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const sweep = store.withRegion('test-town', async index => {
      await gate;
      return index.size;
    });

    const reload = store.reload([harbour]);
    await new Promise(resolve => setImmediate(resolve));

    expect(store.sweepsInFlight).toBe(1);
    expect(store.listRegions().map(region => region.name)).toEqual(['test-town']);

    release();
    await expect(sweep).resolves.toBe(9);
    await reload;

    expect(store.listRegions().map(region => region.name)).toEqual(['harbour']);
    expect(store.sweepsInFlight).toBe(0);
  });

  it('should hold new sweeps until a reload completes', async () => {
    await store.reload([testTown]);

    const reload = store.reload([testTown, harbour]);
    const sweep = store.withRegion('harbour', async index => index.region);

    await reload;
    await expect(sweep).resolves.toBe('harbour');
  });

  describe('parseRegionDefinitions', () => {
    it('should accept a bare array', () => {
      expect(parseRegionDefinitions([testTown])).toEqual([
        { ...testTown, displayName: undefined },
      ]);
    });

    it('should reject entries without bounds', () => {
      expect(() => parseRegionDefinitions([{ name: 'x' }])).toThrow(
        'Region entry #0 needs a name and bounds',
      );
    });

    it('should reject non-numeric bounds', () => {
      expect(() =>
        parseRegionDefinitions({
          regions: [{ name: 'x', bounds: { north: '1', south: 0, east: 1, west: 0 } }],
        }),
      ).toThrow("Region 'x' has non-numeric bounds");
    });
  });
});
