import { faker } from '@faker-js/faker';
import { ConfigurationError, DataIntegrityError } from '../common/errors';
import { BoundingBox } from '../common/interfaces/geo.interface';
import { boundsAreaM2, containsPoint, metersToDegrees } from '../common/utils/geo.util';
import { formatGridId, GridPartitionerService } from './grid-partitioner.service';

describe('GridPartitionerService', () => {
  let partitioner: GridPartitionerService;

  const step = metersToDegrees(100, 24.82);
  const threeByThree: BoundingBox = {
    south: 24.82,
    north: 24.82 + 2.95 * step.lat,
    west: 67.03,
    east: 67.03 + 2.95 * step.lon,
  };

  beforeEach(() => {
    partitioner = new GridPartitionerService({
      regionsFile: 'unused.json',
      defaultCellSizeM: 100,
      minCellSizeM: 50,
      maxCellSizeM: 150,
    });
  });

  describe('formatGridId', () => {
    it('should zero-pad row and column to three digits', () => {
      expect(formatGridId('dha', 4, 12)).toBe('dha-004-012');
    });
  });

  describe('partition', () => {
    it('should emit one cell per row and column with deterministic ids', () => {
      const cells = partitioner.partition('dha', threeByThree);

      expect(cells).toHaveLength(9);
      expect(cells.map(cell => cell.id)).toEqual([
        'dha-000-000',
        'dha-000-001',
        'dha-000-002',
        'dha-001-000',
        'dha-001-001',
        'dha-001-002',
        'dha-002-000',
        'dha-002-001',
        'dha-002-002',
      ]);
    });

    it('should clamp the last row and column to the region edges', () => {
      const cells = partitioner.partition('dha', threeByThree);
      const last = cells[cells.length - 1];

      expect(cells[0].bounds.south).toBe(threeByThree.south);
      expect(cells[0].bounds.west).toBe(threeByThree.west);
      expect(last.bounds.north).toBe(threeByThree.north);
      expect(last.bounds.east).toBe(threeByThree.east);
      expect(last.bounds.north - last.bounds.south).toBeLessThan(step.lat);
    });

    it('should centre each cell inside its bounds and report its area', () => {
      const [first] = partitioner.partition('dha', threeByThree);

      expect(containsPoint(first.bounds, first.center)).toBe(true);
      expect(first.areaM2).toBeGreaterThan(9900);
      expect(first.areaM2).toBeLessThan(10100);
    });

    it('should produce a single cell for a region smaller than one cell', () => {
      const tiny = {
        south: 24.82,
        north: 24.82 + step.lat / 4,
        west: 67.03,
        east: 67.03 + step.lon / 4,
      };

      const cells = partitioner.partition('tiny', tiny);

      expect(cells).toHaveLength(1);
      expect(cells[0].bounds).toEqual(tiny);
    });

    it('should accept the boundary cell sizes', () => {
      expect(() => partitioner.partition('dha', threeByThree, 50)).not.toThrow();
      expect(() => partitioner.partition('dha', threeByThree, 150)).not.toThrow();
    });

    it('should reject cell sizes outside 50-150m', () => {
      expect(() => partitioner.partition('dha', threeByThree, 49)).toThrow(ConfigurationError);
      expect(() => partitioner.partition('dha', threeByThree, 151)).toThrow(ConfigurationError);
    });

    it('should reject degenerate rectangles', () => {
      const flat = { ...threeByThree, north: threeByThree.south };
      const inverted = { ...threeByThree, east: threeByThree.west - 0.01 };

      expect(() => partitioner.partition('dha', flat)).toThrow(ConfigurationError);
      expect(() => partitioner.partition('dha', inverted)).toThrow(ConfigurationError);
    });
  });

  describe('validatePartition', () => {
    it('should accept its own output', () => {
      const cells = partitioner.partition('dha', threeByThree);

      expect(() => partitioner.validatePartition('dha', cells, threeByThree)).not.toThrow();
    });

    it('should reject a partition with a missing cell', () => {
      const cells = partitioner.partition('dha', threeByThree).slice(1);

      expect(() => partitioner.validatePartition('dha', cells, threeByThree)).toThrow(
        DataIntegrityError,
      );
    });

    it('should reject overlapping rows', () => {
      const cells = partitioner.partition('dha', threeByThree).map(cell =>
        cell.row === 1
          ? { ...cell, bounds: { ...cell.bounds, south: cell.bounds.south - step.lat / 2 } }
          : cell,
      );

      expect(() => partitioner.validatePartition('dha', cells, threeByThree)).toThrow(
        "Region 'dha' has an overlap before row 1",
      );
    });

    it('should reject a gap between columns', () => {
      const cells = partitioner.partition('dha', threeByThree).map(cell =>
        cell.col === 2
          ? { ...cell, bounds: { ...cell.bounds, west: cell.bounds.west + step.lon / 10 } }
          : cell,
      );

      expect(() => partitioner.validatePartition('dha', cells, threeByThree)).toThrow(
        "Region 'dha' has a gap before col 2",
      );
    });

    it('should reject a partition that stops short of the region edge', () => {
      const cells = partitioner.partition('dha', threeByThree);
      const larger = { ...threeByThree, north: threeByThree.north + step.lat };

      expect(() => partitioner.validatePartition('dha', cells, larger)).toThrow(
        "Region 'dha' has a gap at its last row",
      );
    });

    it('should reject duplicate cells', () => {
      const cells = partitioner.partition('dha', threeByThree);

      expect(() =>
        partitioner.validatePartition('dha', [...cells, cells[0]], threeByThree),
      ).toThrow("Duplicate grid cell 'dha-000-000' in region 'dha'");
    });
  });

  describe('partition properties over random sub-rectangles', () => {
    beforeAll(() => {
      faker.seed(20240611);
    });

    it('should tile every rectangle exactly and assign each interior point to one cell', () => {
      for (let run = 0; run < 25; run++) {
        const south = faker.number.float({ min: -55, max: 55 });
        const west = faker.number.float({ min: -170, max: 170 });
        const bounds: BoundingBox = {
          south,
          north: south + faker.number.float({ min: 0.001, max: 0.01 }),
          west,
          east: west + faker.number.float({ min: 0.001, max: 0.01 }),
        };
        const cellSize = faker.number.int({ min: 50, max: 150 });

        const cells = partitioner.partition(`r${run}`, bounds, cellSize);

        expect(() => partitioner.validatePartition(`r${run}`, cells, bounds)).not.toThrow();

        const total = cells.reduce((sum, cell) => sum + cell.areaM2, 0);
        expect(Math.abs(total - boundsAreaM2(bounds)) / boundsAreaM2(bounds)).toBeLessThan(0.001);

        for (let probe = 0; probe < 20; probe++) {
          const point = {
            lat: bounds.south + faker.number.float({ min: 0, max: 0.999 }) * (bounds.north - bounds.south),
            lon: bounds.west + faker.number.float({ min: 0, max: 0.999 }) * (bounds.east - bounds.west),
          };
          const owners = cells.filter(cell => containsPoint(cell.bounds, point));
          expect(owners).toHaveLength(1);
        }
      }
    });
  });
});
