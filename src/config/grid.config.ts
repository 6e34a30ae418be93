import { registerAs } from '@nestjs/config';
import * as path from 'path';
import { intFromEnv, stringFromEnv } from './env.util';

export default registerAs('grid', () => ({
  // Region catalogue (name, bounds, optional cell size)
  regionsFile: path.resolve(process.cwd(), stringFromEnv('REGIONS_FILE', 'data/regions.json')),
  defaultCellSizeM: intFromEnv('GRID_CELL_SIZE_M', 100),
  minCellSizeM: 50,
  maxCellSizeM: 150,
}));
