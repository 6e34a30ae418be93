import { registerAs } from '@nestjs/config';
import * as path from 'path';
import { floatFromEnv, intFromEnv, listFromEnv, stringFromEnv } from './env.util';

export default registerAs('scoring', () => ({
  // Rule tables, one JSON file per table name
  rulesDir: path.resolve(process.cwd(), stringFromEnv('RULES_DIR', 'data/rules')),
  gridRuleTable: stringFromEnv('GRID_RULE_TABLE', 'grid'),
  // Categories scored by point queries; each needs a rule table
  pointCategories: listFromEnv('POINT_CATEGORIES', ['gym', 'cafe']),
  // Categories accepted by grid sweeps
  sweepCategories: listFromEnv('SWEEP_CATEGORIES', ['gym', 'cafe']),

  // Rule / contextual blend for full mode
  ruleWeight: floatFromEnv('RULE_WEIGHT', 0.65),
  contextualWeight: floatFromEnv('CONTEXTUAL_WEIGHT', 0.35),

  // Grid opportunity score weights
  opportunity: {
    supplyWeight: floatFromEnv('GOS_SUPPLY_WEIGHT', 0.4),
    instagramWeight: floatFromEnv('GOS_INSTAGRAM_WEIGHT', 0.25),
    redditWeight: floatFromEnv('GOS_REDDIT_WEIGHT', 0.35),
  },

  // Social signal window for sweeps, in days (0 disables the window)
  signalWindowDays: intFromEnv('SIGNAL_WINDOW_DAYS', 90),

  // Point queries; grid sweeps in full mode cap their context radius here
  defaultRadiusM: intFromEnv('DEFAULT_RADIUS_M', 1000),
  gridContextRadiusM: intFromEnv('GRID_CONTEXT_RADIUS_M', 1000),

  // Grids evaluated concurrently per sweep chunk
  sweepConcurrency: intFromEnv('SWEEP_CONCURRENCY', 10),
}));
