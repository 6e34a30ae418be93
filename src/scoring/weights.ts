import { ConfigurationError } from '../common/errors';

const WEIGHT_TOLERANCE = 1e-6;

/**
 * Checks a set of blend weights: each finite and non-negative, summing to 1.
 */
export function validateWeights<T extends Record<string, number>>(weights: T, label: string): T {
  const entries = Object.entries(weights);
  const invalid = entries.filter(([, weight]) => !Number.isFinite(weight) || weight < 0);
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `${label} weights must be non-negative numbers: ${invalid.map(([name]) => name).join(', ')}`,
    );
  }

  const sum = entries.reduce((total, [, weight]) => total + weight, 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`${label} weights must sum to 1, got ${sum}`);
  }
  return weights;
}
