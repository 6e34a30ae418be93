import { Suitability } from './interfaces/score.interface';

// Closed below, checked in order
export const SUITABILITY_THRESHOLDS: ReadonlyArray<{ level: Suitability; min: number }> = [
  { level: 'excellent', min: 0.8 },
  { level: 'good', min: 0.65 },
  { level: 'moderate', min: 0.45 },
  { level: 'poor', min: 0.25 },
];

export function suitabilityFor(score: number): Suitability {
  // Sums such as 0.65 * a + 0.35 * b land a hair under the threshold they equal
  const settled = Math.round(score * 1e9) / 1e9;
  const match = SUITABILITY_THRESHOLDS.find(threshold => settled >= threshold.min);
  return match ? match.level : 'not_recommended';
}

export function suitabilityMessage(suitability: Suitability, category: string): string {
  const name = category.toUpperCase();
  switch (suitability) {
    case 'excellent':
      return `This location is EXCELLENT for a ${name}. Strong recommendation to proceed.`;
    case 'good':
      return `This location is GOOD for a ${name}. Recommended with minor considerations.`;
    case 'moderate':
      return `This location has MODERATE potential for a ${name}. Further analysis recommended.`;
    case 'poor':
      return `This location shows POOR potential for a ${name}. Consider alternatives.`;
    case 'not_recommended':
      return `This location is NOT RECOMMENDED for a ${name}. High risk.`;
  }
}
