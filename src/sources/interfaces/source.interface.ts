import { BoundingBox, Coordinate } from '../../common/interfaces/geo.interface';
import { BusinessRecord, SocialSignal } from '../../common/interfaces/records.interface';

export const BUSINESS_SOURCE = 'BUSINESS_SOURCE';
export const SOCIAL_SOURCE = 'SOCIAL_SOURCE';

export type BusinessQuery =
  | { kind: 'bounds'; bounds: BoundingBox; category?: string }
  | { kind: 'radius'; center: Coordinate; radiusM: number; category?: string };

/**
 * Business directory collaborator. Implementations retry transient failures
 * themselves and raise UpstreamUnavailableError once retries are spent. An
 * empty result means "no businesses", not a failure.
 */
export interface BusinessSource {
  readonly name: string;
  fetch(query: BusinessQuery): Promise<BusinessRecord[]>;
}

/**
 * Social post collaborator, same failure contract as {@link BusinessSource}.
 */
export interface SocialSource {
  readonly name: string;
  fetch(category: string, bounds: BoundingBox, windowDays?: number): Promise<SocialSignal[]>;
}
