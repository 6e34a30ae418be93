import { Coordinate } from './geo.interface';

export interface BusinessRecord {
  id: string;
  name: string;
  category: string;
  location: Coordinate;
  /** 0 to 5, null when the directory has no rating. */
  rating: number | null;
  reviewCount: number;
  gridId?: string | null;
  /** Directory place types (e.g. `shopping_mall`, `transit_station`). */
  types?: string[];
  /** 0 (free) to 4 (very expensive). */
  priceLevel?: number | null;
}

export type SignalType = 'demand' | 'complaint' | 'mention';

export const SIGNAL_TYPES: readonly SignalType[] = ['demand', 'complaint', 'mention'];

export interface SocialSignal {
  id: string;
  category: string;
  text: string;
  timestamp: Date;
  location?: Coordinate | null;
  signalType: SignalType;
  engagementScore: number;
  gridId?: string | null;
}

export function isSignalType(value: unknown): value is SignalType {
  return SIGNAL_TYPES.some(type => type === value);
}
