import { SignalType } from '../../common/interfaces/records.interface';

export type SocialChannel = 'instagram' | 'reddit';

/** Channel each social signal type is counted under. */
export const CHANNEL_BY_SIGNAL: Readonly<Record<SignalType, SocialChannel>> = {
  mention: 'instagram',
  demand: 'reddit',
  complaint: 'reddit',
};

export const COUNT_FIELDS = ['businessCount', 'instagramVolume', 'redditMentions'] as const;

export type CountField = (typeof COUNT_FIELDS)[number];

export type MaxValues = Record<CountField, number>;

export interface RawGridMetrics {
  gridId: string;
  category: string;
  businessCount: number;
  instagramVolume: number;
  redditMentions: number;
  /** Mean rating of rated businesses, null when none is rated. */
  avgRating: number | null;
  totalReviews: number;
}

export interface GridMetrics extends RawGridMetrics {
  supplyNorm: number;
  demandInstagramNorm: number;
  demandRedditNorm: number;
}
