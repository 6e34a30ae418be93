import { SignalType } from '../../common/interfaces/records.interface';

export interface TopPost {
  id: string;
  text: string;
  signalType: SignalType;
  engagementScore: number;
  timestamp: Date;
}

export interface CompetitorSummary {
  id: string;
  name: string;
  rating: number | null;
  reviewCount: number;
  distanceKm: number;
}

export type OpportunityLevel = 'High' | 'Medium' | 'Low';
export type ConfidenceLevel = 'High' | 'Good' | 'Low';
export type DemandLevel = 'Very High' | 'High' | 'Medium' | 'Low';
export type CompetitionLevel = 'None' | 'Low' | 'Medium' | 'High';

export interface LevelLabels {
  opportunity: OpportunityLevel;
  confidence: ConfidenceLevel;
  demand: DemandLevel;
  competition: CompetitionLevel;
}

export interface Evidence {
  topPosts: TopPost[];
  competitors: CompetitorSummary[];
}
