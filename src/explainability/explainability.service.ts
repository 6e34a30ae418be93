import { Injectable } from '@nestjs/common';
import { Coordinate } from '../common/interfaces/geo.interface';
import { BusinessRecord, SocialSignal } from '../common/interfaces/records.interface';
import { haversineKm } from '../common/utils/geo.util';
import { round } from '../common/utils/math.util';
import {
  CompetitionLevel,
  CompetitorSummary,
  ConfidenceLevel,
  DemandLevel,
  LevelLabels,
  OpportunityLevel,
  TopPost,
} from './interfaces/explanation.interface';

const POST_TEXT_LIMIT = 200;

// Compared after settling float noise, like the suitability tiers
const settle = (value: number) => Math.round(value * 1e9) / 1e9;

/**
 * Turns scored grids and points into human-readable evidence: the posts and
 * competitors behind a score, a one-line rationale and level labels.
 */
@Injectable()
export class ExplainabilityService {
  /**
   * Most engaging posts for `category`. With a `gridId`, only posts tagged
   * with that grid are considered.
   */
  topPosts(
    signals: readonly SocialSignal[],
    gridId: string | null,
    category: string,
    k = 3,
  ): TopPost[] {
    const wanted = category.toLowerCase();
    return signals
      .filter(
        signal =>
          signal.category.toLowerCase() === wanted && (gridId === null || signal.gridId === gridId),
      )
      .sort((a, b) => b.engagementScore - a.engagementScore || a.id.localeCompare(b.id))
      .slice(0, k)
      .map(signal => ({
        id: signal.id,
        text:
          signal.text.length > POST_TEXT_LIMIT
            ? `${signal.text.slice(0, POST_TEXT_LIMIT)}...`
            : signal.text,
        signalType: signal.signalType,
        engagementScore: signal.engagementScore,
        timestamp: signal.timestamp,
      }));
  }

  /**
   * Best rated competitors; unrated businesses sort last.
   */
  topCompetitors(
    businesses: readonly BusinessRecord[],
    origin: Coordinate,
    gridId: string | null,
    category: string,
    k = 5,
  ): CompetitorSummary[] {
    const wanted = category.toLowerCase();
    return businesses
      .filter(
        business =>
          business.category.toLowerCase() === wanted &&
          (gridId === null || business.gridId === gridId),
      )
      .sort(
        (a, b) =>
          (b.rating ?? -1) - (a.rating ?? -1) ||
          b.reviewCount - a.reviewCount ||
          a.id.localeCompare(b.id),
      )
      .slice(0, k)
      .map(business => ({
        id: business.id,
        name: business.name,
        rating: business.rating,
        reviewCount: business.reviewCount,
        distanceKm: round(haversineKm(origin, business.location), 2),
      }));
  }

  rationale(score: number, businessCount: number, demandSignals: number): string {
    const value = settle(score);
    if (value >= 0.7) {
      return `High demand (${demandSignals} posts), low competition (${businessCount} businesses)`;
    }
    if (value >= 0.4) {
      return `Moderate opportunity with ${businessCount} competitors and ${demandSignals} demand signals`;
    }
    return `Saturated market with ${businessCount} businesses and limited demand`;
  }

  /**
   * Three-sentence narrative used by the grid detail view.
   */
  narrative(score: number, businessCount: number, demandSignals: number): string {
    const parts: string[] = [];
    const value = settle(score);

    if (value >= 0.75) {
      parts.push('This location shows excellent potential for a new business.');
    } else if (value >= 0.5) {
      parts.push('This location has good potential for a new business.');
    } else {
      parts.push('This location has limited potential currently.');
    }

    if (demandSignals >= 50) {
      parts.push(`Strong demand signals detected with ${demandSignals} social media mentions.`);
    } else if (demandSignals >= 20) {
      parts.push(`Moderate demand with ${demandSignals} social media mentions.`);
    } else {
      parts.push(`Limited social media activity (${demandSignals} mentions).`);
    }

    if (businessCount === 0) {
      parts.push('No existing competitors in this area presents a first-mover advantage.');
    } else if (businessCount <= 2) {
      parts.push(`Low competition with only ${businessCount} existing business(es).`);
    } else {
      parts.push(`Consider the ${businessCount} existing competitors in this area.`);
    }

    return parts.join(' ');
  }

  levels(
    score: number,
    confidence: number,
    demandSignals: number,
    businessCount: number,
  ): LevelLabels {
    return {
      opportunity: opportunityLevel(score),
      confidence: confidenceLevel(confidence),
      demand: demandLevel(demandSignals),
      competition: competitionLevel(businessCount),
    };
  }
}

export function opportunityLevel(score: number): OpportunityLevel {
  const value = settle(score);
  return value >= 0.75 ? 'High' : value >= 0.5 ? 'Medium' : 'Low';
}

export function confidenceLevel(confidence: number): ConfidenceLevel {
  const value = settle(confidence);
  return value >= 0.7 ? 'High' : value >= 0.4 ? 'Good' : 'Low';
}

export function demandLevel(demandSignals: number): DemandLevel {
  if (demandSignals >= 100) {
    return 'Very High';
  }
  if (demandSignals >= 50) {
    return 'High';
  }
  return demandSignals >= 20 ? 'Medium' : 'Low';
}

export function competitionLevel(businessCount: number): CompetitionLevel {
  if (businessCount === 0) {
    return 'None';
  }
  if (businessCount <= 2) {
    return 'Low';
  }
  return businessCount <= 5 ? 'Medium' : 'High';
}
