import { ConfigurationError } from '../../common/errors';
import { Coordinate } from '../../common/interfaces/geo.interface';
import {
  BusinessRecord,
  isSignalType,
  SocialSignal,
} from '../../common/interfaces/records.interface';
import { errorMessage } from '../../common/utils/error.util';
import { isFiniteNumber, isRecord, readJsonFile } from '../../common/utils/json.util';

export const IN_MEMORY_DATASET = 'IN_MEMORY_DATASET';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface InMemoryDataset {
  businesses: BusinessRecord[];
  signals: SocialSignal[];
}

function parseLocation(value: unknown, where: string): Coordinate {
  if (!isRecord(value) || !isFiniteNumber(value.lat) || !isFiniteNumber(value.lon)) {
    throw new ConfigurationError(`${where} needs a location with numeric lat and lon`);
  }
  return { lat: value.lat, lon: value.lon };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseBusiness(entry: unknown, position: number): BusinessRecord {
  const where = `Business #${position}`;
  if (!isRecord(entry) || typeof entry.id !== 'string' || typeof entry.category !== 'string') {
    throw new ConfigurationError(`${where} needs an id and a category`);
  }
  return {
    id: entry.id,
    name: typeof entry.name === 'string' ? entry.name : entry.id,
    category: entry.category,
    location: parseLocation(entry.location, where),
    rating: isFiniteNumber(entry.rating) ? entry.rating : null,
    reviewCount: isFiniteNumber(entry.reviewCount) ? entry.reviewCount : 0,
    gridId: optionalString(entry.gridId),
    types: Array.isArray(entry.types)
      ? entry.types.filter((type): type is string => typeof type === 'string')
      : undefined,
    priceLevel: isFiniteNumber(entry.priceLevel) ? entry.priceLevel : null,
  };
}

/**
 * Posts carry either an ISO `timestamp` or an `ageDays` offset from `now`,
 * which keeps a checked-in sample inside the signal window.
 */
function parseSignal(entry: unknown, position: number, now: Date): SocialSignal {
  const where = `Signal #${position}`;
  if (!isRecord(entry) || typeof entry.id !== 'string' || typeof entry.category !== 'string') {
    throw new ConfigurationError(`${where} needs an id and a category`);
  }
  if (!isSignalType(entry.signalType)) {
    throw new ConfigurationError(`${where} has unknown signal type '${String(entry.signalType)}'`);
  }

  let timestamp: Date;
  if (typeof entry.timestamp === 'string') {
    timestamp = new Date(entry.timestamp);
  } else if (isFiniteNumber(entry.ageDays)) {
    timestamp = new Date(now.getTime() - entry.ageDays * DAY_MS);
  } else {
    throw new ConfigurationError(`${where} needs a timestamp or ageDays`);
  }
  if (Number.isNaN(timestamp.getTime())) {
    throw new ConfigurationError(`${where} has an invalid timestamp`);
  }

  return {
    id: entry.id,
    category: entry.category,
    text: typeof entry.text === 'string' ? entry.text : '',
    timestamp,
    location: entry.location === undefined ? null : parseLocation(entry.location, where),
    signalType: entry.signalType,
    engagementScore: isFiniteNumber(entry.engagementScore) ? entry.engagementScore : 0,
    gridId: optionalString(entry.gridId),
  };
}

export function parseDataset(raw: unknown, now = new Date()): InMemoryDataset {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Dataset must be an object with businesses and signals');
  }
  const businesses = Array.isArray(raw.businesses) ? raw.businesses : [];
  const signals = Array.isArray(raw.signals) ? raw.signals : [];

  return {
    businesses: businesses.map((entry, i) => parseBusiness(entry, i)),
    signals: signals.map((entry, i) => parseSignal(entry, i, now)),
  };
}

export function loadDataset(file: string): InMemoryDataset {
  let raw: unknown;
  try {
    raw = readJsonFile(file);
  } catch (error) {
    throw new ConfigurationError(`Cannot read dataset ${file}: ${errorMessage(error)}`);
  }
  return parseDataset(raw);
}
