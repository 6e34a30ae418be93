import { BoundingBox, Coordinate } from '../interfaces/geo.interface';

export const EARTH_RADIUS_KM = 6371;
/** Metres per degree of latitude. */
export const METERS_PER_DEGREE_LAT = 111111;
/** Metres per degree of longitude at the equator. */
export const METERS_PER_DEGREE_LON = 111320;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in kilometres.
 */
export function haversineKm(a: Coordinate, b: Coordinate): number {
  const φ1 = toRadians(a.lat);
  const φ2 = toRadians(b.lat);
  const Δφ = toRadians(b.lat - a.lat);
  const Δλ = toRadians(b.lon - a.lon);

  const h =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return EARTH_RADIUS_KM * c;
}

export function haversineMeters(a: Coordinate, b: Coordinate): number {
  return haversineKm(a, b) * 1000;
}

/**
 * Degree steps covering `meters` at the given latitude.
 */
export function metersToDegrees(meters: number, atLat: number): { lat: number; lon: number } {
  return {
    lat: meters / METERS_PER_DEGREE_LAT,
    lon: meters / (METERS_PER_DEGREE_LON * Math.cos(toRadians(atLat))),
  };
}

/**
 * Approximate area of a small rectangle in square metres.
 */
export function boundsAreaM2(bounds: BoundingBox): number {
  const centerLat = (bounds.north + bounds.south) / 2;
  const heightM = (bounds.north - bounds.south) * METERS_PER_DEGREE_LAT;
  const widthM = (bounds.east - bounds.west) * METERS_PER_DEGREE_LON * Math.cos(toRadians(centerLat));
  return heightM * widthM;
}

/**
 * Rectangle enclosing a circle of `radiusM` around `center`.
 */
export function boundsAround(center: Coordinate, radiusM: number): BoundingBox {
  const step = metersToDegrees(radiusM, center.lat);
  return {
    north: center.lat + step.lat,
    south: center.lat - step.lat,
    east: center.lon + step.lon,
    west: center.lon - step.lon,
  };
}

/**
 * Half-open containment: lower edges inclusive, upper edges exclusive.
 */
export function containsPoint(bounds: BoundingBox, point: Coordinate): boolean {
  return (
    point.lat >= bounds.south &&
    point.lat < bounds.north &&
    point.lon >= bounds.west &&
    point.lon < bounds.east
  );
}

export function centerOf(bounds: BoundingBox): Coordinate {
  return {
    lat: (bounds.north + bounds.south) / 2,
    lon: (bounds.east + bounds.west) / 2,
  };
}
