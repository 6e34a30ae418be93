export interface Coordinate {
  lat: number;
  lon: number;
}

/**
 * Axis-aligned lat/lon rectangle. `south < north` and `west < east`.
 */
export interface BoundingBox {
  north: number;
  south: number;
  east: number;
  west: number;
}
