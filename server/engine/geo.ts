import { degreesToRadians } from "@turf/helpers";
import { ValidationError } from "./errors";

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export const EARTH_RADIUS_KM = 6371;

export function isValidLatitude(value: number): boolean {
  return Number.isFinite(value) && value >= -90 && value <= 90;
}

export function isValidLongitude(value: number): boolean {
  return Number.isFinite(value) && value >= -180 && value <= 180;
}

/**
 * Throws ValidationError for non-finite or out-of-range coordinates.
 * Values are never clamped.
 */
export function assertGeoPoint(p: GeoPoint, label = "point"): GeoPoint {
  if (!isValidLatitude(p.latitude)) {
    throw new ValidationError(`${label}: latitude ${p.latitude} is outside [-90, 90]`);
  }
  if (!isValidLongitude(p.longitude)) {
    throw new ValidationError(`${label}: longitude ${p.longitude} is outside [-180, 180]`);
  }
  return p;
}

/**
 * Great-circle distance in km (haversine, atan2 form, R = 6371 km).
 *
 * The cosine product is formed before it meets the longitude term so that
 * swapping the arguments yields the identical float.
 */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  assertGeoPoint(a, "from");
  assertGeoPoint(b, "to");

  const phi1 = degreesToRadians(a.latitude);
  const phi2 = degreesToRadians(b.latitude);
  const dPhi = degreesToRadians(b.latitude - a.latitude);
  const dLambda = degreesToRadians(b.longitude - a.longitude);

  const cosProduct = Math.cos(phi1) * Math.cos(phi2);
  const h = Math.sin(dPhi / 2) ** 2 + cosProduct * Math.sin(dLambda / 2) ** 2;
  // rounding can push h a hair past 1 for antipodal points
  const hc = Math.min(1, Math.max(0, h));

  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(hc), Math.sqrt(1 - hc));
}
