/**
 * Proximity join between a target point and a candidate collection.
 *
 * The same function serves both directions: attractions near a listing and
 * listings near an attraction only differ in which collection is passed as
 * candidates and which supplies the target.
 */

import { ValidationError } from "./errors";
import { assertGeoPoint, distanceKm, isValidLatitude, isValidLongitude, type GeoPoint } from "./geo";
import { hasLocation, type DistanceAnnotated, type LocatedRecord, type TravelRecord } from "./records";

export const DEFAULT_MAX_DISTANCE_KM = 2.0;
export const DEFAULT_PROXIMITY_LIMIT = 5;

export interface ProximityOptions {
  maxDistanceKm?: number;
  limit?: number;
}

/** A named reference record or explicit coordinates. Coordinates win when both are given. */
export interface PlaceReference {
  name?: string | null;
  point?: GeoPoint | null;
}

export function assertLimit(value: number, label: string): number {
  if (value !== Infinity && (!Number.isInteger(value) || value < 0)) {
    throw new ValidationError(`${label} must be a non-negative integer (got ${value})`);
  }
  return value;
}

/**
 * Resolve a reference to a point. Returns null when the name matches no
 * reference record (or the match has no coordinates); that is a normal
 * outcome, not a failure.
 */
export function resolveTarget(
  reference: PlaceReference,
  references: readonly TravelRecord[]
): GeoPoint | null {
  if (reference.point) {
    return assertGeoPoint(reference.point, "target");
  }

  const wanted = reference.name?.trim().toLowerCase();
  if (!wanted) return null;

  const match = references.find((r) => r.name !== null && r.name.trim().toLowerCase() === wanted);
  if (!match || !hasLocation(match)) return null;

  return assertGeoPoint({ latitude: match.latitude, longitude: match.longitude }, `reference "${match.name}"`);
}

/**
 * Candidates within maxDistanceKm of target (inclusive), each a fresh copy
 * annotated with distanceKm, nearest first, at most `limit` of them.
 * Candidates without coordinates are skipped.
 */
export function proximityJoin<R extends TravelRecord>(
  target: GeoPoint,
  candidates: readonly R[],
  options: ProximityOptions = {}
): DistanceAnnotated<LocatedRecord<R>>[] {
  const maxDistanceKm = options.maxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM;
  const limit = assertLimit(options.limit ?? DEFAULT_PROXIMITY_LIMIT, "limit");

  if (!Number.isFinite(maxDistanceKm) || maxDistanceKm < 0) {
    throw new ValidationError(`maxDistanceKm must be a non-negative number (got ${maxDistanceKm})`);
  }
  assertGeoPoint(target, "target");

  const within: DistanceAnnotated<LocatedRecord<R>>[] = [];
  for (const candidate of candidates) {
    if (!hasLocation(candidate)) continue;
    if (!isValidLatitude(candidate.latitude) || !isValidLongitude(candidate.longitude)) {
      throw new ValidationError(
        `record ${candidate.id ?? candidate.name ?? "?"} has out-of-range coordinates (${candidate.latitude}, ${candidate.longitude})`
      );
    }

    const d = distanceKm(target, candidate);
    if (d <= maxDistanceKm) {
      within.push({ ...candidate, distanceKm: d });
    }
  }

  // Array#sort is stable, so equidistant candidates keep their input order.
  within.sort((a, b) => a.distanceKm - b.distanceKm);
  return within.slice(0, limit);
}

/** proximityJoin with the target resolved from a reference; [] when unresolved. */
export function proximityJoinByReference<R extends TravelRecord>(
  reference: PlaceReference,
  references: readonly TravelRecord[],
  candidates: readonly R[],
  options: ProximityOptions = {}
): DistanceAnnotated<LocatedRecord<R>>[] {
  const target = resolveTarget(reference, references);
  if (!target) {
    console.log(`[Proximity] No reference found for "${reference.name ?? ""}"`);
    return [];
  }
  return proximityJoin(target, candidates, options);
}
