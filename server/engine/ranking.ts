/**
 * Ranking Engine
 *
 * Three deterministic modes over TravelRecord collections:
 *
 * 1. rankDefault          - fixed multi-key order per record kind
 * 2. rankWithPreferences  - field filters, then one caller-chosen sort key
 * 3. rankNearPlace        - proximity join, then (2) or plain distance order
 *
 * Inputs are never mutated and every mode truncates to topN as its last step.
 * Missing values sort after present ones whatever the direction.
 */

import { ValidationError } from "./errors";
import { assertLimit, proximityJoinByReference, type PlaceReference } from "./proximity";
import {
  normalizeFieldName,
  readField,
  type DistanceAnnotated,
  type FieldValue,
  type LocatedRecord,
  type RecordKind,
  type TravelRecord,
} from "./records";

// ============================================================================
// TABLES
// ============================================================================

export type SortDirection = "asc" | "desc";

export interface SortKeySpec {
  readonly field: string;
  readonly direction: SortDirection;
}

export const DEFAULT_TOP_N = 5;

/** Lodging order. Quality scores first, then distance-type metrics. */
export const LISTING_DEFAULT_RANKING: readonly SortKeySpec[] = Object.freeze([
  { field: "overallRating", direction: "desc" },
  { field: "reputationScore", direction: "desc" },
  { field: "cleanliness", direction: "desc" },
  { field: "walkScore", direction: "desc" },
  { field: "distanceToCityCenter", direction: "asc" },
  { field: "distanceToMetro", direction: "asc" },
  { field: "nearbyAttractions", direction: "asc" },
]);

/** Attractions. Kept separate from the lodging order on purpose. */
export const PLACE_DEFAULT_RANKING: readonly SortKeySpec[] = Object.freeze([
  { field: "rating", direction: "desc" },
  { field: "ticketPrice", direction: "asc" },
  { field: "name", direction: "asc" },
]);

const DEFAULT_RANKING_TABLES: Partial<Record<RecordKind, readonly SortKeySpec[]>> = {
  listing: LISTING_DEFAULT_RANKING,
  place: PLACE_DEFAULT_RANKING,
};

/** Fields where smaller is better. Every other sort key ranks descending. */
export const ASCENDING_FIELDS: ReadonlySet<string> = new Set([
  "price",
  "ticketPrice",
  "distanceKm",
  "distanceToCityCenter",
  "distanceToMetro",
  "distanceToPlace",
  "durationMinutes",
]);

export function sortDirectionFor(field: string): SortDirection {
  return ASCENDING_FIELDS.has(normalizeFieldName(field)) ? "asc" : "desc";
}

// ============================================================================
// TYPES
// ============================================================================

export type PreferenceFilters = Readonly<Record<string, FieldValue>>;

export interface PreferenceOptions {
  filters?: PreferenceFilters | null;
  sortKey?: string | null;
  topN?: number;
}

export interface NearPlaceOptions extends PreferenceOptions {
  maxDistanceKm?: number;
}

type FieldKind = "text" | "number" | "boolean" | "unknown";

// ============================================================================
// HELPERS
// ============================================================================

function isPresent(value: FieldValue | undefined): value is string | number | boolean {
  return value !== undefined && value !== null && !(typeof value === "number" && Number.isNaN(value));
}

/** Kind of the first non-empty value, or null when no record has the field. */
function fieldKind(records: readonly TravelRecord[], field: string): FieldKind | null {
  let known = false;
  for (const record of records) {
    const value = readField(record, field);
    if (value === undefined) continue;
    known = true;
    if (!isPresent(value)) continue;
    if (typeof value === "string") return "text";
    if (typeof value === "number") return "number";
    return "boolean";
  }
  return known ? "unknown" : null;
}

function assertComparable(records: readonly TravelRecord[], field: string): void {
  const kinds = new Set<string>();
  for (const record of records) {
    const value = readField(record, field);
    if (isPresent(value)) kinds.add(typeof value);
  }
  if (kinds.size > 1) {
    throw new ValidationError(`sort key "${field}" mixes ${Array.from(kinds).join(" and ")} values`);
  }
}

function compareValues(
  a: FieldValue | undefined,
  b: FieldValue | undefined,
  direction: SortDirection
): number {
  if (!isPresent(a)) return isPresent(b) ? 1 : 0;
  if (!isPresent(b)) return -1;

  let order: number;
  if (typeof a === "string" && typeof b === "string") {
    order = a < b ? -1 : a > b ? 1 : 0;
  } else {
    order = Math.sign(Number(a) - Number(b));
  }
  return direction === "asc" ? order : -order;
}

function sortByKeys<R extends TravelRecord>(records: readonly R[], keys: readonly SortKeySpec[]): R[] {
  for (const key of keys) assertComparable(records, key.field);

  return [...records].sort((a, b) => {
    for (const key of keys) {
      const cmp = compareValues(readField(a, key.field), readField(b, key.field), key.direction);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
}

function coerceExpected(field: string, kind: "number" | "boolean", expected: FieldValue): FieldValue {
  if (expected === null || typeof expected === kind) return expected;

  if (kind === "number" && typeof expected === "string" && expected.trim() !== "") {
    const parsed = Number(expected);
    if (Number.isFinite(parsed)) return parsed;
  }
  if (kind === "boolean" && typeof expected === "string") {
    const lowered = expected.trim().toLowerCase();
    if (lowered === "true") return true;
    if (lowered === "false") return false;
  }
  throw new ValidationError(`filter "${field}" expects a ${kind} value (got ${JSON.stringify(expected)})`);
}

function matchesFilter(value: FieldValue | undefined, kind: FieldKind, expected: FieldValue): boolean {
  if (kind === "text") {
    return typeof value === "string" && value.toLowerCase().includes(String(expected).toLowerCase());
  }
  return value === expected;
}

function applyFilters<R extends TravelRecord>(records: readonly R[], filters: PreferenceFilters): R[] {
  let current = [...records];

  for (const [rawField, rawExpected] of Object.entries(filters)) {
    const field = normalizeFieldName(rawField);
    const kind = fieldKind(records, field);
    if (kind === null) {
      console.log(`[Ranking] Ignoring filter on unknown field: ${rawField}`);
      continue;
    }

    const expected =
      kind === "number" || kind === "boolean" ? coerceExpected(field, kind, rawExpected) : rawExpected;
    const before = current.length;
    current = current.filter((record) => matchesFilter(readField(record, field), kind, expected));
    console.log(`[Ranking] Filter applied: ${field}=${String(rawExpected)}, reduced ${before} → ${current.length} rows`);
  }

  return current;
}

function hasActivePreferences(options: PreferenceOptions): boolean {
  return Object.keys(options.filters ?? {}).length > 0 || !!options.sortKey;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Default ranking. The key table follows the record kind and cannot be
 * overridden, so the same input always ranks the same way.
 */
export function rankDefault<R extends TravelRecord>(records: readonly R[], topN: number = DEFAULT_TOP_N): R[] {
  assertLimit(topN, "topN");
  if (records.length === 0) return [];

  const kinds = new Set(records.map((r) => r.kind));
  if (kinds.size > 1) {
    throw new ValidationError(`default ranking needs records of one kind (got ${Array.from(kinds).join(", ")})`);
  }
  const kind = records[0].kind;
  const table = DEFAULT_RANKING_TABLES[kind];
  if (!table) {
    throw new ValidationError(`no default ranking is defined for ${kind} records`);
  }

  return sortByKeys(records, table).slice(0, topN);
}

/**
 * Filter, then sort by one key. Filters on fields no record carries are
 * ignored. A sort key no remaining record carries leaves the filtered order
 * as it is.
 */
export function rankWithPreferences<R extends TravelRecord>(
  records: readonly R[],
  options: PreferenceOptions = {}
): R[] {
  const topN = assertLimit(options.topN ?? DEFAULT_TOP_N, "topN");
  const filtered = applyFilters(records, options.filters ?? {});

  const sortKey = options.sortKey ? normalizeFieldName(options.sortKey) : null;
  if (!sortKey || fieldKind(filtered, sortKey) === null) {
    return filtered.slice(0, topN);
  }

  const direction = sortDirectionFor(sortKey);
  console.log(`[Ranking] Sorting by ${sortKey}, ascending=${direction === "asc"}`);
  return sortByKeys(filtered, [{ field: sortKey, direction }]).slice(0, topN);
}

/**
 * Listings near a place. Distances come from the proximity join and are not
 * recomputed; with no filters and no sort key the result is nearest first.
 */
export function rankNearPlace<R extends TravelRecord>(
  listings: readonly R[],
  places: readonly TravelRecord[],
  reference: PlaceReference,
  options: NearPlaceOptions = {}
): DistanceAnnotated<LocatedRecord<R>>[] {
  const topN = assertLimit(options.topN ?? DEFAULT_TOP_N, "topN");

  const nearby = proximityJoinByReference(reference, places, listings, {
    maxDistanceKm: options.maxDistanceKm,
    limit: Infinity,
  });

  if (hasActivePreferences(options)) {
    return rankWithPreferences(nearby, { ...options, topN });
  }
  return nearby.slice(0, topN);
}
