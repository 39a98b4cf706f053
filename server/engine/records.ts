/**
 * Record shapes shared by proximity and ranking.
 *
 * A TravelRecord has a handful of named fields every domain uses (identity,
 * name, coordinates) and an explicit `extra` bag for domain columns such as
 * price or overallRating. Coordinates may be null; LocatedRecord promises
 * they are present.
 */

export type FieldValue = string | number | boolean | null;

export type RecordKind = "listing" | "place" | "event" | "transit";

export interface TravelRecord<K extends RecordKind = RecordKind> {
  readonly kind: K;
  readonly id: string | number | null;
  readonly name: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly extra: Readonly<Record<string, FieldValue>>;
}

export type LocatedRecord<R extends TravelRecord = TravelRecord> = R & {
  readonly latitude: number;
  readonly longitude: number;
};

export type DistanceAnnotated<R extends TravelRecord = TravelRecord> = R & {
  readonly distanceKm: number;
};

export interface RecordInit {
  id?: string | number | null;
  name?: string | null;
  latitude?: number | null;
  longitude?: number | null;
  extra?: Record<string, FieldValue | undefined>;
}

export function makeRecord<K extends RecordKind>(kind: K, init: RecordInit): TravelRecord<K> {
  const extra: Record<string, FieldValue> = {};
  for (const [key, value] of Object.entries(init.extra ?? {})) {
    if (value !== undefined) extra[normalizeFieldName(key)] = value;
  }
  return Object.freeze({
    kind,
    id: init.id ?? null,
    name: init.name ?? null,
    latitude: init.latitude ?? null,
    longitude: init.longitude ?? null,
    extra: Object.freeze(extra),
  });
}

/** "room_type" → "roomType"; camelCase input is returned unchanged. */
export function normalizeFieldName(field: string): string {
  return field.trim().replace(/_+([a-zA-Z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

const NAMED_FIELDS = new Set(["kind", "id", "name", "latitude", "longitude"]);

/**
 * Value of a field on a record, or undefined when the record has no such
 * field at all (null means present but empty).
 */
export function readField(record: TravelRecord, field: string): FieldValue | undefined {
  const key = normalizeFieldName(field);

  if (key === "distanceKm") {
    return "distanceKm" in record && typeof record.distanceKm === "number"
      ? record.distanceKm
      : undefined;
  }
  if (NAMED_FIELDS.has(key)) {
    switch (key) {
      case "kind":
        return record.kind;
      case "id":
        return record.id;
      case "name":
        return record.name;
      case "latitude":
        return record.latitude;
      default:
        return record.longitude;
    }
  }
  return Object.prototype.hasOwnProperty.call(record.extra, key) ? record.extra[key] : undefined;
}

/** Present and finite coordinates. NaN counts as missing. */
export function hasLocation<R extends TravelRecord>(record: R): record is LocatedRecord<R> {
  return (
    typeof record.latitude === "number" &&
    typeof record.longitude === "number" &&
    Number.isFinite(record.latitude) &&
    Number.isFinite(record.longitude)
  );
}
