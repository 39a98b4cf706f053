/**
 * Transport Service (Google Places)
 *
 * Public-transport hubs in a city, gathered from several text searches and
 * de-duplicated by place id. Hubs near a point go through the proximity join.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  TransientFetchError,
  ValidationError,
  makeRecord,
  proximityJoin,
  resilient,
  type DistanceAnnotated,
  type GeoPoint,
  type LocatedRecord,
  type TravelRecord,
} from '../engine';
import { fetchJson, requireApiKey, type ClientOptions } from './httpClient';

const PLACES_BASE = 'https://maps.googleapis.com/maps/api/place';

export const TRANSPORT_QUERIES = [
  'public transport',
  'bus station',
  'train station',
  'metro station',
  'airport',
] as const;

export const MAX_TRANSPORT_RESULTS = 15;

export type TransportType = (typeof TRANSPORT_QUERIES)[number];

export interface TransportHub {
  placeId: string;
  name: string;
  address: string | null;
  rating: number | null;
  type: TransportType;
  latitude: number | null;
  longitude: number | null;
}

export interface TransportDetail {
  placeId: string;
  name: string;
  address: string | null;
  rating: number | null;
  openingHours: string[];
  openNow: boolean | null;
  latitude: number | null;
  longitude: number | null;
}

const geometrySchema = z
  .object({ location: z.object({ lat: z.number(), lng: z.number() }).optional() })
  .optional();

const textSearchSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        place_id: z.string(),
        name: z.string().default(''),
        formatted_address: z.string().optional(),
        rating: z.number().optional(),
        geometry: geometrySchema,
      })
    )
    .default([]),
});

const detailSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  result: z
    .object({
      name: z.string().default(''),
      formatted_address: z.string().optional(),
      rating: z.number().optional(),
      opening_hours: z
        .object({ open_now: z.boolean().optional(), weekday_text: z.array(z.string()).default([]) })
        .optional(),
      geometry: geometrySchema,
    })
    .optional(),
});

/**
 * Google answers most failures with HTTP 200 and a status string; map those
 * onto the same taxonomy as HTTP errors.
 */
export function checkPlacesStatus(status: string, message?: string): void {
  if (status === 'OK' || status === 'ZERO_RESULTS') return;
  const text = `Google Places error: ${status}${message ? ` (${message})` : ''}`;
  if (status === 'REQUEST_DENIED') throw new ConfigurationError(text);
  if (status === 'INVALID_REQUEST' || status === 'NOT_FOUND') throw new ValidationError(text);
  throw new TransientFetchError(text);
}

export function toTransportRecord(hub: TransportHub): TravelRecord<'transit'> {
  return makeRecord('transit', {
    id: hub.placeId,
    name: hub.name,
    latitude: hub.latitude,
    longitude: hub.longitude,
    extra: { address: hub.address, rating: hub.rating, type: hub.type },
  });
}

export function createTransportClient(options: ClientOptions = {}) {
  const { cache = null, policy, timeoutMs } = options;

  // One resilient operation per upstream query, so each request gets its own
  // timeout and retry budget and its own cache entry.
  const searchHubs = resilient('transport.query', { cache, policy })(
    async (type: TransportType, city: string): Promise<TransportHub[]> => {
      const key = requireApiKey(options.apiKey, 'GOOGLE_MAPS_API_KEY');
      const data = await fetchJson(`${PLACES_BASE}/textsearch/json`, textSearchSchema, {
        params: { query: `${type} in ${city}`, key },
        timeoutMs,
        source: 'Transport',
      });
      checkPlacesStatus(data.status, data.error_message);

      return data.results.map((place) => ({
        placeId: place.place_id,
        name: place.name,
        address: place.formatted_address ?? null,
        rating: place.rating ?? null,
        type,
        latitude: place.geometry?.location?.lat ?? null,
        longitude: place.geometry?.location?.lng ?? null,
      }));
    }
  );

  /**
   * Runs the TRANSPORT_QUERIES one after another, so the ceiling is
   * TRANSPORT_QUERIES.length times the worst-case latency of one query.
   */
  async function getTransportation(city: string): Promise<TransportHub[]> {
    const name = city.trim();
    if (!name) throw new ValidationError('City required');
    requireApiKey(options.apiKey, 'GOOGLE_MAPS_API_KEY');

    const byPlaceId = new Map<string, TransportHub>();
    for (const type of TRANSPORT_QUERIES) {
      for (const hub of await searchHubs(type, name)) {
        if (!byPlaceId.has(hub.placeId)) byPlaceId.set(hub.placeId, hub);
      }
    }

    const hubs = Array.from(byPlaceId.values()).slice(0, MAX_TRANSPORT_RESULTS);
    console.log(`[Transport] ${name}: ${byPlaceId.size} unique hubs, returning ${hubs.length}`);
    return hubs;
  }

  /** Transit hubs within maxDistanceKm of a point, nearest first. */
  async function getTransportationNear(
    city: string,
    point: GeoPoint,
    maxDistanceKm?: number
  ): Promise<Array<DistanceAnnotated<LocatedRecord<TravelRecord<'transit'>>>>> {
    const hubs = await getTransportation(city);
    return proximityJoin(point, hubs.map(toTransportRecord), { maxDistanceKm, limit: MAX_TRANSPORT_RESULTS });
  }

  const getTransportDetail = resilient('transport.detail', { cache, policy })(
    async (placeId: string): Promise<TransportDetail | null> => {
      if (!placeId.trim()) throw new ValidationError('placeId required');
      const key = requireApiKey(options.apiKey, 'GOOGLE_MAPS_API_KEY');

      const data = await fetchJson(`${PLACES_BASE}/details/json`, detailSchema, {
        params: {
          place_id: placeId,
          fields: 'name,formatted_address,rating,opening_hours,geometry',
          key,
        },
        timeoutMs,
        source: 'Transport',
      });
      checkPlacesStatus(data.status, data.error_message);

      const result = data.result;
      if (!result) return null;
      return {
        placeId,
        name: result.name,
        address: result.formatted_address ?? null,
        rating: result.rating ?? null,
        openingHours: result.opening_hours?.weekday_text ?? [],
        openNow: result.opening_hours?.open_now ?? null,
        latitude: result.geometry?.location?.lat ?? null,
        longitude: result.geometry?.location?.lng ?? null,
      };
    }
  );

  return { getTransportation, getTransportationNear, getTransportDetail };
}

export type TransportClient = ReturnType<typeof createTransportClient>;
