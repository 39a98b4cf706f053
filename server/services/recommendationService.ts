/**
 * Recommendation Service
 *
 * Scopes storage rows to a city (and optionally a day type), converts them
 * into engine records and hands them to the ranking / proximity engine.
 */

import type { Listing, Place } from '@shared/schema';
import {
  DEFAULT_MAX_DISTANCE_KM,
  DEFAULT_PROXIMITY_LIMIT,
  ValidationError,
  makeRecord,
  proximityJoin,
  rankDefault,
  rankNearPlace,
  rankWithPreferences,
  type FieldValue,
  type GeoPoint,
  type PreferenceFilters,
  type TravelRecord,
} from '../engine';
import type { IStorage } from '../storage';

export interface CityScope {
  city: string;
  dayType?: string;
  /** Leaves out listings whose known capacity is below this. */
  guests?: number;
}

export interface DefaultRecommendationInput extends CityScope {
  topN?: number;
}

export interface PreferenceRecommendationInput extends CityScope {
  filters?: PreferenceFilters;
  sortKey?: string;
  topN?: number;
}

export interface NearPlaceRecommendationInput extends PreferenceRecommendationInput {
  placeName?: string;
  point?: GeoPoint;
  maxDistanceKm?: number;
}

export interface NearbyPlacesInput {
  city: string;
  listingId?: number;
  point?: GeoPoint;
  maxDistanceKm?: number;
  limit?: number;
}

export interface NearbyListingsInput extends CityScope {
  point: GeoPoint;
  maxDistanceKm?: number;
  limit?: number;
}

/** Flat JSON shape returned over HTTP. */
export type RecommendationItem = {
  kind: string;
  id: string | number | null;
  name: string | null;
  latitude: number | null;
  longitude: number | null;
  distanceKm?: number;
} & Record<string, FieldValue | undefined>;

export function listingToRecord(listing: Listing): TravelRecord<'listing'> {
  const { id, name, latitude, longitude, ...extra } = listing;
  return makeRecord('listing', { id, name, latitude, longitude, extra });
}

export function placeToRecord(place: Place): TravelRecord<'place'> {
  const { id, name, latitude, longitude, ...extra } = place;
  return makeRecord('place', { id, name, latitude, longitude, extra });
}

export function flattenRecord(record: TravelRecord & { distanceKm?: number }): RecommendationItem {
  return {
    ...record.extra,
    kind: record.kind,
    id: record.id,
    name: record.name,
    latitude: record.latitude,
    longitude: record.longitude,
    ...(record.distanceKm !== undefined ? { distanceKm: record.distanceKm } : {}),
  };
}

function requireCity(city: string): string {
  const trimmed = city.trim();
  if (!trimmed) throw new ValidationError('City is required');
  return trimmed;
}

export class RecommendationService {
  constructor(private readonly store: IStorage) {}

  private async listingRecords(scope: CityScope): Promise<TravelRecord<'listing'>[]> {
    const rows = await this.store.listListings(requireCity(scope.city), scope.dayType);
    const { guests } = scope;
    const fitting = guests === undefined
      ? rows
      : rows.filter((l) => l.personCapacity === null || l.personCapacity >= guests);
    return fitting.map(listingToRecord);
  }

  private async placeRecords(city: string): Promise<TravelRecord<'place'>[]> {
    const rows = await this.store.listPlaces(requireCity(city));
    return rows.map(placeToRecord);
  }

  async recommendDefault(input: DefaultRecommendationInput): Promise<RecommendationItem[]> {
    const records = await this.listingRecords(input);
    console.log(`[Recommend] default: ${input.city} (${records.length} listings)`);
    return rankDefault(records, input.topN).map(flattenRecord);
  }

  /** Attractions of a city in the default attraction order. */
  async recommendPlaces(city: string, topN?: number): Promise<RecommendationItem[]> {
    const records = await this.placeRecords(city);
    return rankDefault(records, topN).map(flattenRecord);
  }

  async recommendWithPreferences(input: PreferenceRecommendationInput): Promise<RecommendationItem[]> {
    const records = await this.listingRecords(input);
    console.log(`[Recommend] preferences: ${input.city} (${records.length} listings)`);
    return rankWithPreferences(records, {
      filters: input.filters,
      sortKey: input.sortKey,
      topN: input.topN,
    }).map(flattenRecord);
  }

  async recommendNearPlace(input: NearPlaceRecommendationInput): Promise<RecommendationItem[]> {
    const [listings, places] = await Promise.all([this.listingRecords(input), this.placeRecords(input.city)]);
    console.log(`[Recommend] near place: ${input.placeName ?? 'coordinates'} in ${input.city}`);
    return rankNearPlace(
      listings,
      places,
      { name: input.placeName, point: input.point },
      {
        filters: input.filters,
        sortKey: input.sortKey,
        topN: input.topN,
        maxDistanceKm: input.maxDistanceKm,
      }
    ).map(flattenRecord);
  }

  /**
   * Attractions around a listing (by id) or around explicit coordinates.
   * An unknown listing, or one without coordinates, yields [].
   */
  async placesNearListing(input: NearbyPlacesInput): Promise<RecommendationItem[]> {
    let origin: GeoPoint | null = input.point ?? null;
    if (!origin && input.listingId !== undefined) {
      const listing = await this.store.getListing(input.listingId);
      if (listing && listing.latitude !== null && listing.longitude !== null) {
        origin = { latitude: listing.latitude, longitude: listing.longitude };
      }
    }
    if (!origin) {
      if (input.listingId === undefined) {
        throw new ValidationError('Either listingId or coordinates are required');
      }
      console.log(`[Recommend] Listing ${input.listingId} not found or has no coordinates`);
      return [];
    }

    const places = await this.placeRecords(input.city);
    return proximityJoin(origin, places, {
      maxDistanceKm: input.maxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM,
      limit: input.limit ?? DEFAULT_PROXIMITY_LIMIT,
    }).map(flattenRecord);
  }

  async listingsNear(input: NearbyListingsInput): Promise<RecommendationItem[]> {
    const listings = await this.listingRecords(input);
    return proximityJoin(input.point, listings, {
      maxDistanceKm: input.maxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM,
      limit: input.limit ?? DEFAULT_PROXIMITY_LIMIT,
    }).map(flattenRecord);
  }
}
