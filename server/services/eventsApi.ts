/**
 * Events API Service (Ticketmaster Discovery)
 */

import { z } from 'zod';
import {
  ValidationError,
  isValidLatitude,
  isValidLongitude,
  makeRecord,
  resilient,
  type TravelRecord,
} from '../engine';
import { fetchJson, requireApiKey, type ClientOptions } from './httpClient';

const TICKETMASTER_EVENTS = 'https://app.ticketmaster.com/discovery/v2/events.json';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const MAX_EVENTS = 10;

export interface TicketedEvent {
  id: string | null;
  name: string;
  date: string | null;
  time: string | null;
  url: string | null;
  venue: string | null;
  latitude: number | null;
  longitude: number | null;
}

// Ticketmaster sends venue coordinates as strings
const coordinateSchema = z.union([z.string(), z.number()]).optional();

const eventsSchema = z.object({
  _embedded: z
    .object({
      events: z
        .array(
          z.object({
            id: z.string().optional(),
            name: z.string().default(''),
            url: z.string().optional(),
            dates: z
              .object({
                start: z
                  .object({ localDate: z.string().optional(), localTime: z.string().optional() })
                  .default({}),
              })
              .default({}),
            _embedded: z
              .object({
                venues: z
                  .array(
                    z.object({
                      name: z.string().optional(),
                      location: z
                        .object({ latitude: coordinateSchema, longitude: coordinateSchema })
                        .optional(),
                    })
                  )
                  .default([]),
              })
              .default({}),
          })
        )
        .default([]),
    })
    .default({}),
});

function toCoordinate(value: string | number | undefined): number | null {
  if (value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Venue position, or nulls when either half is missing or out of range. */
function venuePosition(
  location: { latitude?: string | number; longitude?: string | number } | undefined
): { latitude: number | null; longitude: number | null } {
  const latitude = toCoordinate(location?.latitude);
  const longitude = toCoordinate(location?.longitude);
  if (latitude === null || longitude === null || !isValidLatitude(latitude) || !isValidLongitude(longitude)) {
    return { latitude: null, longitude: null };
  }
  return { latitude, longitude };
}

export function toEventRecord(event: TicketedEvent): TravelRecord<'event'> {
  return makeRecord('event', {
    id: event.id,
    name: event.name,
    latitude: event.latitude,
    longitude: event.longitude,
    extra: { date: event.date, time: event.time, url: event.url, venue: event.venue },
  });
}

export function createEventsClient(options: ClientOptions = {}) {
  const { cache = null, policy, timeoutMs } = options;

  const getEvents = resilient('events.search', { cache, policy })(
    async (city: string, date?: string): Promise<TicketedEvent[]> => {
      if (!city.trim()) throw new ValidationError('City required');
      if (date !== undefined && !ISO_DATE.test(date)) {
        throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
      }
      const apikey = requireApiKey(options.apiKey, 'TICKETMASTER_API_KEY');

      const data = await fetchJson(TICKETMASTER_EVENTS, eventsSchema, {
        params: {
          apikey,
          city: city.trim(),
          size: MAX_EVENTS,
          sort: 'date,asc',
          startDateTime: date ? `${date}T00:00:00Z` : undefined,
        },
        timeoutMs,
        source: 'Events',
      });

      return data._embedded.events.slice(0, MAX_EVENTS).map((event) => {
        const venue = event._embedded.venues[0];
        return {
          id: event.id ?? null,
          name: event.name,
          date: event.dates.start.localDate ?? null,
          time: event.dates.start.localTime ?? null,
          url: event.url ?? null,
          venue: venue?.name ?? null,
          ...venuePosition(venue?.location),
        };
      });
    }
  );

  return { getEvents };
}

export type EventsClient = ReturnType<typeof createEventsClient>;
