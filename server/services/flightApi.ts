/**
 * Flight API Service (Amadeus self-service)
 *
 * City names resolve to IATA codes through a bundled table, falling back to
 * a Google Places airport search. A search is one resilient operation: the
 * token request and airport lookup inside it are plain calls, so a failing
 * upstream is attempted at most maxAttempts times. Tokens are never cached.
 */

import { z } from 'zod';
import { ValidationError, resilient } from '../engine';
import { fetchJson, requireApiKey, type ClientOptions } from './httpClient';
import { readDataFile } from './dataFiles';

const AMADEUS_BASE = 'https://test.api.amadeus.com';
const PLACES_TEXT_SEARCH = 'https://maps.googleapis.com/maps/api/place/textsearch/json';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const IATA_CODE = /\b([A-Z]{3})\b/;

export const DEFAULT_ORIGIN_IATA = 'CGK';
export const MAX_FLIGHT_OFFERS = 5;

export interface FlightOffer {
  priceTotal: string | null;
  currency: string | null;
  airlines: string[];
  from: string | null;
  to: string | null;
  departureAt: string | null;
  arrivalAt: string | null;
}

export interface FlightSearchResult {
  origin: string;
  destination: string;
  date: string;
  count: number;
  items: FlightOffer[];
}

export interface FlightClientOptions extends ClientOptions {
  apiSecret?: string;
  /** Google Maps key for the airport lookup fallback. */
  placesApiKey?: string;
}

let airportCodes: Map<string, string> | null = null;

function airportTable(): Map<string, string> {
  if (!airportCodes) {
    const table = readDataFile('airports.json', z.record(z.string().regex(/^[A-Z]{3}$/)));
    airportCodes = new Map(Object.entries(table));
  }
  return airportCodes;
}

export function lookupAirportCode(city: string): string | null {
  return airportTable().get(city.trim().toLowerCase()) ?? null;
}

const tokenSchema = z.object({ access_token: z.string().min(1) });

const endpointSchema = z
  .object({ iataCode: z.string().optional(), at: z.string().optional() })
  .default({});

const offersSchema = z.object({
  data: z
    .array(
      z.object({
        price: z.object({ total: z.string().optional(), currency: z.string().optional() }).default({}),
        validatingAirlineCodes: z.array(z.string()).default([]),
        itineraries: z
          .array(
            z.object({
              segments: z.array(z.object({ departure: endpointSchema, arrival: endpointSchema })).default([]),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

const placesSearchSchema = z.object({
  status: z.string(),
  results: z.array(z.object({ name: z.string().default('') })).default([]),
});

export function createFlightClient(options: FlightClientOptions = {}) {
  const { cache = null, policy, timeoutMs } = options;

  async function fetchAccessToken(): Promise<string> {
    const clientId = requireApiKey(options.apiKey, 'AMADEUS_API_KEY');
    const clientSecret = requireApiKey(options.apiSecret, 'AMADEUS_API_SECRET');

    const data = await fetchJson(`${AMADEUS_BASE}/v1/security/oauth2/token`, tokenSchema, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: clientId,
        client_secret: clientSecret,
      }),
      timeoutMs,
      source: 'Flights',
    });
    return data.access_token;
  }

  /** IATA code for a city, or null when neither the table nor Places knows it. */
  async function resolveAirportCode(city: string): Promise<string | null> {
    if (!city.trim()) return null;

    const known = lookupAirportCode(city);
    if (known) return known;

    if (!options.placesApiKey) {
      console.warn(`[Flights] No airport code for "${city}" and Google Maps is not configured`);
      return null;
    }

    const data = await fetchJson(PLACES_TEXT_SEARCH, placesSearchSchema, {
      params: { query: `airport in ${city}`, type: 'airport', key: options.placesApiKey },
      timeoutMs,
      source: 'Flights',
    });
    const match = data.results[0]?.name.match(IATA_CODE);
    return match ? match[1] : null;
  }

  const searchFlights = resilient('flights.search', { cache, policy })(
    async (originCity: string | null, destinationCity: string, date: string): Promise<FlightSearchResult> => {
      if (!destinationCity.trim() || !date) {
        throw new ValidationError('destination city and date required');
      }
      if (!ISO_DATE.test(date)) {
        throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
      }

      const destination = await resolveAirportCode(destinationCity);
      if (!destination) {
        throw new ValidationError(`Failed to determine airport code for ${destinationCity}`);
      }
      const origin = (originCity ? await resolveAirportCode(originCity) : null) ?? DEFAULT_ORIGIN_IATA;

      const token = await fetchAccessToken();
      const data = await fetchJson(`${AMADEUS_BASE}/v2/shopping/flight-offers`, offersSchema, {
        headers: { Authorization: `Bearer ${token}` },
        params: {
          originLocationCode: origin,
          destinationLocationCode: destination,
          departureDate: date,
          adults: 1,
          max: MAX_FLIGHT_OFFERS,
        },
        timeoutMs,
        source: 'Flights',
      });

      const items: FlightOffer[] = [];
      for (const offer of data.data) {
        const segment = offer.itineraries[0]?.segments[0];
        if (!segment) continue;
        items.push({
          priceTotal: offer.price.total ?? null,
          currency: offer.price.currency ?? null,
          airlines: offer.validatingAirlineCodes,
          from: segment.departure.iataCode ?? null,
          to: segment.arrival.iataCode ?? null,
          departureAt: segment.departure.at ?? null,
          arrivalAt: segment.arrival.at ?? null,
        });
      }

      console.log(`[Flights] ${origin} → ${destination} on ${date}: ${items.length} offers`);
      return { origin, destination, date, count: items.length, items };
    }
  );

  return { searchFlights };
}

export type FlightClient = ReturnType<typeof createFlightClient>;
