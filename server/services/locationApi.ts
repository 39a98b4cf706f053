/**
 * IP-based user location (ipinfo). The token is optional; without it ipinfo
 * serves a rate-limited anonymous tier.
 */

import { z } from 'zod';
import { resilient } from '../engine';
import { fetchJson, type ClientOptions } from './httpClient';

const IPINFO_URL = 'https://ipinfo.io/json';

export interface UserLocation {
  city: string | null;
  region: string | null;
  country: string | null;
  latitude: number | null;
  longitude: number | null;
}

const ipinfoSchema = z.object({
  city: z.string().optional(),
  region: z.string().optional(),
  country: z.string().optional(),
  loc: z.string().optional(),
});

/** "48.8566,2.3522" → [48.8566, 2.3522]; anything else → [null, null]. */
export function parseLoc(loc: string | undefined): [number | null, number | null] {
  if (!loc || !loc.includes(',')) return [null, null];
  const [lat, lon] = loc.split(',').map((part) => Number(part.trim()));
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return [null, null];
  return [lat, lon];
}

export function createLocationClient(options: ClientOptions = {}) {
  const { policy, timeoutMs } = options;

  // The caller's IP can change between requests, so this is never cached.
  const getUserLocation = resilient('location.ip', { policy })(async (): Promise<UserLocation> => {
    const data = await fetchJson(IPINFO_URL, ipinfoSchema, {
      params: { token: options.apiKey },
      timeoutMs,
      source: 'Location',
    });
    const [latitude, longitude] = parseLoc(data.loc);
    return {
      city: data.city ?? null,
      region: data.region ?? null,
      country: data.country ?? null,
      latitude,
      longitude,
    };
  });

  return { getUserLocation };
}

export type LocationClient = ReturnType<typeof createLocationClient>;
