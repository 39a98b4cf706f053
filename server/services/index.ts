/**
 * Wires the travel clients to one shared result cache and the configured
 * retry policy.
 */

import { config, type AppConfig } from '../config';
import { ResultCache, createRetryPolicy } from '../engine';
import { storage, type IStorage } from '../storage';
import { createWeatherClient } from './weatherApi';
import { createFlightClient } from './flightApi';
import { createEventsClient } from './eventsApi';
import { createTransportClient } from './transportService';
import { createLocationClient } from './locationApi';
import { createCurrencyClient } from './currencyApi';
import { RecommendationService } from './recommendationService';

export function createServices(cfg: AppConfig, store: IStorage) {
  const cache = new ResultCache({ maxEntries: cfg.CACHE_MAX_ENTRIES, ttlMs: cfg.CACHE_TTL_MS });
  const policy = createRetryPolicy({
    maxAttempts: cfg.RETRY_MAX_ATTEMPTS,
    baseDelaySeconds: cfg.RETRY_BASE_DELAY_SECONDS,
    backoffMultiplier: cfg.RETRY_BACKOFF_MULTIPLIER,
  });
  const shared = { cache, policy, timeoutMs: cfg.HTTP_TIMEOUT_MS };

  return {
    cache,
    policy,
    storage: store,
    recommendations: new RecommendationService(store),
    weather: createWeatherClient({ ...shared, apiKey: cfg.OPENWEATHER_API_KEY }),
    flights: createFlightClient({
      ...shared,
      apiKey: cfg.AMADEUS_API_KEY,
      apiSecret: cfg.AMADEUS_API_SECRET,
      placesApiKey: cfg.GOOGLE_MAPS_API_KEY,
    }),
    events: createEventsClient({ ...shared, apiKey: cfg.TICKETMASTER_API_KEY }),
    transport: createTransportClient({ ...shared, apiKey: cfg.GOOGLE_MAPS_API_KEY }),
    location: createLocationClient({ ...shared, apiKey: cfg.IPINFO_API_KEY }),
    currency: createCurrencyClient({ ...shared, apiKey: cfg.EXCHANGERATE_API_KEY }),
  };
}

export type Services = ReturnType<typeof createServices>;

export const services: Services = createServices(config, storage);
