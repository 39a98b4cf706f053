/**
 * Weather API Service (OpenWeather)
 *
 * Current conditions and a per-day forecast digest built from the 3-hourly
 * forecast slots of the requested date.
 */

import { z } from 'zod';
import { ValidationError, resilient } from '../engine';
import { fetchJson, requireApiKey, type ClientOptions } from './httpClient';

const OPENWEATHER_BASE = 'https://api.openweathermap.org/data/2.5';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface CurrentWeather {
  city: string;
  date: string;
  tempC: number | null;
  feelsLike: number | null;
  description: string;
  humidity: number | null;
  wind: number | null;
}

export interface DailyForecast {
  city: string;
  date: string;
  avgTempC: number;
  avgFeelsLike: number;
  description: string;
  humidity: number;
  wind: number;
  slots: number;
}

const weatherDescriptionSchema = z.array(z.object({ description: z.string().default('') })).default([]);

const currentWeatherSchema = z.object({
  name: z.string().optional(),
  main: z
    .object({
      temp: z.number().optional(),
      feels_like: z.number().optional(),
      humidity: z.number().optional(),
    })
    .default({}),
  weather: weatherDescriptionSchema,
  wind: z.object({ speed: z.number().optional() }).default({}),
});

const forecastSlotSchema = z.object({
  dt: z.number(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  weather: weatherDescriptionSchema,
  wind: z.object({ speed: z.number() }),
});

const forecastSchema = z.object({
  city: z.object({ name: z.string().optional() }).default({}),
  list: z.array(forecastSlotSchema).default([]),
});

type ForecastSlot = z.infer<typeof forecastSlotSchema>;

const round1 = (value: number) => Math.round(value * 10) / 10;

const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

/** Most frequent value; ties go to the one seen first. */
export function mostFrequent(values: string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  // Map iteration follows first appearance
  let best = '';
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/** Calendar date (UTC) of a forecast slot. */
const slotDate = (slot: ForecastSlot) => new Date(slot.dt * 1000).toISOString().slice(0, 10);

/**
 * Aggregate the slots that fall on `date`. Returns null when the forecast
 * window has no slot for that day.
 */
export function summarizeForecast(city: string, date: string, slots: ForecastSlot[]): DailyForecast | null {
  const sameDay = slots.filter((slot) => slotDate(slot) === date);
  if (sameDay.length === 0) return null;

  return {
    city,
    date,
    avgTempC: round1(mean(sameDay.map((s) => s.main.temp))),
    avgFeelsLike: round1(mean(sameDay.map((s) => s.main.feels_like))),
    description: mostFrequent(sameDay.map((s) => s.weather[0]?.description ?? '')),
    humidity: round1(mean(sameDay.map((s) => s.main.humidity))),
    wind: round1(mean(sameDay.map((s) => s.wind.speed))),
    slots: sameDay.length,
  };
}

function assertCity(city: string): string {
  const trimmed = city.trim();
  if (!trimmed) throw new ValidationError('City required');
  return trimmed;
}

export function createWeatherClient(options: ClientOptions = {}) {
  const { cache = null, policy, timeoutMs } = options;

  const getCurrentWeather = resilient('weather.current', { cache, policy })(
    async (city: string): Promise<CurrentWeather> => {
      const query = assertCity(city);
      const appid = requireApiKey(options.apiKey, 'OPENWEATHER_API_KEY');

      const data = await fetchJson(`${OPENWEATHER_BASE}/weather`, currentWeatherSchema, {
        params: { q: query, appid, units: 'metric', lang: 'en' },
        timeoutMs,
        source: 'Weather',
      });

      return {
        city: data.name ?? query,
        date: new Date().toISOString().slice(0, 10),
        tempC: data.main.temp ?? null,
        feelsLike: data.main.feels_like ?? null,
        description: data.weather[0]?.description ?? '',
        humidity: data.main.humidity ?? null,
        wind: data.wind.speed ?? null,
      };
    }
  );

  const getForecast = resilient('weather.forecast', { cache, policy })(
    async (city: string, date: string): Promise<DailyForecast | null> => {
      const query = assertCity(city);
      if (!ISO_DATE.test(date)) {
        throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
      }
      const appid = requireApiKey(options.apiKey, 'OPENWEATHER_API_KEY');

      const data = await fetchJson(`${OPENWEATHER_BASE}/forecast`, forecastSchema, {
        params: { q: query, appid, units: 'metric', lang: 'en' },
        timeoutMs,
        source: 'Weather',
      });

      const summary = summarizeForecast(data.city.name ?? query, date, data.list);
      if (!summary) {
        console.log(`[Weather] No forecast slots for ${query} on ${date}`);
      }
      return summary;
    }
  );

  return { getCurrentWeather, getForecast };
}

export type WeatherClient = ReturnType<typeof createWeatherClient>;
