/**
 * Weather Routes
 * Current conditions and daily forecast digests for trip destinations
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { WeatherClient } from '../services/weatherApi';
import { mapToDayType, parseTravelDate } from '../services/travelText';
import { sendError, sendValidationError } from './httpErrors';

// Validation schemas
const currentSchema = z.object({
  city: z.string().min(1, 'City is required'),
});

const forecastSchema = z.object({
  city: z.string().min(1, 'City is required'),
  date: z.string().min(1, 'Date is required'),
});

export function createWeatherRouter(weather: WeatherClient): Router {
  const router = Router();

  /**
   * GET /api/weather/current?city=Paris
   */
  router.get('/current', async (req: Request, res: Response) => {
    const validation = currentSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    try {
      res.json(await weather.getCurrentWeather(validation.data.city));
    } catch (error) {
      sendError(res, error, 'Weather');
    }
  });

  /**
   * GET /api/weather/forecast?city=Paris&date=2026-05-02
   * Accepts the same date spellings as the text helpers ("2 Mei 2026", "02-05-2026").
   */
  router.get('/forecast', async (req: Request, res: Response) => {
    const validation = forecastSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { city } = validation.data;
    const date = parseTravelDate(validation.data.date) ?? validation.data.date;

    try {
      const forecast = await weather.getForecast(city, date);
      if (!forecast) {
        return res.status(404).json({
          error: 'not_found',
          message: `No forecast data available for ${city} on ${date}`,
        });
      }
      res.json({ ...forecast, dayType: mapToDayType(date) });
    } catch (error) {
      sendError(res, error, 'Weather');
    }
  });

  return router;
}
