/**
 * Recommendation Routes
 *
 * POST /api/recommendations/default      - default lodging order for a city
 * POST /api/recommendations/preferences  - filters + one sort key
 * POST /api/recommendations/near-place   - lodging near an attraction
 * GET  /api/places/near-listing          - attractions near a listing
 * GET  /api/listings/near                - lodging near coordinates
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import {
  defaultRecommendationSchema,
  preferenceRecommendationSchema,
  nearPlaceRecommendationSchema,
  nearbyPlacesSchema,
  dayTypeSchema,
} from '@shared/schema';
import type { RecommendationService } from '../services/recommendationService';
import { sendError, sendValidationError } from './httpErrors';

const nearbyListingsSchema = z.object({
  city: z.string().min(1, 'City is required'),
  dayType: dayTypeSchema.optional(),
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  maxDistanceKm: z.coerce.number().nonnegative().default(2),
  limit: z.coerce.number().int().min(0).max(50).default(5),
});

export function createRecommendationsRouter(recommendations: RecommendationService): Router {
  const router = Router();

  router.post('/default', async (req: Request, res: Response) => {
    const validation = defaultRecommendationSchema.safeParse(req.body);
    if (!validation.success) return sendValidationError(res, validation.error);

    try {
      const items = await recommendations.recommendDefault(validation.data);
      res.json({ count: items.length, items });
    } catch (error) {
      sendError(res, error, 'Recommend');
    }
  });

  router.post('/preferences', async (req: Request, res: Response) => {
    const validation = preferenceRecommendationSchema.safeParse(req.body);
    if (!validation.success) return sendValidationError(res, validation.error);

    try {
      const items = await recommendations.recommendWithPreferences(validation.data);
      res.json({ count: items.length, items });
    } catch (error) {
      sendError(res, error, 'Recommend');
    }
  });

  router.post('/near-place', async (req: Request, res: Response) => {
    const validation = nearPlaceRecommendationSchema.safeParse(req.body);
    if (!validation.success) return sendValidationError(res, validation.error);

    try {
      const items = await recommendations.recommendNearPlace(validation.data);
      res.json({ count: items.length, items });
    } catch (error) {
      sendError(res, error, 'Recommend');
    }
  });

  return router;
}

export function createPlacesRouter(recommendations: RecommendationService): Router {
  const router = Router();

  router.get('/near-listing', async (req: Request, res: Response) => {
    const validation = nearbyPlacesSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { city, listingId, latitude, longitude, maxDistanceKm, limit } = validation.data;
    const point = latitude !== undefined && longitude !== undefined ? { latitude, longitude } : undefined;

    try {
      const items = await recommendations.placesNearListing({ city, listingId, point, maxDistanceKm, limit });
      res.json({ count: items.length, items });
    } catch (error) {
      sendError(res, error, 'Places');
    }
  });

  return router;
}

export function createListingsRouter(recommendations: RecommendationService): Router {
  const router = Router();

  router.get('/near', async (req: Request, res: Response) => {
    const validation = nearbyListingsSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { city, dayType, latitude, longitude, maxDistanceKm, limit } = validation.data;

    try {
      const items = await recommendations.listingsNear({
        city,
        dayType,
        point: { latitude, longitude },
        maxDistanceKm,
        limit,
      });
      res.json({ count: items.length, items });
    } catch (error) {
      sendError(res, error, 'Listings');
    }
  });

  return router;
}
