/**
 * Itinerary Routes
 *
 * POST /api/itineraries                 - save a generated itinerary
 * GET  /api/itineraries/:userId/latest  - most recent itinerary of a user
 */

import { Router, type Request, type Response } from 'express';
import { insertItinerarySchema } from '@shared/schema';
import type { IStorage } from '../storage';
import { sendError, sendValidationError } from './httpErrors';

export function createItinerariesRouter(store: IStorage): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response) => {
    const validation = insertItinerarySchema.safeParse(req.body);
    if (!validation.success) return sendValidationError(res, validation.error);

    try {
      const saved = await store.saveItinerary(validation.data);
      console.log(`[Itineraries] Saved itinerary ${saved.id} for ${saved.userId}`);
      res.status(201).json(saved);
    } catch (error) {
      sendError(res, error, 'Itineraries');
    }
  });

  router.get('/:userId/latest', async (req: Request, res: Response) => {
    try {
      const latest = await store.getLatestItinerary(req.params.userId);
      if (!latest) {
        return res.status(404).json({ error: 'not_found', message: 'No itinerary saved for this user' });
      }
      res.json(latest);
    } catch (error) {
      sendError(res, error, 'Itineraries');
    }
  });

  return router;
}
