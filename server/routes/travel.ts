/**
 * Travel Routes
 *
 * GET /api/travel/flights            - flight offers between two cities
 * GET /api/travel/events             - ticketed events, optionally near a point
 * GET /api/travel/transport          - public transport hubs in a city
 * GET /api/travel/transport/near     - hubs around a point, nearest first
 * GET /api/travel/transport/:placeId - details of one hub
 * GET /api/travel/location           - caller location from IP
 * GET /api/travel/currency           - currency conversion
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { proximityJoin } from '../engine';
import type { FlightClient } from '../services/flightApi';
import { toEventRecord, type EventsClient } from '../services/eventsApi';
import type { TransportClient } from '../services/transportService';
import type { LocationClient } from '../services/locationApi';
import { formatPrice, type CurrencyClient } from '../services/currencyApi';
import { parseTravelDate } from '../services/travelText';
import { flattenRecord } from '../services/recommendationService';
import { sendError, sendValidationError } from './httpErrors';

export interface TravelRouterDeps {
  flights: FlightClient;
  events: EventsClient;
  transport: TransportClient;
  location: LocationClient;
  currency: CurrencyClient;
}

const travelDate = z
  .string()
  .min(1)
  .transform((value) => parseTravelDate(value) ?? value);

const flightsSchema = z.object({
  origin: z.string().optional(),
  destination: z.string().min(1, 'Destination is required'),
  date: travelDate,
});

const eventsSchema = z.object({
  city: z.string().min(1, 'City is required'),
  date: travelDate.optional(),
  latitude: z.coerce.number().min(-90).max(90).optional(),
  longitude: z.coerce.number().min(-180).max(180).optional(),
  maxDistanceKm: z.coerce.number().nonnegative().default(2),
});

const transportSchema = z.object({
  city: z.string().min(1, 'City is required'),
});

const transportNearSchema = z.object({
  city: z.string().min(1, 'City is required'),
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  maxDistanceKm: z.coerce.number().nonnegative().default(2),
});

const currencySchema = z.object({
  amount: z.coerce.number().finite(),
  from: z.string().default('EUR'),
  to: z.string().default('USD'),
});

export function createTravelRouter(deps: TravelRouterDeps): Router {
  const router = Router();

  router.get('/flights', async (req: Request, res: Response) => {
    const validation = flightsSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { origin, destination, date } = validation.data;
    try {
      res.json(await deps.flights.searchFlights(origin ?? null, destination, date));
    } catch (error) {
      sendError(res, error, 'Flights');
    }
  });

  router.get('/events', async (req: Request, res: Response) => {
    const validation = eventsSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { city, date, latitude, longitude, maxDistanceKm } = validation.data;
    try {
      const events = await deps.events.getEvents(city, date);
      if (latitude === undefined || longitude === undefined) {
        return res.json({ count: events.length, items: events });
      }

      // Events around a point, nearest first
      const nearby = proximityJoin({ latitude, longitude }, events.map(toEventRecord), {
        maxDistanceKm,
        limit: Infinity,
      }).map(flattenRecord);
      res.json({ count: nearby.length, items: nearby });
    } catch (error) {
      sendError(res, error, 'Events');
    }
  });

  router.get('/transport', async (req: Request, res: Response) => {
    const validation = transportSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    try {
      const hubs = await deps.transport.getTransportation(validation.data.city);
      res.json({ count: hubs.length, items: hubs });
    } catch (error) {
      sendError(res, error, 'Transport');
    }
  });

  router.get('/transport/near', async (req: Request, res: Response) => {
    const validation = transportNearSchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { city, latitude, longitude, maxDistanceKm } = validation.data;
    try {
      const hubs = await deps.transport.getTransportationNear(city, { latitude, longitude }, maxDistanceKm);
      const items = hubs.map(flattenRecord);
      res.json({ count: items.length, items });
    } catch (error) {
      sendError(res, error, 'Transport');
    }
  });

  router.get('/transport/:placeId', async (req: Request, res: Response) => {
    try {
      const detail = await deps.transport.getTransportDetail(req.params.placeId);
      if (!detail) {
        return res.status(404).json({ error: 'not_found', message: 'Place not found' });
      }
      res.json(detail);
    } catch (error) {
      sendError(res, error, 'Transport');
    }
  });

  router.get('/location', async (_req: Request, res: Response) => {
    try {
      res.json(await deps.location.getUserLocation());
    } catch (error) {
      sendError(res, error, 'Location');
    }
  });

  router.get('/currency', async (req: Request, res: Response) => {
    const validation = currencySchema.safeParse(req.query);
    if (!validation.success) return sendValidationError(res, validation.error, 'Invalid query parameters');

    const { amount, from, to } = validation.data;
    try {
      const conversion = await deps.currency.convertCurrency(amount, to, from);
      res.json({ ...conversion, formatted: formatPrice(conversion.result, conversion.to) });
    } catch (error) {
      sendError(res, error, 'Currency');
    }
  });

  return router;
}
