import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError, errorMessage } from '../errors.js';
import type { ListingQueryService } from '../services/listingQueryService.js';
import type { ListingFilters } from '../types.js';

const TRUTHY = ['true', '1', 'yes', 'on'];

const booleanParam = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((v) => TRUTHY.includes(v));

// `?min_size=` is rejected rather than coerced to 0
const boundParam = z.string().trim().min(1).pipe(z.coerce.number().int().min(0)).optional();

const listQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  min_price: boundParam,
  max_price: boundParam,
  min_size: boundParam,
  max_size: boundParam,
  has_garage: booleanParam.optional(),
  room_layout: z.string().trim().min(1).max(20).optional()
});

const recentQuerySchema = z.object({
  hours: z.coerce.number().positive().max(24 * 365).default(24)
});

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive()
});

export function createListingsRouter(service: ListingQueryService): Router {
  const router = Router();

  router.get('/v1/listings', async (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    const { skip, limit, ...q } = parsed.data;
    const filters: ListingFilters = {
      minPrice: q.min_price,
      maxPrice: q.max_price,
      minSize: q.min_size,
      maxSize: q.max_size,
      hasGarage: q.has_garage,
      roomLayout: q.room_layout
    };

    try {
      const listings = await service.list(filters, skip, limit);
      return res.json({ listings });
    } catch (err) {
      return res.status(500).json({ error: 'QUERY_FAILED', message: errorMessage(err) });
    }
  });

  // Registered before /:id so "recent" is not read as an id.
  router.get('/v1/listings/recent', async (req, res) => {
    const parsed = recentQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const listings = await service.listRecent(parsed.data.hours);
      return res.json({ listings });
    } catch (err) {
      return res.status(500).json({ error: 'QUERY_FAILED', message: errorMessage(err) });
    }
  });

  router.get('/v1/listings/:id', async (req, res) => {
    const parsed = idParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const listing = await service.get(parsed.data.id);
      return res.json(listing);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return res.status(404).json({ error: 'NOT_FOUND', message: err.message });
      }
      return res.status(500).json({ error: 'QUERY_FAILED', message: errorMessage(err) });
    }
  });

  router.post('/v1/ingestion/trigger', (_req, res) => {
    service.triggerIngestion();
    return res.status(202).json({ message: 'Crawling triggered' });
  });

  router.get('/v1/stats', async (_req, res) => {
    try {
      const stats = await service.stats();
      return res.json(stats);
    } catch (err) {
      return res.status(500).json({ error: 'STATS_FAILED', message: errorMessage(err) });
    }
  });

  return router;
}
