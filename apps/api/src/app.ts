import express from 'express';
import cors from 'cors';
import { createListingsRouter } from './routes/listings.js';
import type { ListingStore } from './repositories/listingStore.js';
import type { ListingQueryService } from './services/listingQueryService.js';
import { errorMessage } from './errors.js';

export interface AppDeps {
  service: ListingQueryService;
  store: ListingStore;
  corsOrigin?: string;
}

export function createApp({ service, store, corsOrigin }: AppDeps) {
  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (corsOrigin ? corsOrigin.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // If not configured, allow all origins.
        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/', (_req, res) => res.json({ message: 'Prague apartments crawler API' }));

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.get('/health/storage', async (_req, res) => {
    try {
      await store.ping();
      return res.json({ ok: true });
    } catch (err) {
      return res.status(500).json({ ok: false, error: 'STORAGE_UNAVAILABLE', message: errorMessage(err) });
    }
  });

  app.use(createListingsRouter(service));

  return app;
}
