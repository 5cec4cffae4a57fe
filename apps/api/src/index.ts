import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp } from './app.js';
import { createListingStore } from './storage.js';
import { createSrealityClient } from './providers/sreality.js';
import { IngestionPipeline } from './ingestion/pipeline.js';
import { IngestionScheduler } from './ingestion/scheduler.js';
import { ListingQueryService } from './services/listingQueryService.js';
import { resolveRepoRoot } from './paths.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const repoRoot = resolveRepoRoot(__dirname);

// Load repo-root .env first, then optionally let apps/api/.env override it.
dotenv.config({ path: path.join(repoRoot, '.env') });
dotenv.config({ path: path.join(repoRoot, 'apps/api/.env'), override: true });

const env = getEnv();

const store = createListingStore(env);
await store.init();

const pipeline = new IngestionPipeline({
  source: createSrealityClient({
    baseUrl: env.SREALITY_API_BASE_URL,
    timeoutMs: env.FETCH_TIMEOUT_SECONDS * 1000
  }),
  store
});

if (process.argv.includes('--once')) {
  // One-shot mode: a single crawl, e.g. from cron
  try {
    const added = await pipeline.runOnce();
    console.log(`Crawled ${added} new apartments`);
    await store.close();
    process.exit(0);
  } catch (err) {
    console.error('Crawl failed', err);
    process.exit(1);
  }
}

const scheduler = new IngestionScheduler(pipeline, { intervalMs: env.CRAWL_INTERVAL_SECONDS * 1000 });
const service = new ListingQueryService({ store, pipeline });
const app = createApp({ service, store, corsOrigin: env.CORS_ORIGIN });

const server = app.listen(env.PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${env.PORT}`);
  scheduler.start();
});

async function shutdown(signal: string): Promise<void> {
  console.log(`Received ${signal}, shutting down`);
  await scheduler.stop();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await store.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      console.error('Shutdown failed', err);
      process.exit(1);
    });
  });
}
