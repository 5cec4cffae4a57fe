import { NotFoundError, errorMessage } from '../errors.js';
import type { IngestionRunner } from '../ingestion/pipeline.js';
import type { ListingStore } from '../repositories/listingStore.js';
import type { Listing, ListingFilters, ListingStats, Logger } from '../types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface ListingQueryServiceDeps {
  store: ListingStore;
  pipeline: IngestionRunner;
  logger?: Logger;
}

export class ListingQueryService {
  private readonly logger: Logger;

  constructor(private readonly deps: ListingQueryServiceDeps) {
    this.logger = deps.logger ?? console;
  }

  list(filters: ListingFilters, skip: number, limit: number): Promise<Listing[]> {
    return this.deps.store.queryFiltered(filters, skip, limit);
  }

  async get(id: number): Promise<Listing> {
    const listing = await this.deps.store.getById(id);
    if (!listing) throw new NotFoundError(`Apartment ${id} not found`);
    return listing;
  }

  listRecent(hours: number, now: Date = new Date()): Promise<Listing[]> {
    return this.deps.store.queryCreatedAfter(new Date(now.getTime() - hours * HOUR_MS));
  }

  stats(): Promise<ListingStats> {
    return this.deps.store.stats();
  }

  /**
   * Starts one ingestion run in the background. The caller gets no result: the run happens at
   * most once, and its outcome only shows up in the logs.
   */
  triggerIngestion(): void {
    this.deps.pipeline
      .runOnce()
      .then((added) => {
        this.logger.info(`[api] Manual crawl stored ${added} new apartments`);
      })
      .catch((err: unknown) => {
        this.logger.error('[api] Manual crawl failed', { error: errorMessage(err) });
      });
  }
}
