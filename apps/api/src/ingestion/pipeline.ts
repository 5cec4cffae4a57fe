import { UpstreamFetchError } from '../errors.js';
import { extractImages, extractSizeAndLayout, hasGarage, isPragueLocality } from '../extractors.js';
import { normalizeEstate, type EstateSource, type SrealityEstate } from '../providers/sreality.js';
import type { ListingStore } from '../repositories/listingStore.js';
import type { Logger, NewListing } from '../types.js';

export const DEFAULT_PRICE_UNIT = 'za měsíc';

// Only the first page is ever requested; listings beyond it are not seen.
const FIRST_PAGE = 1;

export interface IngestionRunner {
  /** Resolves with the number of listings stored during this run. */
  runOnce(signal?: AbortSignal): Promise<number>;
}

export interface IngestionPipelineDeps {
  source: EstateSource;
  store: ListingStore;
  logger?: Logger;
}

export function buildListing(estate: SrealityEstate & { hashId: number }): NewListing {
  const { sizeSqm, roomLayout } = extractSizeAndLayout(estate.name);

  return {
    externalId: estate.hashId,
    title: estate.name,
    price: estate.price,
    priceUnit: estate.priceUnit ?? DEFAULT_PRICE_UNIT,
    locality: estate.locality,
    sizeSqm,
    roomLayout,
    hasGarage: hasGarage(estate.labels, estate.labelsAll),
    latitude: estate.gps.lat,
    longitude: estate.gps.lon,
    images: extractImages(estate.links)
  };
}

export class IngestionPipeline implements IngestionRunner {
  private readonly logger: Logger;

  constructor(private readonly deps: IngestionPipelineDeps) {
    this.logger = deps.logger ?? console;
  }

  async runOnce(signal?: AbortSignal): Promise<number> {
    let rawEstates: unknown[];
    try {
      rawEstates = await this.deps.source.fetchPage(FIRST_PAGE, signal);
    } catch (err) {
      if (!(err instanceof UpstreamFetchError)) throw err;
      this.logger.error('[pipeline] Failed to fetch data from sreality', { error: err.message, status: err.status });
      return 0;
    }

    const pending: NewListing[] = [];
    const seen = new Set<number>();

    for (const raw of rawEstates) {
      const estate = normalizeEstate(raw);
      if (!isPragueLocality(estate.locality)) continue;

      const { hashId } = estate;
      if (hashId === undefined || seen.has(hashId)) continue;
      if (await this.deps.store.exists(hashId)) continue;

      seen.add(hashId);
      pending.push(buildListing({ ...estate, hashId }));
    }

    // One write per run; ids stored concurrently by another run are skipped by the store.
    const stored = await this.deps.store.insertMany(pending);
    for (const listing of stored) {
      this.logger.info(`[pipeline] Added new apartment: ${listing.title} in ${listing.locality}`);
    }

    return stored.length;
  }
}
