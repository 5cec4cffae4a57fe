import { UpstreamFetchError, errorMessage } from '../errors.js';
import type { Logger } from '../types.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// sreality codebook values
const CATEGORY_APARTMENT = '2';
const TRANSACTION_RENT = '2';

export interface EstateSource {
  fetchPage(page: number, signal?: AbortSignal): Promise<unknown[]>;
}

export interface SrealityClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
}

export interface SrealityEstate {
  hashId?: number;
  name: string;
  price: number;
  priceUnit?: string;
  locality: string;
  labels: string[];
  labelsAll: string[][];
  gps: { lat: number | null; lon: number | null };
  links: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === 'string' ? v : undefined;
}

function getNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function getNested(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const v = obj[key];
  return isRecord(v) ? v : undefined;
}

function getStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

function getEstateArray(payload: unknown): unknown[] {
  if (!isRecord(payload)) return [];
  const embedded = getNested(payload, '_embedded');
  const estates = embedded?.estates;
  return Array.isArray(estates) ? estates : [];
}

export function normalizeEstate(raw: unknown): SrealityEstate {
  const estate = isRecord(raw) ? raw : {};

  const hashId = getNumber(estate, 'hash_id');
  const gps = getNested(estate, 'gps') ?? {};
  const labelsAll = Array.isArray(estate.labelsAll) ? estate.labelsAll.map(getStringArray) : [];

  return {
    hashId: hashId !== undefined && Number.isInteger(hashId) && hashId > 0 ? hashId : undefined,
    name: getString(estate, 'name') ?? '',
    price: getNumber(estate, 'price') ?? 0,
    priceUnit: getString(getNested(estate, 'price_czk') ?? {}, 'unit'),
    locality: getString(estate, 'locality') ?? '',
    labels: getStringArray(estate.labels),
    labelsAll,
    gps: { lat: getNumber(gps, 'lat') ?? null, lon: getNumber(gps, 'lon') ?? null },
    links: getNested(estate, '_links') ?? {}
  };
}

/**
 * Reads listing pages from the sreality estates endpoint (apartments for rent).
 *
 * Every failure mode (network, timeout, caller abort, non-2xx, undecodable body) surfaces as
 * {@link UpstreamFetchError}.
 */
export function createSrealityClient(options: SrealityClientOptions): EstateSource {
  const logger = options.logger ?? console;

  async function fetchPage(page: number, signal?: AbortSignal): Promise<unknown[]> {
    const url = new URL(options.baseUrl);
    url.searchParams.set('category_sub_cb', CATEGORY_APARTMENT);
    url.searchParams.set('category_type_cb', TRANSACTION_RENT);
    url.searchParams.set('page', String(page));

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    const timer = setTimeout(onAbort, options.timeoutMs);
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': USER_AGENT
        },
        signal: controller.signal
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new UpstreamFetchError(`sreality request failed (${res.status}): ${text}`, { status: res.status });
      }

      return getEstateArray(await res.json());
    } catch (err) {
      if (err instanceof UpstreamFetchError) {
        logger.error('[sreality] HTTP error', { page, status: err.status, error: err.message });
        throw err;
      }

      let reason = errorMessage(err);
      if (signal?.aborted) reason = 'cancelled';
      else if (controller.signal.aborted) reason = `timed out after ${options.timeoutMs}ms`;

      logger.error('[sreality] request failed', { page, error: reason });
      throw new UpstreamFetchError(`sreality request failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  return { fetchPage };
}
