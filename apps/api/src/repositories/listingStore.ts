import type { Listing, ListingFilters, ListingStats, NewListing } from '../types.js';

export interface ListingStore {
  /** Creates tables and indexes when they are missing. */
  init(): Promise<void>;
  exists(externalId: number): Promise<boolean>;
  /** Throws ConstraintViolationError when the external id is already stored. */
  insert(listing: NewListing): Promise<Listing>;
  /**
   * Inserts all listings whose external id is not yet stored, in one atomic write.
   * Returns only the rows that were actually added.
   */
  insertMany(listings: NewListing[]): Promise<Listing[]>;
  getById(id: number): Promise<Listing | null>;
  queryFiltered(filters: ListingFilters, offset: number, limit: number): Promise<Listing[]>;
  queryCreatedAfter(since: Date): Promise<Listing[]>;
  stats(): Promise<ListingStats>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function withinRange(value: number | null, min?: number, max?: number): boolean {
  if (min === undefined && max === undefined) return true;
  if (value === null) return false;
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

export function matchesFilters(listing: Listing, filters: ListingFilters): boolean {
  if (!withinRange(listing.price, filters.minPrice, filters.maxPrice)) return false;
  if (!withinRange(listing.sizeSqm, filters.minSize, filters.maxSize)) return false;
  if (filters.hasGarage !== undefined && listing.hasGarage !== filters.hasGarage) return false;
  if (filters.roomLayout !== undefined && listing.roomLayout !== filters.roomLayout) return false;
  return true;
}

export function compareNewestFirst(a: Listing, b: Listing): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

export function summarize(listings: readonly Listing[]): ListingStats {
  const sizes = listings.map((l) => l.sizeSqm).filter((s): s is number => s !== null);
  const totalPrice = listings.reduce((sum, l) => sum + l.price, 0);
  const totalSize = sizes.reduce((sum, s) => sum + s, 0);

  return {
    count: listings.length,
    avgPrice: listings.length > 0 ? roundTo2(totalPrice / listings.length) : 0,
    avgSize: sizes.length > 0 ? roundTo2(totalSize / sizes.length) : 0,
    countWithGarage: listings.filter((l) => l.hasGarage).length
  };
}
