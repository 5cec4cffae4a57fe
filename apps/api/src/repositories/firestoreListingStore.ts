import admin from 'firebase-admin';
import { ConstraintViolationError } from '../errors.js';
import type { Listing, ListingFilters, ListingStats, NewListing } from '../types.js';
import { compareNewestFirst, matchesFilters, summarize, type ListingStore } from './listingStore.js';

type Firestore = admin.firestore.Firestore;
type DocumentData = admin.firestore.DocumentData;

const LISTINGS = 'listings';
// Holds the last internal id handed out; listings are keyed by their external id.
const COUNTER_PATH = 'counters/listings';

function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (value instanceof admin.firestore.Timestamp) return value.toDate();
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  return new Date(0);
}

function nullableNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function fromDoc(data: DocumentData): Listing {
  const images: unknown = data.images;
  return {
    id: nullableNumber(data.id) ?? 0,
    externalId: nullableNumber(data.externalId) ?? 0,
    title: nullableString(data.title) ?? '',
    price: nullableNumber(data.price) ?? 0,
    priceUnit: nullableString(data.priceUnit) ?? '',
    locality: nullableString(data.locality) ?? '',
    sizeSqm: nullableNumber(data.sizeSqm),
    roomLayout: nullableString(data.roomLayout),
    hasGarage: data.hasGarage === true,
    latitude: nullableNumber(data.latitude),
    longitude: nullableNumber(data.longitude),
    images: Array.isArray(images) ? images.filter((v): v is string => typeof v === 'string') : [],
    createdAt: toDate(data.createdAt),
    updatedAt: toDate(data.updatedAt)
  };
}

function toDoc(listing: Listing): DocumentData {
  return { ...listing };
}

export interface FirestoreListingStoreOptions {
  now?: () => Date;
}

/**
 * Listing store backed by Firestore.
 *
 * Filtering and stats run in memory over the collection, which keeps the store free of
 * composite indexes. The `createdAt` range query relies on the default single-field index.
 */
export class FirestoreListingStore implements ListingStore {
  private readonly now: () => Date;

  constructor(private readonly db: Firestore, options: FirestoreListingStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    // Collections are created on first write.
  }

  async exists(externalId: number): Promise<boolean> {
    const snap = await this.listings().doc(String(externalId)).get();
    return snap.exists;
  }

  async insert(listing: NewListing): Promise<Listing> {
    const [stored] = await this.write([listing], true);
    return stored;
  }

  async insertMany(listings: NewListing[]): Promise<Listing[]> {
    return this.write(listings, false);
  }

  async getById(id: number): Promise<Listing | null> {
    const snap = await this.listings().where('id', '==', id).limit(1).get();
    if (snap.empty) return null;
    return fromDoc(snap.docs[0].data());
  }

  async queryFiltered(filters: ListingFilters, offset: number, limit: number): Promise<Listing[]> {
    const all = await this.loadAll();
    return all.filter((l) => matchesFilters(l, filters)).slice(offset, offset + limit);
  }

  async queryCreatedAfter(since: Date): Promise<Listing[]> {
    const snap = await this.listings().where('createdAt', '>=', since).orderBy('createdAt', 'desc').get();
    return snap.docs.map((d) => fromDoc(d.data())).sort(compareNewestFirst);
  }

  async stats(): Promise<ListingStats> {
    return summarize(await this.loadAll());
  }

  async ping(): Promise<void> {
    // Read-only check: attempt to read a non-existent doc.
    await this.db.doc('_health/ping').get();
  }

  async close(): Promise<void> {
    await this.db.terminate();
  }

  private listings() {
    return this.db.collection(LISTINGS);
  }

  private async loadAll(): Promise<Listing[]> {
    const snap = await this.listings().orderBy('createdAt', 'desc').get();
    return snap.docs.map((d) => fromDoc(d.data())).sort(compareNewestFirst);
  }

  private async write(listings: NewListing[], failOnDuplicate: boolean): Promise<Listing[]> {
    const batch = new Map<number, NewListing>();
    for (const listing of listings) {
      if (batch.has(listing.externalId)) {
        if (failOnDuplicate) throw new ConstraintViolationError(listing.externalId);
        continue;
      }
      batch.set(listing.externalId, listing);
    }
    const pending = [...batch.values()];
    if (pending.length === 0) return [];

    const counterRef = this.db.doc(COUNTER_PATH);
    const refs = pending.map((l) => this.listings().doc(String(l.externalId)));

    return this.db.runTransaction(async (tx) => {
      const counterSnap = await tx.get(counterRef);
      const snaps = await tx.getAll(...refs);

      const current: unknown = counterSnap.get('lastId');
      let lastId = typeof current === 'number' ? current : 0;
      const timestamp = this.now();
      const stored: Listing[] = [];

      snaps.forEach((snap, i) => {
        if (snap.exists) {
          if (failOnDuplicate) throw new ConstraintViolationError(pending[i].externalId);
          return;
        }
        lastId += 1;
        const listing: Listing = { ...pending[i], id: lastId, createdAt: timestamp, updatedAt: timestamp };
        tx.create(refs[i], toDoc(listing));
        stored.push(listing);
      });

      if (stored.length > 0) tx.set(counterRef, { lastId }, { merge: true });
      return stored;
    });
  }
}
