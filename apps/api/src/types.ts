export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface Listing {
  id: number;
  externalId: number; // sreality hash_id

  title: string;
  price: number;
  priceUnit: string;
  locality: string;

  sizeSqm: number | null;
  roomLayout: string | null; // e.g. "2+kk"
  hasGarage: boolean;

  latitude: number | null;
  longitude: number | null;
  images: string[];

  createdAt: Date;
  updatedAt: Date;
}

export type NewListing = Omit<Listing, 'id' | 'createdAt' | 'updatedAt'>;

export interface ListingFilters {
  minPrice?: number;
  maxPrice?: number;
  minSize?: number;
  maxSize?: number;
  hasGarage?: boolean;
  roomLayout?: string;
}

export interface ListingStats {
  count: number;
  avgPrice: number;
  avgSize: number;
  countWithGarage: number;
}
