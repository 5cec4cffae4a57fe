import fs from 'node:fs';
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from 'sql.js';
import { ConstraintViolationError } from '../errors.js';
import type { Listing, ListingFilters, ListingStats, NewListing } from '../types.js';
import { roundTo2, type ListingStore } from './listingStore.js';

type Row = Record<string, SqlValue>;

const MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS listings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    external_id INTEGER NOT NULL,
    title TEXT NOT NULL,
    price INTEGER NOT NULL DEFAULT 0,
    price_unit TEXT NOT NULL,
    locality TEXT NOT NULL,
    size_sqm INTEGER,
    room_layout TEXT,
    has_garage INTEGER NOT NULL DEFAULT 0,
    latitude REAL,
    longitude REAL,
    images TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS listings_external_id_unique ON listings (external_id);
  CREATE INDEX IF NOT EXISTS listings_created_at_idx ON listings (created_at);
`;

const COLUMNS =
  'external_id, title, price, price_unit, locality, size_sqm, room_layout, has_garage, latitude, longitude, images, created_at, updated_at';
const PLACEHOLDERS = COLUMNS.split(',')
  .map(() => '?')
  .join(', ');

const INSERT = `INSERT INTO listings (${COLUMNS}) VALUES (${PLACEHOLDERS})`;
const NEWEST_FIRST = 'ORDER BY created_at DESC, id DESC';

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  // CommonJS package: under NodeNext the initializer is reached through `default`
  if (!engine) engine = initSqlJs.default();
  return engine;
}

function numberColumn(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') throw new Error(`Column ${column} is not a number`);
  return value;
}

function textColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw new Error(`Column ${column} is not text`);
  return value;
}

function nullableNumber(row: Row, column: string): number | null {
  return row[column] === null ? null : numberColumn(row, column);
}

function nullableText(row: Row, column: string): string | null {
  return row[column] === null ? null : textColumn(row, column);
}

function parseImages(json: string): string[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

function fromRow(row: Row): Listing {
  return {
    id: numberColumn(row, 'id'),
    externalId: numberColumn(row, 'external_id'),
    title: textColumn(row, 'title'),
    price: numberColumn(row, 'price'),
    priceUnit: textColumn(row, 'price_unit'),
    locality: textColumn(row, 'locality'),
    sizeSqm: nullableNumber(row, 'size_sqm'),
    roomLayout: nullableText(row, 'room_layout'),
    hasGarage: numberColumn(row, 'has_garage') === 1,
    latitude: nullableNumber(row, 'latitude'),
    longitude: nullableNumber(row, 'longitude'),
    images: parseImages(textColumn(row, 'images')),
    createdAt: new Date(textColumn(row, 'created_at')),
    updatedAt: new Date(textColumn(row, 'updated_at'))
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith('UNIQUE constraint failed');
}

function queryRows(db: Database, sql: string, params: SqlValue[] = []): Row[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: Row[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

export interface SqliteListingStoreOptions {
  now?: () => Date;
}

/**
 * SQLite store running on the sql.js engine. A file-backed database is loaded in `init()`
 * and written back after every committed write; `:memory:` never touches disk.
 */
export class SqliteListingStore implements ListingStore {
  private db: Database | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly filename: string,
    options: SqliteListingStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    if (!this.db) {
      const SQL = await loadEngine();
      const persisted = this.filename !== MEMORY && fs.existsSync(this.filename);
      this.db = new SQL.Database(persisted ? fs.readFileSync(this.filename) : null);
    }
    this.db.exec(SCHEMA);
    this.persist();
  }

  async exists(externalId: number): Promise<boolean> {
    return queryRows(this.database(), 'SELECT 1 AS found FROM listings WHERE external_id = ?', [externalId]).length > 0;
  }

  async insert(listing: NewListing): Promise<Listing> {
    let rows: Row[];
    try {
      rows = queryRows(this.database(), `${INSERT} RETURNING *`, this.toParams(listing));
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConstraintViolationError(listing.externalId);
      throw err;
    }
    const [row] = rows;
    if (!row) throw new Error(`Insert of listing ${listing.externalId} returned no row`);
    this.persist();
    return fromRow(row);
  }

  async insertMany(listings: NewListing[]): Promise<Listing[]> {
    if (listings.length === 0) return [];

    const db = this.database();
    const stored: Listing[] = [];
    db.exec('BEGIN');
    try {
      for (const listing of listings) {
        const [row] = queryRows(db, `${INSERT} ON CONFLICT (external_id) DO NOTHING RETURNING *`, this.toParams(listing));
        if (row) stored.push(fromRow(row));
      }
      db.exec('COMMIT');
    } catch (err) {
      db.exec('ROLLBACK');
      throw err;
    }

    this.persist();
    return stored;
  }

  async getById(id: number): Promise<Listing | null> {
    const [row] = queryRows(this.database(), 'SELECT * FROM listings WHERE id = ?', [id]);
    return row ? fromRow(row) : null;
  }

  async queryFiltered(filters: ListingFilters, offset: number, limit: number): Promise<Listing[]> {
    const conditions: string[] = [];
    const params: SqlValue[] = [];

    if (filters.minPrice !== undefined) {
      conditions.push('price >= ?');
      params.push(filters.minPrice);
    }
    if (filters.maxPrice !== undefined) {
      conditions.push('price <= ?');
      params.push(filters.maxPrice);
    }
    if (filters.minSize !== undefined) {
      conditions.push('size_sqm >= ?');
      params.push(filters.minSize);
    }
    if (filters.maxSize !== undefined) {
      conditions.push('size_sqm <= ?');
      params.push(filters.maxSize);
    }
    if (filters.hasGarage !== undefined) {
      conditions.push('has_garage = ?');
      params.push(filters.hasGarage ? 1 : 0);
    }
    if (filters.roomLayout !== undefined) {
      conditions.push('room_layout = ?');
      params.push(filters.roomLayout);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = queryRows(this.database(), `SELECT * FROM listings ${where} ${NEWEST_FIRST} LIMIT ? OFFSET ?`, [
      ...params,
      limit,
      offset
    ]);
    return rows.map(fromRow);
  }

  async queryCreatedAfter(since: Date): Promise<Listing[]> {
    const rows = queryRows(this.database(), `SELECT * FROM listings WHERE created_at >= ? ${NEWEST_FIRST}`, [
      since.toISOString()
    ]);
    return rows.map(fromRow);
  }

  async stats(): Promise<ListingStats> {
    const [row] = queryRows(
      this.database(),
      `SELECT
         COUNT(*) AS count,
         COALESCE(AVG(price), 0) AS avg_price,
         COALESCE(AVG(size_sqm), 0) AS avg_size,
         COALESCE(SUM(has_garage), 0) AS count_with_garage
       FROM listings`
    );
    if (!row) return { count: 0, avgPrice: 0, avgSize: 0, countWithGarage: 0 };

    return {
      count: numberColumn(row, 'count'),
      avgPrice: roundTo2(numberColumn(row, 'avg_price')),
      avgSize: roundTo2(numberColumn(row, 'avg_size')),
      countWithGarage: numberColumn(row, 'count_with_garage')
    };
  }

  async ping(): Promise<void> {
    this.database().exec('SELECT 1');
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private database(): Database {
    if (!this.db) throw new Error('SqliteListingStore used before init()');
    return this.db;
  }

  private persist(): void {
    if (this.filename === MEMORY || !this.db) return;
    fs.writeFileSync(this.filename, this.db.export());
  }

  private toParams(listing: NewListing): SqlValue[] {
    const timestamp = this.now().toISOString();
    return [
      listing.externalId,
      listing.title,
      listing.price,
      listing.priceUnit,
      listing.locality,
      listing.sizeSqm,
      listing.roomLayout,
      listing.hasGarage ? 1 : 0,
      listing.latitude,
      listing.longitude,
      JSON.stringify(listing.images),
      timestamp,
      timestamp
    ];
  }
}
