import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().optional(),

  DATABASE_URL: z.string().min(1).default('sqlite:./apartments.db'),

  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional(),

  SREALITY_API_BASE_URL: z.string().url().default('https://www.sreality.cz/api/cs/v2/estates'),
  CRAWL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  FETCH_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}

export type StorageTarget =
  | { kind: 'sqlite'; filename: string }
  | { kind: 'firestore'; projectId?: string };

const MEMORY = ':memory:';

/**
 * Resolves `DATABASE_URL` into a storage backend.
 *
 * `sqlite:./apartments.db`, `sqlite:///./apartments.db` and `sqlite::memory:` select the
 * embedded database; `firestore:` or `firestore://<projectId>` select Firestore.
 */
export function parseDatabaseUrl(url: string): StorageTarget {
  const trimmed = url.trim();
  if (trimmed === MEMORY) return { kind: 'sqlite', filename: MEMORY };

  const match = /^([a-z][a-z0-9+.-]*):(.*)$/i.exec(trimmed);
  if (!match) {
    throw new Error(`Unsupported DATABASE_URL scheme: ${url}`);
  }

  const scheme = match[1].toLowerCase();
  const rest = match[2];

  if (scheme === 'sqlite') {
    // sqlite:///relative.db and sqlite://relative.db both mean a path relative to cwd
    const filename = rest.replace(/^\/\/\/?/, '');
    if (!filename) throw new Error('DATABASE_URL is missing a sqlite file path');
    return { kind: 'sqlite', filename };
  }

  if (scheme === 'firestore') {
    const projectId = rest.replace(/^\/\//, '').replace(/\/+$/, '');
    return projectId ? { kind: 'firestore', projectId } : { kind: 'firestore' };
  }

  throw new Error(`Unsupported DATABASE_URL scheme: ${scheme}`);
}
