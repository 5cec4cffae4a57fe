import type { Env } from './env.js';
import { parseDatabaseUrl } from './env.js';
import { getFirestore } from './firebase.js';
import { FirestoreListingStore } from './repositories/firestoreListingStore.js';
import type { ListingStore } from './repositories/listingStore.js';
import { SqliteListingStore } from './repositories/sqliteListingStore.js';

export function createListingStore(env: Env): ListingStore {
  const target = parseDatabaseUrl(env.DATABASE_URL);

  if (target.kind === 'sqlite') {
    return new SqliteListingStore(target.filename);
  }

  const db = getFirestore({
    projectId: target.projectId ?? env.FIREBASE_PROJECT_ID,
    serviceAccountJson: env.FIREBASE_SERVICE_ACCOUNT_JSON,
    serviceAccountPath: env.FIREBASE_SERVICE_ACCOUNT_PATH
  });
  return new FirestoreListingStore(db);
}
