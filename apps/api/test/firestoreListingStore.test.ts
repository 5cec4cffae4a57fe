import admin from 'firebase-admin';
import { describe, expect, it } from 'vitest';
import { FirestoreListingStore } from '../src/repositories/firestoreListingStore.js';
import { FakeFirestore } from './fakeFirestore.js';
import { describeListingStoreContract } from './listingStoreContract.js';
import { newListing } from './helpers.js';

function asFirestore(fake: FakeFirestore): admin.firestore.Firestore {
  return fake as unknown as admin.firestore.Firestore;
}

describeListingStoreContract(
  'FirestoreListingStore',
  (now) => new FirestoreListingStore(asFirestore(new FakeFirestore()), { now })
);

describe('FirestoreListingStore', () => {
  it('hands out sequential internal ids across writes', async () => {
    const store = new FirestoreListingStore(asFirestore(new FakeFirestore()));

    const first = await store.insert(newListing({ externalId: 10 }));
    const batch = await store.insertMany([newListing({ externalId: 11 }), newListing({ externalId: 12 })]);

    expect([first.id, ...batch.map((l) => l.id)]).toEqual([1, 2, 3]);
  });

  it('does not advance the id counter when every listing already exists', async () => {
    const store = new FirestoreListingStore(asFirestore(new FakeFirestore()));
    await store.insert(newListing({ externalId: 10 }));

    expect(await store.insertMany([newListing({ externalId: 10 })])).toEqual([]);
    const next = await store.insert(newListing({ externalId: 11 }));
    expect(next.id).toBe(2);
  });

  it('keys documents by external id', async () => {
    const fake = new FakeFirestore();
    const store = new FirestoreListingStore(asFirestore(fake));
    await store.insert(newListing({ externalId: 777, title: 'Byt 2+1' }));

    const snap = await fake.doc('listings/777').get();
    expect(snap.exists).toBe(true);
    expect(snap.get('title')).toBe('Byt 2+1');
  });

  it('terminates the client on close', async () => {
    const fake = new FakeFirestore();
    await new FirestoreListingStore(asFirestore(fake)).close();
    expect(fake.terminated).toBe(true);
  });
});
