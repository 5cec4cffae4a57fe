import { vi } from 'vitest';
import type { NewListing } from '../src/types.js';

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Raw record shaped like one entry of sreality's `_embedded.estates`. */
export function rawEstate(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    hash_id: 1001,
    name: 'Pronájem bytu 2+kk 50 m²',
    price: 25000,
    price_czk: { value_raw: 25000, unit: 'za měsíc' },
    locality: 'Praha 5 - Smíchov',
    labels: ['Balkon'],
    labelsAll: [['cellar'], ['garage']],
    gps: { lat: 50.07, lon: 14.4 },
    _links: { images: [{ href: 'https://img.test/1001-a.jpg' }, { href: 'https://img.test/1001-b.jpg' }] },
    ...overrides
  };
}

export function newListing(overrides: Partial<NewListing> = {}): NewListing {
  return {
    externalId: 1,
    title: 'Pronájem bytu 2+kk 50 m²',
    price: 25000,
    priceUnit: 'za měsíc',
    locality: 'Praha 5',
    sizeSqm: 50,
    roomLayout: '2+kk',
    hasGarage: false,
    latitude: 50.07,
    longitude: 14.4,
    images: [],
    ...overrides
  };
}

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = new Date('2026-03-01T10:00:00.000Z')) {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}
