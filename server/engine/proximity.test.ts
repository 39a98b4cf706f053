import { describe, it, expect } from 'vitest';
import {
  proximityJoin,
  proximityJoinByReference,
  resolveTarget,
  DEFAULT_MAX_DISTANCE_KM,
} from './proximity';
import { makeRecord, type RecordInit } from './records';
import { distanceKm } from './geo';
import { ValidationError } from './errors';

// ============================================================================
// TEST DATA
// ============================================================================

const EIFFEL = { latitude: 48.8584, longitude: 2.2945 };

const createPlace = (overrides: RecordInit = {}) =>
  makeRecord('place', {
    name: 'Test Place',
    latitude: 48.8584,
    longitude: 2.2945,
    extra: { category: 'attraction', city: 'paris' },
    ...overrides,
  });

const createListing = (overrides: RecordInit = {}) =>
  makeRecord('listing', {
    latitude: 48.86,
    longitude: 2.3,
    extra: { city: 'paris', price: 120 },
    ...overrides,
  });

// ============================================================================
// TESTS
// ============================================================================

describe('proximityJoin', () => {
  it('should rank the Louvre-side record ahead of the Hôtel de Ville one from the Eiffel Tower', () => {
    const candidates = [
      createPlace({ name: 'A', latitude: 48.8566, longitude: 2.3522 }),
      createPlace({ name: 'B', latitude: 48.8606, longitude: 2.3376 }),
    ];

    const result = proximityJoin(EIFFEL, candidates, { maxDistanceKm: 5, limit: 5 });

    expect(result.map((r) => r.name)).toEqual(['B', 'A']);
    for (const r of result) {
      expect(r.distanceKm).toBeGreaterThan(0);
      expect(r.distanceKm).toBeLessThan(5);
    }
    // about 3.16 km and 4.23 km
    expect(result[0].distanceKm).toBeCloseTo(3.16, 1);
    expect(result[1].distanceKm).toBeCloseTo(4.23, 1);
  });

  it('should exclude candidates beyond the radius', () => {
    const candidates = [
      createPlace({ name: 'A', latitude: 48.8566, longitude: 2.3522 }),
      createPlace({ name: 'B', latitude: 48.8606, longitude: 2.3376 }),
    ];

    expect(proximityJoin(EIFFEL, candidates, { maxDistanceKm: 4 }).map((r) => r.name)).toEqual(['B']);
    expect(proximityJoin(EIFFEL, candidates, { maxDistanceKm: 3 })).toEqual([]);
  });

  it('should honour radius, limit and ordering over a larger grid', () => {
    const candidates = Array.from({ length: 40 }, (_, i) =>
      createListing({
        id: i,
        latitude: 48.84 + (i % 8) * 0.005,
        longitude: 2.27 + Math.floor(i / 8) * 0.01,
      })
    );

    const result = proximityJoin(EIFFEL, candidates, { maxDistanceKm: 1.5, limit: 7 });

    expect(result.length).toBeLessThanOrEqual(7);
    expect(result.length).toBeGreaterThan(0);
    for (let i = 0; i < result.length; i++) {
      expect(result[i].distanceKm).toBeLessThanOrEqual(1.5);
      expect(result[i].distanceKm).toBe(distanceKm(EIFFEL, result[i]));
      if (i > 0) expect(result[i].distanceKm).toBeGreaterThanOrEqual(result[i - 1].distanceKm);
    }
  });

  it('should default to a 2 km radius and 5 results', () => {
    const candidates = Array.from({ length: 10 }, (_, i) =>
      createListing({ id: i, latitude: EIFFEL.latitude, longitude: EIFFEL.longitude })
    );

    const result = proximityJoin(EIFFEL, candidates);

    expect(DEFAULT_MAX_DISTANCE_KM).toBe(2);
    expect(result).toHaveLength(5);
    // equidistant candidates keep input order
    expect(result.map((r) => r.id)).toEqual([0, 1, 2, 3, 4]);
  });

  it('should skip candidates without coordinates', () => {
    const candidates = [
      createListing({ id: 1, latitude: null }),
      createListing({ id: 2, longitude: null }),
      createListing({ id: 3, latitude: Number.NaN }),
      createListing({ id: 4 }),
    ];

    expect(proximityJoin(EIFFEL, candidates).map((r) => r.id)).toEqual([4]);
  });

  it('should reject candidates with out-of-range coordinates', () => {
    const candidates = [createListing({ id: 9, latitude: 123 })];
    expect(() => proximityJoin(EIFFEL, candidates)).toThrow(ValidationError);
  });

  it('should reject a bad target or options', () => {
    const candidates = [createListing()];
    expect(() => proximityJoin({ latitude: -91, longitude: 0 }, candidates)).toThrow(ValidationError);
    expect(() => proximityJoin(EIFFEL, candidates, { maxDistanceKm: -1 })).toThrow(ValidationError);
    expect(() => proximityJoin(EIFFEL, candidates, { limit: 1.5 })).toThrow(ValidationError);
  });

  it('should annotate copies and leave the input untouched', () => {
    const listing = createListing({ id: 1 });
    const [annotated] = proximityJoin(EIFFEL, [listing]);

    expect(annotated).not.toBe(listing);
    expect('distanceKm' in listing).toBe(false);
    expect(annotated.extra).toEqual(listing.extra);
  });
});

describe('resolveTarget', () => {
  const places = [
    createPlace({ name: 'Eiffel Tower' }),
    createPlace({ name: 'Louvre Museum', latitude: 48.8606, longitude: 2.3376 }),
    createPlace({ name: 'Unmapped Garden', latitude: null, longitude: null }),
  ];

  it('should match names case-insensitively', () => {
    expect(resolveTarget({ name: '  louvre MUSEUM ' }, places)).toEqual({ latitude: 48.8606, longitude: 2.3376 });
  });

  it('should return null for unknown names or references without coordinates', () => {
    expect(resolveTarget({ name: 'Big Ben' }, places)).toBeNull();
    expect(resolveTarget({ name: 'Unmapped Garden' }, places)).toBeNull();
    expect(resolveTarget({}, places)).toBeNull();
  });

  it('should prefer explicit coordinates over a name', () => {
    const point = { latitude: 1, longitude: 2 };
    expect(resolveTarget({ name: 'Eiffel Tower', point }, places)).toEqual(point);
  });
});

describe('proximityJoinByReference', () => {
  const places = [
    createPlace({ id: 'p1', name: 'Eiffel Tower' }),
    createPlace({ id: 'p2', name: 'Louvre Museum', latitude: 48.8606, longitude: 2.3376 }),
  ];
  const listings = [
    createListing({ id: 'near-louvre', latitude: 48.861, longitude: 2.336 }),
    createListing({ id: 'near-eiffel', latitude: 48.857, longitude: 2.295 }),
  ];

  it('should find listings near a named attraction', () => {
    const result = proximityJoinByReference({ name: 'eiffel tower' }, places, listings);
    expect(result.map((r) => r.id)).toEqual(['near-eiffel']);
  });

  it('should find attractions near a listing with the collections swapped', () => {
    // coordinates of the 'near-louvre' listing
    const result = proximityJoinByReference({ point: { latitude: 48.861, longitude: 2.336 } }, [], places);
    expect(result.map((r) => r.id)).toEqual(['p2']);
  });

  it('should return an empty result for an unknown place', () => {
    expect(proximityJoinByReference({ name: 'Atlantis' }, places, listings)).toEqual([]);
  });
});
