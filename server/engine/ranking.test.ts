import { describe, it, expect } from 'vitest';
import { rankDefault, rankWithPreferences, rankNearPlace, sortDirectionFor } from './ranking';
import { makeRecord, type FieldValue, type RecordInit } from './records';
import { distanceKm } from './geo';
import { ValidationError } from './errors';

// ============================================================================
// TEST DATA
// ============================================================================

const createListing = (id: number, extra: Record<string, FieldValue> = {}, overrides: RecordInit = {}) =>
  makeRecord('listing', {
    id,
    latitude: 48.86,
    longitude: 2.3,
    extra: { city: 'paris', ...extra },
    ...overrides,
  });

const createPlace = (name: string, extra: Record<string, FieldValue> = {}, overrides: RecordInit = {}) =>
  makeRecord('place', {
    name,
    latitude: 48.8584,
    longitude: 2.2945,
    extra: { category: 'attraction', city: 'paris', ...extra },
    ...overrides,
  });

const ids = (records: ReadonlyArray<{ id: string | number | null }>) => records.map((r) => r.id);

// Ten listings, four of them some spelling of "entire".
const TEN_LISTINGS = [
  createListing(1, { roomType: 'Private room', price: 80, personCapacity: 2, hostIsSuperhost: false }),
  createListing(2, { roomType: 'Entire home/apt', price: 150, personCapacity: 4, hostIsSuperhost: true }),
  createListing(3, { roomType: 'Shared room', price: 40, personCapacity: 1, hostIsSuperhost: false }),
  createListing(4, { roomType: 'entire home/apt', price: 95, personCapacity: 2, hostIsSuperhost: true }),
  createListing(5, { roomType: 'Private room', price: 70, personCapacity: 2, hostIsSuperhost: false }),
  createListing(6, { roomType: 'Entire home/apt', price: 210, personCapacity: 6, hostIsSuperhost: false }),
  createListing(7, { roomType: 'Hotel room', price: 130, personCapacity: 2, hostIsSuperhost: true }),
  createListing(8, { roomType: 'Entire Home/Apt', price: 120, personCapacity: 3, hostIsSuperhost: false }),
  createListing(9, { roomType: 'Private room', price: 60, personCapacity: 1, hostIsSuperhost: true }),
  createListing(10, { roomType: 'Shared room', price: 35, personCapacity: 1, hostIsSuperhost: false }),
];

// ============================================================================
// DEFAULT RANKING
// ============================================================================

describe('rankDefault', () => {
  it('should break ties key by key in the fixed lodging order', () => {
    const records = [
      createListing(1, { overallRating: 4.7, reputationScore: 80, cleanliness: 9 }),
      createListing(2, { overallRating: null }),
      createListing(3, { overallRating: 4.9, reputationScore: 10 }),
      createListing(4, { overallRating: 4.7, reputationScore: 95 }),
      createListing(5, { overallRating: 4.7, reputationScore: 80, cleanliness: 10 }),
    ];

    expect(ids(rankDefault(records, 10))).toEqual([3, 4, 5, 1, 2]);
  });

  it('should rank distance-type keys ascending', () => {
    const base = { overallRating: 4.5, reputationScore: 90, cleanliness: 9, walkScore: 80 };
    const records = [
      createListing(1, { ...base, distanceToCityCenter: 2.5, distanceToMetro: 0.2 }),
      createListing(2, { ...base, distanceToCityCenter: 1.0, distanceToMetro: 0.9 }),
      createListing(3, { ...base, distanceToCityCenter: 1.0, distanceToMetro: 0.3 }),
    ];

    expect(ids(rankDefault(records))).toEqual([3, 2, 1]);
  });

  it('should be stable for records equal on every key', () => {
    const a = createListing(1, { overallRating: 4.5, reputationScore: 90 });
    const b = createListing(2, { overallRating: 4.5, reputationScore: 90 });

    expect(ids(rankDefault([a, b]))).toEqual([1, 2]);
    expect(ids(rankDefault([b, a]))).toEqual([2, 1]);
  });

  it('should truncate to topN after sorting', () => {
    const records = [1, 2, 3, 4, 5, 6, 7].map((i) => createListing(i, { overallRating: i }));
    expect(ids(rankDefault(records))).toEqual([7, 6, 5, 4, 3]);
    expect(ids(rankDefault(records, 2))).toEqual([7, 6]);
  });

  it('should use the attraction table for places', () => {
    const records = [
      createPlace('Musée B', { rating: 4.5, ticketPrice: 17 }),
      createPlace('Musée A', { rating: 4.5, ticketPrice: 17 }),
      createPlace('Tower', { rating: 4.8, ticketPrice: 29 }),
      createPlace('Garden', { rating: 4.5, ticketPrice: 0 }),
    ];

    expect(rankDefault(records).map((r) => r.name)).toEqual(['Tower', 'Garden', 'Musée A', 'Musée B']);
  });

  it('should not mutate the input', () => {
    const records = [createListing(1, { overallRating: 1 }), createListing(2, { overallRating: 5 })];
    const snapshot = [...records];

    const ranked = rankDefault(records);

    expect(ranked).not.toBe(records);
    expect(records).toEqual(snapshot);
    expect(ids(records)).toEqual([1, 2]);
  });

  it('should return [] for no records and reject unrankable kinds', () => {
    expect(rankDefault([])).toEqual([]);
    const event = makeRecord('event', { name: 'Concert' });
    expect(() => rankDefault([event])).toThrow(ValidationError);
    expect(() => rankDefault([createListing(1), createPlace('Tower')])).toThrow(ValidationError);
  });
});

// ============================================================================
// PREFERENCE RANKING
// ============================================================================

describe('rankWithPreferences', () => {
  it('should return entire homes cheapest first', () => {
    const result = rankWithPreferences(TEN_LISTINGS, {
      filters: { room_type: 'entire' },
      sortKey: 'price',
      topN: 3,
    });

    expect(ids(result)).toEqual([4, 8, 2]);
    expect(result.map((r) => r.extra.price)).toEqual([95, 120, 150]);
  });

  it('should return the input order truncated when there is nothing to apply', () => {
    expect(rankWithPreferences(TEN_LISTINGS)).toEqual(TEN_LISTINGS.slice(0, 5));
    expect(rankWithPreferences(TEN_LISTINGS, { filters: {}, sortKey: null, topN: 8 })).toEqual(
      TEN_LISTINGS.slice(0, 8)
    );
  });

  it('should ignore filters on fields no record has', () => {
    const result = rankWithPreferences(TEN_LISTINGS, {
      filters: { room_type: 'entire', wifi_speed: 100 },
      topN: 10,
    });
    expect(ids(result)).toEqual([2, 4, 6, 8]);
  });

  it('should apply exact equality to numeric and boolean fields', () => {
    expect(ids(rankWithPreferences(TEN_LISTINGS, { filters: { personCapacity: 2 }, topN: 10 }))).toEqual([1, 4, 5, 7]);
    expect(ids(rankWithPreferences(TEN_LISTINGS, { filters: { person_capacity: '1' }, topN: 10 }))).toEqual([3, 9, 10]);
    expect(ids(rankWithPreferences(TEN_LISTINGS, { filters: { hostIsSuperhost: 'true' }, topN: 10 }))).toEqual([2, 4, 7, 9]);
  });

  it('should reject a non-numeric value for a numeric filter', () => {
    expect(() => rankWithPreferences(TEN_LISTINGS, { filters: { price: 'cheap' } })).toThrow(ValidationError);
  });

  it('should filter before truncating', () => {
    const result = rankWithPreferences(TEN_LISTINGS, { filters: { roomType: 'ROOM' }, topN: 2 });
    expect(ids(result)).toEqual([1, 3]);
  });

  it('should rank non-ascending keys descending with missing values last', () => {
    const records = [
      createListing(1, { overallRating: 4.1 }),
      createListing(2, { overallRating: null }),
      createListing(3, { overallRating: 4.9 }),
      createListing(4),
      createListing(5, { overallRating: 4.5 }),
    ];

    expect(ids(rankWithPreferences(records, { sortKey: 'overall_rating' }))).toEqual([3, 5, 1, 2, 4]);
  });

  it('should keep the filtered order when no record has the sort key', () => {
    const result = rankWithPreferences(TEN_LISTINGS, { filters: { roomType: 'private' }, sortKey: 'elevation' });
    expect(ids(result)).toEqual([1, 5, 9]);
  });

  it('should reject a sort key that mixes text and numbers', () => {
    const records = [createListing(1, { score: 'high' }), createListing(2, { score: 3 })];
    expect(() => rankWithPreferences(records, { sortKey: 'score' })).toThrow(ValidationError);
  });

  it('should infer direction from the ascending table', () => {
    expect(sortDirectionFor('price')).toBe('asc');
    expect(sortDirectionFor('distance_to_metro')).toBe('asc');
    expect(sortDirectionFor('distanceKm')).toBe('asc');
    expect(sortDirectionFor('overallRating')).toBe('desc');
    expect(sortDirectionFor('walk_score')).toBe('desc');
  });
});

// ============================================================================
// NEAR-PLACE RANKING
// ============================================================================

describe('rankNearPlace', () => {
  const EIFFEL = { latitude: 48.8584, longitude: 2.2945 };
  const places = [
    createPlace('Eiffel Tower'),
    createPlace('Louvre Museum', {}, { latitude: 48.8606, longitude: 2.3376 }),
  ];
  // roughly 0.18 km, 0.50 km, 0.84 km and 3.16 km from the tower
  const listings = [
    createListing(3, { roomType: 'Entire home/apt', price: 60 }, { latitude: 48.865, longitude: 2.3 }),
    createListing(99, { roomType: 'Entire home/apt', price: 10 }, { latitude: 48.8606, longitude: 2.3376 }),
    createListing(1, { roomType: 'Entire home/apt', price: 200 }, { latitude: 48.86, longitude: 2.295 }),
    createListing(2, { roomType: 'Private room', price: 90 }, { latitude: 48.855, longitude: 2.29 }),
  ];

  it('should order by distance when no preferences are given', () => {
    const result = rankNearPlace(listings, places, { name: 'Eiffel Tower' });
    expect(ids(result)).toEqual([1, 2, 3]);
  });

  it('should keep distance order after filtering', () => {
    const result = rankNearPlace(listings, places, { name: 'eiffel tower' }, { filters: { room_type: 'entire' } });
    expect(ids(result)).toEqual([1, 3]);
  });

  it('should sort by the requested key', () => {
    const result = rankNearPlace(listings, places, { name: 'Eiffel Tower' }, { sortKey: 'price' });
    expect(ids(result)).toEqual([3, 2, 1]);
  });

  it('should carry the join distances through unchanged', () => {
    const result = rankNearPlace(listings, places, { name: 'Eiffel Tower' }, { sortKey: 'distance_km' });
    expect(ids(result)).toEqual([1, 2, 3]);
    for (const r of result) {
      expect(r.distanceKm).toBe(distanceKm(EIFFEL, r));
    }
  });

  it('should widen the radius on request and truncate last', () => {
    const result = rankNearPlace(listings, places, { point: EIFFEL }, { maxDistanceKm: 5, topN: 4 });
    expect(ids(result)).toEqual([1, 2, 3, 99]);
    expect(ids(rankNearPlace(listings, places, { point: EIFFEL }, { topN: 2 }))).toEqual([1, 2]);
  });

  it('should return [] for an unknown place', () => {
    expect(rankNearPlace(listings, places, { name: 'Atlantis' })).toEqual([]);
  });
});
