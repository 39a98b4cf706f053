import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createTransportClient,
  checkPlacesStatus,
  toTransportRecord,
  MAX_TRANSPORT_RESULTS,
} from './transportService';
import { ConfigurationError, TransientFetchError, ValidationError, createRetryPolicy } from '../engine';

const NO_RETRY = createRetryPolicy({ maxAttempts: 1 });

const jsonResponse = (body: unknown) =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });

const place = (id: string, lat = 48.85, lng = 2.35) => ({
  place_id: id,
  name: `Hub ${id}`,
  formatted_address: `${id} Street`,
  rating: 4.1,
  geometry: { location: { lat, lng } },
});

describe('checkPlacesStatus', () => {
  it('should accept OK and ZERO_RESULTS', () => {
    expect(() => checkPlacesStatus('OK')).not.toThrow();
    expect(() => checkPlacesStatus('ZERO_RESULTS')).not.toThrow();
  });

  it('should map Google status strings onto the error taxonomy', () => {
    expect(() => checkPlacesStatus('REQUEST_DENIED', 'bad key')).toThrow(ConfigurationError);
    expect(() => checkPlacesStatus('INVALID_REQUEST')).toThrow(ValidationError);
    expect(() => checkPlacesStatus('OVER_QUERY_LIMIT')).toThrow(TransientFetchError);
    expect(() => checkPlacesStatus('UNKNOWN_ERROR')).toThrow(TransientFetchError);
  });
});

describe('createTransportClient', () => {
  const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

  const respondPerQuery = (byQuery: Record<string, unknown>) => {
    fetchMock.mockImplementation(async (url: string) => {
      const query = new URL(url).searchParams.get('query') ?? '';
      const type = query.replace(/ in .*$/, '');
      return jsonResponse(byQuery[type] ?? { status: 'ZERO_RESULTS', results: [] });
    });
  };

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should run every query and keep the first occurrence of each place', async () => {
    respondPerQuery({
      'public transport': { status: 'OK', results: [place('p1'), place('p2')] },
      'bus station': { status: 'OK', results: [place('p2'), place('p3')] },
      'train station': { status: 'OK', results: [place('p4')] },
      airport: { status: 'OK', results: [place('p5', 49.0097, 2.5479)] },
    });
    const client = createTransportClient({ apiKey: 'test-secret', policy: NO_RETRY });

    const hubs = await client.getTransportation('Paris');

    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(hubs.map((h) => h.placeId)).toEqual(['p1', 'p2', 'p3', 'p4', 'p5']);
    expect(hubs[1].type).toBe('public transport');
    expect(hubs[4]).toEqual({
      placeId: 'p5',
      name: 'Hub p5',
      address: 'p5 Street',
      rating: 4.1,
      type: 'airport',
      latitude: 49.0097,
      longitude: 2.5479,
    });
  });

  it('should cap the result list', async () => {
    const batch = (prefix: string) => ({
      status: 'OK',
      results: [1, 2, 3, 4, 5].map((n) => place(`${prefix}${n}`)),
    });
    respondPerQuery({
      'public transport': batch('a'),
      'bus station': batch('b'),
      'train station': batch('c'),
      'metro station': batch('d'),
      airport: batch('e'),
    });
    const client = createTransportClient({ apiKey: 'test-secret', policy: NO_RETRY });

    const hubs = await client.getTransportation('Paris');

    expect(hubs).toHaveLength(MAX_TRANSPORT_RESULTS);
    expect(hubs[14].placeId).toBe('c5');
  });

  it('should retry each query on its own budget', async () => {
    let throttled = 0;
    fetchMock.mockImplementation(async (url: string) => {
      const query = new URL(url).searchParams.get('query') ?? '';
      if (query.startsWith('bus station') && throttled < 2) {
        throttled++;
        return jsonResponse({ status: 'OVER_QUERY_LIMIT' });
      }
      return jsonResponse({ status: 'OK', results: query.startsWith('bus station') ? [place('b1')] : [] });
    });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const client = createTransportClient({
      apiKey: 'test-secret',
      policy: createRetryPolicy({ maxAttempts: 3, baseDelaySeconds: 0.001, backoffMultiplier: 1 }),
    });

    const hubs = await client.getTransportation('Paris');

    expect(hubs.map((h) => h.placeId)).toEqual(['b1']);
    expect(fetchMock).toHaveBeenCalledTimes(7);
  });

  it('should give up on a query after the policy allows', async () => {
    respondPerQuery({ 'public transport': { status: 'UNKNOWN_ERROR' } });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const client = createTransportClient({
      apiKey: 'test-secret',
      policy: createRetryPolicy({ maxAttempts: 2, baseDelaySeconds: 0.001, backoffMultiplier: 1 }),
    });

    await expect(client.getTransportation('Paris')).rejects.toThrow(TransientFetchError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should list hubs near a point, nearest first', async () => {
    respondPerQuery({
      'train station': { status: 'OK', results: [place('gare', 48.8809, 2.3553), place('near', 48.8586, 2.2950)] },
      airport: { status: 'OK', results: [place('cdg', 49.0097, 2.5479)] },
    });
    const client = createTransportClient({ apiKey: 'test-secret', policy: NO_RETRY });

    const hubs = await client.getTransportationNear('Paris', { latitude: 48.8584, longitude: 2.2945 }, 5);

    expect(hubs.map((h) => h.id)).toEqual(['near']);
    expect(hubs[0].kind).toBe('transit');
    expect(hubs[0].distanceKm).toBeLessThan(0.1);
  });

  it('should surface a denied key as a configuration error', async () => {
    respondPerQuery({ 'public transport': { status: 'REQUEST_DENIED', error_message: 'API key invalid' } });
    const client = createTransportClient({ apiKey: 'test-secret', policy: NO_RETRY });

    await expect(client.getTransportation('Paris')).rejects.toThrow(ConfigurationError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should fetch place details', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        status: 'OK',
        result: {
          name: 'Gare du Nord',
          formatted_address: '18 Rue de Dunkerque, Paris',
          rating: 3.9,
          opening_hours: { open_now: true, weekday_text: ['Monday: Open 24 hours'] },
          geometry: { location: { lat: 48.8809, lng: 2.3553 } },
        },
      })
    );
    const client = createTransportClient({ apiKey: 'test-secret', policy: NO_RETRY });

    const detail = await client.getTransportDetail('gdn');

    expect(detail).toEqual({
      placeId: 'gdn',
      name: 'Gare du Nord',
      address: '18 Rue de Dunkerque, Paris',
      rating: 3.9,
      openingHours: ['Monday: Open 24 hours'],
      openNow: true,
      latitude: 48.8809,
      longitude: 2.3553,
    });
    expect(new URL(fetchMock.mock.calls[0][0]).searchParams.get('place_id')).toBe('gdn');
  });

  it('should require a Google Maps key', async () => {
    const client = createTransportClient({ policy: NO_RETRY });
    await expect(client.getTransportation('Paris')).rejects.toThrow('GOOGLE_MAPS_API_KEY is not configured');
  });
});

describe('toTransportRecord', () => {
  it('should produce a transit record usable by the proximity join', () => {
    const record = toTransportRecord({
      placeId: 'p1',
      name: 'Hub',
      address: null,
      rating: 4,
      type: 'metro station',
      latitude: 48.85,
      longitude: 2.35,
    });

    expect(record.kind).toBe('transit');
    expect(record.id).toBe('p1');
    expect(record.extra).toEqual({ address: null, rating: 4, type: 'metro station' });
  });
});
