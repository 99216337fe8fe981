import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import { parseBands, parseDashboardQuery } from './dashboard.schema';

describe('parseBands', () => {
  it('defaults to the nearest band when omitted', () => {
    expect(parseBands(undefined)).toEqual(['0-10 km']);
  });

  it('reads an empty value as no bands', () => {
    expect(parseBands('')).toEqual([]);
  });

  it('splits and trims a comma separated list', () => {
    expect(parseBands('0-10 km, 20+ km')).toEqual(['0-10 km', '20+ km']);
  });

  it('rejects unknown labels', () => {
    expect(() => parseBands('0-10 km,5 km')).toThrow('Unknown distance band: 5 km');
  });
});

describe('parseDashboardQuery', () => {
  it('builds a config for an address origin with defaults', () => {
    expect(parseDashboardQuery({ address: ' Brugherio ' }, 'cycling-regular')).toEqual({
      origin: { kind: 'address', address: 'Brugherio' },
      filters: { bands: ['0-10 km'], general: false, montessori: false, support: false, query: undefined },
      routes: { enabled: true, profile: 'cycling-regular' },
    });
  });

  it('prefers coordinates and reads flags', () => {
    const config = parseDashboardQuery(
      {
        lat: '45.5531',
        lon: '9.3012',
        address: 'ignored',
        bands: '10-20 km',
        general: '1',
        montessori: 'false',
        support: 'true',
        routes: '0',
        profile: 'foot-walking',
        q: ' Monza ',
      },
      'cycling-regular',
    );
    expect(config).toEqual({
      origin: { kind: 'coordinates', lat: 45.5531, lon: 9.3012 },
      filters: { bands: ['10-20 km'], general: true, montessori: false, support: true, query: 'Monza' },
      routes: { enabled: false, profile: 'foot-walking' },
    });
  });

  it('requires a starting point', () => {
    expect(() => parseDashboardQuery({}, 'cycling-regular')).toThrow(ValidationError);
    expect(() => parseDashboardQuery({ address: '  ' }, 'cycling-regular')).toThrow(
      'Provide an address or lat and lon as the starting point',
    );
  });

  it('requires both coordinates', () => {
    expect(() => parseDashboardQuery({ lat: '45.5' }, 'cycling-regular')).toThrow(
      'Both lat and lon are required for a coordinate origin',
    );
  });

  it('rejects out of range coordinates and bad flags', () => {
    expect(() => parseDashboardQuery({ lat: '95', lon: '9' }, 'cycling-regular')).toThrow('Invalid query parameters');
    expect(() => parseDashboardQuery({ address: 'Monza', general: 'maybe' }, 'cycling-regular')).toThrow(
      'Invalid query parameters',
    );
    expect(() => parseDashboardQuery({ address: 'Monza', profile: 'rocket' }, 'cycling-regular')).toThrow(
      ValidationError,
    );
  });
});
