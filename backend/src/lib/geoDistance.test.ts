import { describe, it, expect } from 'vitest';
import { kmBetween, roundTo } from './geoDistance';

const BRUGHERIO = { lat: 45.5531, lon: 9.3012 };
const MONZA = { lat: 45.5901, lon: 9.2789 };
const LECCO = { lat: 45.8566, lon: 9.3977 };

describe('kmBetween', () => {
  it('is zero for identical points', () => {
    expect(kmBetween(BRUGHERIO, BRUGHERIO)).toBe(0);
    expect(kmBetween({ lat: -33.9, lon: 151.2 }, { lat: -33.9, lon: 151.2 })).toBe(0);
  });

  it('is symmetric', () => {
    expect(kmBetween(BRUGHERIO, LECCO)).toBeCloseTo(kmBetween(LECCO, BRUGHERIO), 9);
    expect(kmBetween(MONZA, { lat: -10, lon: 170 })).toBeCloseTo(kmBetween({ lat: -10, lon: 170 }, MONZA), 9);
  });

  it('uses a 6371 km earth radius', () => {
    // one degree along a meridian or the equator
    expect(kmBetween({ lat: 0, lon: 0 }, { lat: 1, lon: 0 })).toBeCloseTo(111.19493, 4);
    expect(kmBetween({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(111.19493, 4);
  });

  it('measures short local distances', () => {
    expect(kmBetween(BRUGHERIO, MONZA)).toBeCloseTo(4.4654, 3);
    expect(kmBetween(BRUGHERIO, LECCO)).toBeCloseTo(34.5696, 3);
  });

  it('handles antipodal points', () => {
    expect(kmBetween({ lat: 0, lon: 0 }, { lat: 0, lon: 180 })).toBeCloseTo(Math.PI * 6371, 6);
  });
});

describe('roundTo', () => {
  it('rounds to the given number of decimals', () => {
    expect(roundTo(12.4166, 1)).toBe(12.4);
    expect(roundTo(3.456, 1)).toBe(3.5);
    expect(roundTo(8.299999999, 2)).toBe(8.3);
    expect(roundTo(7, 2)).toBe(7);
  });
});
