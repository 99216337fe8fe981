import type { BandColor, DistanceBand } from '../types';

export const DISTANCE_BANDS: readonly DistanceBand[] = ['0-10 km', '10-20 km', '20+ km'];

const BAND_COLORS: Record<DistanceBand, BandColor> = {
  '0-10 km': 'green',
  '10-20 km': 'orange',
  '20+ km': 'red',
};

/** Upper thresholds are inclusive: 10.0 is still "0-10 km". */
export function bandForDistance(km: number): DistanceBand {
  if (km <= 10) return '0-10 km';
  if (km <= 20) return '10-20 km';
  return '20+ km';
}

export function isDistanceBand(s: string): s is DistanceBand {
  return (DISTANCE_BANDS as readonly string[]).includes(s);
}

export function bandColor(label: string): BandColor {
  return isDistanceBand(label) ? BAND_COLORS[label] : 'gray';
}
