import type { BandColor, DistanceBand } from '../types';

/** Display order and legend colors. Must match backend/src/lib/distanceBands.ts */
export const BAND_OPTIONS: { band: DistanceBand; color: BandColor }[] = [
  { band: '0-10 km', color: 'green' },
  { band: '10-20 km', color: 'orange' },
  { band: '20+ km', color: 'red' },
];

export const ORIGIN_COLOR = '#c62828';

/** Toggle a band while keeping the display order. */
export function toggleBand(selected: readonly DistanceBand[], band: DistanceBand): DistanceBand[] {
  const next = new Set(selected);
  if (next.has(band)) next.delete(band);
  else next.add(band);
  return BAND_OPTIONS.map((o) => o.band).filter((b) => next.has(b));
}
