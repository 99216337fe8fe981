import { describe, it, expect } from 'vitest';
import { toggleBand } from './bands';

describe('toggleBand', () => {
  it('adds a band in display order', () => {
    expect(toggleBand(['20+ km'], '0-10 km')).toEqual(['0-10 km', '20+ km']);
  });

  it('removes a selected band', () => {
    expect(toggleBand(['0-10 km', '20+ km'], '0-10 km')).toEqual(['20+ km']);
  });

  it('can empty the selection', () => {
    expect(toggleBand(['10-20 km'], '10-20 km')).toEqual([]);
  });
});
