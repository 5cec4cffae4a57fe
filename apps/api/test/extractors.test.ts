import { describe, expect, it } from 'vitest';
import { extractImages, extractSizeAndLayout, hasGarage, isPragueLocality } from '../src/extractors.js';

describe('extractSizeAndLayout', () => {
  it('reads size and layout from a typical title', () => {
    expect(extractSizeAndLayout('Pronájem bytu 2+kk 54 m²')).toEqual({ sizeSqm: 54, roomLayout: '2+kk' });
  });

  it('accepts the no-break space used between number and unit', () => {
    expect(extractSizeAndLayout('Pronájem bytu 3+1 78\u00a0m²').sizeSqm).toBe(78);
  });

  it('returns null size when no m² figure is present', () => {
    expect(extractSizeAndLayout('Pronájem bytu 1+kk')).toEqual({ sizeSqm: null, roomLayout: '1+kk' });
  });

  it('returns null layout when there is no digit+word token', () => {
    expect(extractSizeAndLayout('Pronájem ateliéru 40 m²')).toEqual({ sizeSqm: 40, roomLayout: null });
  });

  it('returns nulls for a title with neither pattern', () => {
    expect(extractSizeAndLayout('Pronájem bytu')).toEqual({ sizeSqm: null, roomLayout: null });
  });

  it('takes only the first occurrence of each pattern', () => {
    expect(extractSizeAndLayout('2+1 65 m², or 3+kk 80 m²')).toEqual({ sizeSqm: 65, roomLayout: '2+1' });
  });

  it('captures layouts with non-ASCII word characters', () => {
    expect(extractSizeAndLayout('Byt 1+ložnice').roomLayout).toBe('1+ložnice');
  });

  it('does not treat m2 without the superscript as a size', () => {
    expect(extractSizeAndLayout('Byt 50 m2').sizeSqm).toBeNull();
  });
});

describe('isPragueLocality', () => {
  it.each(['Praha 5', 'Hlavní město Praha', 'Praze 10', 'Prague 2 - Vinohrady', 'Vinohradská, Praha 2 - Vinohrady'])(
    'matches %s',
    (locality) => {
      expect(isPragueLocality(locality)).toBe(true);
    }
  );

  it.each(['Brno', 'Ostrava', '', 'praha 5', 'PRAHA'])('rejects %s', (locality) => {
    expect(isPragueLocality(locality)).toBe(false);
  });
});

describe('hasGarage', () => {
  it('finds a keyword in the primary labels, ignoring case', () => {
    expect(hasGarage(['Balkon', 'GARÁŽ'], [])).toBe(true);
  });

  it('finds a keyword nested in the label groups', () => {
    expect(hasGarage([], [['cellar'], ['Parkování na ulici']])).toBe(true);
  });

  it('matches the parking_lots code and garage as substrings', () => {
    expect(hasGarage(['parking_lots'], [])).toBe(true);
    expect(hasGarage([], [['underground_garage']])).toBe(true);
  });

  it('is false when no label mentions parking', () => {
    expect(hasGarage(['Balkon', 'Výtah'], [['cellar', 'terrace']])).toBe(false);
  });

  it('is false for empty inputs', () => {
    expect(hasGarage([], [])).toBe(false);
  });
});

describe('extractImages', () => {
  it('returns href values in upstream order', () => {
    const links = {
      self: { href: '/cs/v2/estates/1' },
      images: [{ href: 'https://img.example/b.jpg' }, { href: 'https://img.example/a.jpg' }]
    };
    expect(extractImages(links)).toEqual(['https://img.example/b.jpg', 'https://img.example/a.jpg']);
  });

  it('returns an empty list when the images entry is missing', () => {
    expect(extractImages({ self: { href: '/x' } })).toEqual([]);
  });

  it('keeps duplicate URLs', () => {
    expect(extractImages({ images: [{ href: 'u1' }, { href: 'u1' }] })).toEqual(['u1', 'u1']);
  });

  it('skips elements without a string href', () => {
    const links = { images: [{ href: 'u1' }, { title: 'no link' }, 'u2', null, { href: 7 }, { href: 'u3' }] };
    expect(extractImages(links)).toEqual(['u1', 'u3']);
  });
});
