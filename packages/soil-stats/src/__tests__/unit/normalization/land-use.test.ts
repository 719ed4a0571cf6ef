/**
 * Land-use normalization
 */

import { describe, it, expect } from 'vitest';
import {
  LAND_USE_STRUCTURE,
  OTHER_LAND_USE,
  landUseLabel,
  normalizeLandUse,
} from '../../../normalization/land-use.js';

describe('normalizeLandUse', () => {
  it('should map secondary class names exactly', () => {
    expect(normalizeLandUse('水田')).toEqual({ primary: 'cultivated', secondary: 'paddy_field' });
    expect(normalizeLandUse('水浇地')).toEqual({ primary: 'cultivated', secondary: 'irrigated_land' });
    expect(normalizeLandUse(' 旱地 ')).toEqual({ primary: 'cultivated', secondary: 'dry_land' });
    expect(normalizeLandUse('果园')).toEqual({ primary: 'garden', secondary: 'orchard' });
    expect(normalizeLandUse('茶园')).toEqual({ primary: 'garden', secondary: 'tea_garden' });
    expect(normalizeLandUse('其他园地')).toEqual({ primary: 'garden', secondary: 'other_garden' });
  });

  it('should match aliases case-insensitively', () => {
    expect(normalizeLandUse('Paddy')).toEqual({ primary: 'cultivated', secondary: 'paddy_field' });
    expect(normalizeLandUse('DRY LAND')).toEqual({ primary: 'cultivated', secondary: 'dry_land' });
    expect(normalizeLandUse('Forest')).toEqual({ primary: 'forest', secondary: 'forest' });
  });

  it('should fall back to keyword containment', () => {
    expect(normalizeLandUse('可调整园地')).toEqual({ primary: 'garden', secondary: 'other_garden' });
    expect(normalizeLandUse('有林地')).toEqual({ primary: 'forest', secondary: 'forest' });
    expect(normalizeLandUse('天然牧草地')).toEqual({ primary: 'grassland', secondary: 'grassland' });
  });

  it('should put blank and unknown names in other/other', () => {
    expect(normalizeLandUse(null)).toBe(OTHER_LAND_USE);
    expect(normalizeLandUse(undefined)).toBe(OTHER_LAND_USE);
    expect(normalizeLandUse('建设用地')).toBe(OTHER_LAND_USE);
    expect(OTHER_LAND_USE).toEqual({ primary: 'other', secondary: 'other' });
  });

  it('should return the same frozen object for the same class', () => {
    const a = normalizeLandUse('水田');
    const b = normalizeLandUse('paddy field');
    expect(a).toBe(b);
    expect(Object.isFrozen(a)).toBe(true);
  });
});

describe('LAND_USE_STRUCTURE', () => {
  it('should list the fixed categories in report order', () => {
    expect(LAND_USE_STRUCTURE.map((category) => category.id)).toEqual([
      'cultivated',
      'garden',
      'forest',
      'grassland',
      'other',
    ]);
    expect(LAND_USE_STRUCTURE[0].children.map((child) => child.label)).toEqual(['水田', '水浇地', '旱地']);
    expect(LAND_USE_STRUCTURE[2].children).toEqual([]);
  });

  it('should resolve display labels of both levels', () => {
    expect(landUseLabel('cultivated')).toBe('耕地');
    expect(landUseLabel('tea_garden')).toBe('茶园');
    expect(landUseLabel('grassland')).toBe('草地');
  });
});
