/**
 * Soil taxonomy normalization
 *
 * Three levels: order (土类) → suborder (亚类) → family (土属). Rows missing a
 * suborder or family do not enter the soil-taxonomy dimension; a missing
 * order becomes 未分类. Known triples carry their position in
 * data/soil-taxonomy-order.json as sort index, unknown ones sort after all
 * known triples and lexicographically among themselves.
 */

import { z } from 'zod';
import type { SoilTaxonomyClass } from '../core/types/observation.js';
import { UNCLASSIFIED_SOIL_ORDER } from '../core/constants.js';
import { readDataJson } from '../core/data-files.js';
import { coerceText } from './coerce.js';

const soilOrderFileSchema = z.object({
  version: z.number(),
  triples: z.array(z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)])),
});

const tripleKey = (order: string, suborder: string, family: string): string =>
  `${order}\u0000${suborder}\u0000${family}`;

const knownTriples = soilOrderFileSchema.parse(readDataJson('soil-taxonomy-order.json')).triples;

const sortIndexByTriple: ReadonlyMap<string, number> = new Map(
  knownTriples.map(([order, suborder, family], index) => [tripleKey(order, suborder, family), index])
);

/** Sort index shared by every unknown triple */
export const UNKNOWN_SOIL_SORT_INDEX = sortIndexByTriple.size;

const memo = new Map<string, SoilTaxonomyClass>();

/**
 * Normalize raw taxonomy cells. Returns null when suborder or family is
 * missing.
 */
export function normalizeSoilTaxonomy(
  order: unknown,
  suborder: unknown,
  family: unknown
): SoilTaxonomyClass | null {
  const sub = coerceText(suborder);
  const fam = coerceText(family);
  if (sub === null || fam === null) {
    return null;
  }
  const ord = coerceText(order) ?? UNCLASSIFIED_SOIL_ORDER;

  const key = tripleKey(ord, sub, fam);
  let cls = memo.get(key);
  if (!cls) {
    cls = Object.freeze({
      order: ord,
      suborder: sub,
      family: fam,
      sortIndex: sortIndexByTriple.get(key) ?? UNKNOWN_SOIL_SORT_INDEX,
    });
    memo.set(key, cls);
  }
  return cls;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order by (sortIndex, order, suborder, family)
 */
export function compareSoilTaxonomy(a: SoilTaxonomyClass, b: SoilTaxonomyClass): number {
  return (
    a.sortIndex - b.sortIndex ||
    compareText(a.order, b.order) ||
    compareText(a.suborder, b.suborder) ||
    compareText(a.family, b.family)
  );
}
