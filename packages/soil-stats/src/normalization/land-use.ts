/**
 * Land-use normalization
 *
 * Maps free-text land-use names (地类名称) onto the fixed two-level
 * structure in data/land-use.json. Lookup order:
 * 1. exact match on a child label or alias (or a childless primary's)
 * 2. keyword containment (园地, 林地, 草地)
 * 3. the explicit other/other bucket
 *
 * The exact-match table is built once at module load; results are memoized
 * per distinct raw string.
 */

import { z } from 'zod';
import type { LandUseClass, LandUsePrimary, LandUseSecondary } from '../core/types/observation.js';
import { GradingConfigError } from '../core/types/errors.js';
import { readDataJson } from '../core/data-files.js';

// ============================================================================
// Structure
// ============================================================================

const primaryIdSchema = z.enum(['cultivated', 'garden', 'forest', 'grassland', 'other']);
const secondaryIdSchema = z.enum([
  'paddy_field',
  'irrigated_land',
  'dry_land',
  'orchard',
  'tea_garden',
  'other_garden',
  'forest',
  'grassland',
  'other',
]);

const landUseFileSchema = z.object({
  version: z.number(),
  primaries: z.array(
    z.object({
      id: primaryIdSchema,
      label: z.string().min(1),
      aliases: z.array(z.string()),
      children: z.array(
        z.object({
          id: secondaryIdSchema,
          label: z.string().min(1),
          aliases: z.array(z.string()),
        })
      ),
    })
  ),
  containment: z.array(
    z.object({
      keyword: z.string().min(1),
      primary: primaryIdSchema,
      secondary: secondaryIdSchema,
    })
  ),
});

export interface LandUseNode {
  readonly id: LandUseSecondary;
  readonly label: string;
}

export interface LandUseCategory {
  readonly id: LandUsePrimary;
  readonly label: string;
  /** Empty for single-level categories */
  readonly children: readonly LandUseNode[];
}

/**
 * Secondary id of a category without subdivisions
 */
function singleLevelSecondary(id: LandUsePrimary): LandUseSecondary {
  switch (id) {
    case 'forest':
    case 'grassland':
    case 'other':
      return id;
    default:
      throw new GradingConfigError(`Land-use category ${id} must have subdivisions`, { id });
  }
}

const landUseFile = landUseFileSchema.parse(readDataJson('land-use.json'));

/** Fixed land-use structure, in report order */
export const LAND_USE_STRUCTURE: readonly LandUseCategory[] = Object.freeze(
  landUseFile.primaries.map((primary) =>
    Object.freeze({
      id: primary.id,
      label: primary.label,
      children: Object.freeze(primary.children.map(({ id, label }) => Object.freeze({ id, label }))),
    })
  )
);

const classCache = new Map<string, LandUseClass>();

function landUseClass(primary: LandUsePrimary, secondary: LandUseSecondary): LandUseClass {
  const key = `${primary}/${secondary}`;
  let cls = classCache.get(key);
  if (!cls) {
    cls = Object.freeze({ primary, secondary });
    classCache.set(key, cls);
  }
  return cls;
}

export const OTHER_LAND_USE: LandUseClass = landUseClass('other', 'other');

function lookupKey(raw: string): string {
  return raw.trim().toLowerCase();
}

const exactLookup: ReadonlyMap<string, LandUseClass> = (() => {
  const map = new Map<string, LandUseClass>();
  for (const primary of landUseFile.primaries) {
    if (primary.children.length === 0) {
      const cls = landUseClass(primary.id, singleLevelSecondary(primary.id));
      for (const name of [primary.label, ...primary.aliases]) {
        map.set(lookupKey(name), cls);
      }
      continue;
    }
    for (const child of primary.children) {
      const cls = landUseClass(primary.id, child.id);
      for (const name of [child.label, ...child.aliases]) {
        map.set(lookupKey(name), cls);
      }
    }
  }
  return map;
})();

const containmentRules = landUseFile.containment.map((rule) => ({
  keyword: rule.keyword,
  cls: landUseClass(rule.primary, rule.secondary),
}));

// ============================================================================
// Lookup
// ============================================================================

const memo = new Map<string, LandUseClass>();

/**
 * Normalize a raw land-use name. Blank input falls into other/other.
 */
export function normalizeLandUse(raw: string | null | undefined): LandUseClass {
  if (raw === null || raw === undefined) {
    return OTHER_LAND_USE;
  }
  const cached = memo.get(raw);
  if (cached) {
    return cached;
  }

  const key = lookupKey(raw);
  let cls = exactLookup.get(key);
  if (!cls) {
    cls = containmentRules.find((rule) => key.includes(rule.keyword))?.cls ?? OTHER_LAND_USE;
  }
  memo.set(raw, cls);
  return cls;
}

/**
 * Display label of a primary or secondary id
 */
export function landUseLabel(id: LandUsePrimary | LandUseSecondary): string {
  for (const category of LAND_USE_STRUCTURE) {
    if (category.id === id) return category.label;
    const child = category.children.find((node) => node.id === id);
    if (child) return child.label;
  }
  return id;
}
