/**
 * Column resolution
 *
 * Maps arbitrary source headers to attribute keys of a grading standard and
 * locates the dimension columns (region, land use, soil taxonomy, area).
 *
 * Attribute headers: alias table (exact after trimming), then exact key,
 * then case-insensitive key. Dimension columns: first candidate name that
 * matches a header case-insensitively, in candidate priority order.
 */

import { z } from 'zod';
import type { AttrKey, GradingStandard } from '../core/types/grading.js';
import type { TableKind } from '../core/types/observation.js';
import { readDataJson } from '../core/data-files.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'column-resolver' });

// ============================================================================
// Alias Tables
// ============================================================================

const columnAliasFileSchema = z.object({
  version: z.number(),
  attributes: z.record(z.string()),
  region: z.array(z.string()),
  landUse: z.array(z.string()),
  soilOrder: z.array(z.string()),
  soilSuborder: z.array(z.string()),
  soilFamily: z.array(z.string()),
  area: z.array(z.string()),
});

export type ColumnAliasTable = z.infer<typeof columnAliasFileSchema>;

export type DimensionColumn = 'region' | 'landUse' | 'soilOrder' | 'soilSuborder' | 'soilFamily' | 'area';

export const DIMENSION_COLUMNS: readonly DimensionColumn[] = [
  'region',
  'landUse',
  'soilOrder',
  'soilSuborder',
  'soilFamily',
  'area',
] as const;

export const COLUMN_ALIASES: ColumnAliasTable = columnAliasFileSchema.parse(
  readDataJson('column-aliases.json')
);

const attributeAliases: ReadonlyMap<string, AttrKey> = new Map(
  Object.entries(COLUMN_ALIASES.attributes).map(([alias, key]) => [alias.trim(), key])
);

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve one header to an attribute key of the standard, or null
 */
export function resolveAttributeColumn(header: string, standard: GradingStandard): AttrKey | null {
  const trimmed = header.trim();
  if (trimmed === '') return null;

  const aliased = attributeAliases.get(trimmed);
  if (aliased !== undefined && standard.attributes.has(aliased)) {
    return aliased;
  }
  if (standard.attributes.has(trimmed)) {
    return trimmed;
  }
  const lower = trimmed.toLowerCase();
  for (const key of standard.attributes.keys()) {
    if (key.toLowerCase() === lower) {
      return key;
    }
  }
  return null;
}

/**
 * Index of the first header matching a candidate name, in candidate order
 */
export function findColumnByNames(headers: readonly string[], candidates: readonly string[]): number | null {
  const normalized = headers.map((header) => header.trim().toLowerCase());
  for (const name of candidates) {
    const index = normalized.indexOf(name.trim().toLowerCase());
    if (index !== -1) {
      return index;
    }
  }
  return null;
}

export interface ColumnResolution {
  readonly kind: TableKind;
  /** Attribute key → column index; the first header resolving to a key wins */
  readonly attributes: ReadonlyMap<AttrKey, number>;
  readonly region: number | null;
  readonly landUse: number | null;
  readonly soilOrder: number | null;
  readonly soilSuborder: number | null;
  readonly soilFamily: number | null;
  readonly area: number | null;
  /** Headers that are neither attributes nor dimension columns */
  readonly unresolved: readonly string[];
}

export function resolveColumns(
  headers: readonly string[],
  kind: TableKind,
  standard: GradingStandard
): ColumnResolution {
  const aliases = COLUMN_ALIASES;
  const dimensions: Record<DimensionColumn, number | null> = {
    region: findColumnByNames(headers, aliases.region),
    landUse: findColumnByNames(headers, aliases.landUse),
    soilOrder: findColumnByNames(headers, aliases.soilOrder),
    soilSuborder: findColumnByNames(headers, aliases.soilSuborder),
    soilFamily: findColumnByNames(headers, aliases.soilFamily),
    area: findColumnByNames(headers, aliases.area),
  };
  const dimensionIndices = new Set(
    Object.values(dimensions).filter((index): index is number => index !== null)
  );

  const attributes = new Map<AttrKey, number>();
  const unresolved: string[] = [];
  headers.forEach((header, index) => {
    if (dimensionIndices.has(index)) return;
    const key = resolveAttributeColumn(header, standard);
    if (key === null) {
      unresolved.push(header);
      return;
    }
    if (attributes.has(key)) {
      log.debug('Duplicate attribute column ignored', { kind, header, attrKey: key });
      return;
    }
    attributes.set(key, index);
  });

  return { kind, attributes, ...dimensions, unresolved };
}
