/**
 * Table builder
 *
 * Turns header/row tables or Observation lists into columnar
 * ObservationTables. Dimension cells are normalized here once per row so
 * every attribute of the table shares the same region, land-use and
 * soil-taxonomy columns.
 */

import type { AttrKey, GradingStandard } from '../core/types/grading.js';
import type {
  LandUseClass,
  Observation,
  ObservationTable,
  RawTable,
  SoilTaxonomyClass,
  TableKind,
} from '../core/types/observation.js';
import { IngestionError } from '../core/types/errors.js';
import { coerceNumeric, coerceText } from './coerce.js';
import { resolveColumns, type ColumnResolution } from './column-resolver.js';
import { normalizeLandUse } from './land-use.js';
import { normalizeSoilTaxonomy } from './soil-taxonomy.js';

export interface BuiltTable {
  readonly table: ObservationTable;
  readonly resolution: ColumnResolution;
}

/**
 * Concatenate tables of one kind by header union. Headers are matched after
 * trimming; cells of headers a table lacks are left empty.
 */
export function concatRawTables(tables: readonly RawTable[]): RawTable {
  if (tables.length === 1) {
    return tables[0];
  }
  const headers: string[] = [];
  const position = new Map<string, number>();
  for (const table of tables) {
    for (const header of table.headers) {
      const name = header.trim();
      if (!position.has(name)) {
        position.set(name, headers.length);
        headers.push(name);
      }
    }
  }

  const rows: unknown[][] = [];
  for (const table of tables) {
    const targets = table.headers.map((header) => position.get(header.trim()) ?? -1);
    for (const row of table.rows) {
      const out: unknown[] = new Array<unknown>(headers.length).fill(null);
      targets.forEach((target, source) => {
        if (target !== -1) out[target] = row[source];
      });
      rows.push(out);
    }
  }
  return { headers, rows };
}

function numericColumn(rows: RawTable['rows'], index: number): Float64Array {
  const column = new Float64Array(rows.length);
  for (let i = 0; i < rows.length; i++) {
    column[i] = coerceNumeric(rows[i][index]);
  }
  return column;
}

/**
 * Build a columnar table from a raw header/row table
 *
 * @throws IngestionError missing_column when a mapped table has no area column
 */
export function buildTableFromRaw(raw: RawTable, kind: TableKind, standard: GradingStandard): BuiltTable {
  const resolution = resolveColumns(raw.headers, kind, standard);
  const { rows } = raw;

  if (kind === 'mapped' && resolution.area === null) {
    throw new IngestionError('Mapped table has no area column', 'missing_column', {
      table: kind,
      column: 'area',
      headers: raw.headers,
    });
  }

  const attributes = new Map<AttrKey, Float64Array>();
  for (const [key, index] of resolution.attributes) {
    attributes.set(key, numericColumn(rows, index));
  }

  const regionIndex = resolution.region;
  const landUseIndex = resolution.landUse;
  const { soilOrder, soilSuborder, soilFamily } = resolution;

  const table: ObservationTable = {
    kind,
    rowCount: rows.length,
    attributes,
    region: regionIndex === null ? null : rows.map((row) => coerceText(row[regionIndex])),
    landUse:
      landUseIndex === null ? null : rows.map((row) => normalizeLandUse(coerceText(row[landUseIndex]))),
    soilTaxonomy:
      soilSuborder === null || soilFamily === null
        ? null
        : rows.map((row) =>
            normalizeSoilTaxonomy(
              soilOrder === null ? null : row[soilOrder],
              row[soilSuborder],
              row[soilFamily]
            )
          ),
    area: kind === 'mapped' && resolution.area !== null ? numericColumn(rows, resolution.area) : null,
  };
  return { table, resolution };
}

/**
 * Build a columnar table from Observation rows. A dimension column exists
 * when at least one observation carries a value for it.
 *
 * @throws IngestionError missing_column when mapped observations carry no area
 */
export function buildTableFromObservations(
  observations: readonly Observation[],
  kind: TableKind
): ObservationTable {
  const keys = new Set<AttrKey>();
  for (const observation of observations) {
    for (const key of Object.keys(observation.attributeValues)) {
      keys.add(key);
    }
  }

  const attributes = new Map<AttrKey, Float64Array>();
  for (const key of keys) {
    attributes.set(
      key,
      Float64Array.from(observations, (observation) => coerceNumeric(observation.attributeValues[key]))
    );
  }

  const hasRegion = observations.some((observation) => observation.region !== null);
  const hasLandUse = observations.some((observation) => observation.landUseRaw !== null);
  const hasSoil = observations.some((observation) => observation.soilTaxonomyRaw !== null);
  const hasArea = observations.some((observation) => observation.area !== null);

  if (kind === 'mapped' && !hasArea) {
    throw new IngestionError('Mapped observations carry no area', 'missing_column', {
      table: kind,
      column: 'area',
    });
  }

  const landUse: LandUseClass[] | null = hasLandUse
    ? observations.map((observation) => normalizeLandUse(coerceText(observation.landUseRaw)))
    : null;
  const soilTaxonomy: (SoilTaxonomyClass | null)[] | null = hasSoil
    ? observations.map((observation) => {
        const raw = observation.soilTaxonomyRaw;
        return raw ? normalizeSoilTaxonomy(raw.order, raw.suborder, raw.family) : null;
      })
    : null;

  return {
    kind,
    rowCount: observations.length,
    attributes,
    region: hasRegion ? observations.map((observation) => coerceText(observation.region)) : null,
    landUse,
    soilTaxonomy,
    area:
      kind === 'mapped'
        ? Float64Array.from(observations, (observation) => coerceNumeric(observation.area))
        : null,
  };
}
