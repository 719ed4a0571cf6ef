/**
 * Observation Types
 *
 * Row-oriented input (Observation, RawTable) and the columnar form the
 * engine computes on (ObservationTable, ClassifiedTable).
 */

import type { AttrKey } from './grading.js';

export type TableKind = 'sample' | 'mapped';

export type LandUsePrimary = 'cultivated' | 'garden' | 'forest' | 'grassland' | 'other';

/**
 * Secondary land-use class. Categories without a subdivision reuse the
 * primary id as their secondary.
 */
export type LandUseSecondary =
  | 'paddy_field'
  | 'irrigated_land'
  | 'dry_land'
  | 'orchard'
  | 'tea_garden'
  | 'other_garden'
  | 'forest'
  | 'grassland'
  | 'other';

export interface LandUseClass {
  readonly primary: LandUsePrimary;
  readonly secondary: LandUseSecondary;
}

export interface SoilTaxonomyRaw {
  readonly order: string | null;
  readonly suborder: string | null;
  readonly family: string | null;
}

/**
 * Normalized soil taxonomy with its domain sort index. Unknown triples carry
 * the count of known triples, so they sort after every known one.
 */
export interface SoilTaxonomyClass {
  readonly order: string;
  readonly suborder: string;
  readonly family: string;
  readonly sortIndex: number;
}

/**
 * One raw input row
 */
export interface Observation {
  readonly attributeValues: Readonly<Record<AttrKey, number | null>>;
  readonly region: string | null;
  readonly landUseRaw: string | null;
  readonly soilTaxonomyRaw: SoilTaxonomyRaw | null;
  readonly area: number | null;
}

/**
 * Header/row table as read from a CSV or spreadsheet file
 */
export interface RawTable {
  readonly headers: readonly string[];
  readonly rows: readonly (readonly unknown[])[];
}

/**
 * Column-wise table. A dimension column is null when the source had no such
 * column; attribute columns hold NaN for missing or uncoercible values.
 */
export interface ObservationTable {
  readonly kind: TableKind;
  readonly rowCount: number;
  readonly attributes: ReadonlyMap<AttrKey, Float64Array>;
  readonly region: readonly (string | null)[] | null;
  readonly landUse: readonly LandUseClass[] | null;
  readonly soilTaxonomy: readonly (SoilTaxonomyClass | null)[] | null;
  readonly area: Float64Array | null;
}

export interface ObservationDataset {
  readonly sample: ObservationTable | null;
  readonly mapped: ObservationTable | null;
}

/**
 * Row exclusion counters of one classified table
 */
export interface ClassificationDiagnostics {
  readonly totalRows: number;
  readonly graded: number;
  readonly unclassifiable: number;
  readonly filteredByLandUse: number;
  readonly invalidArea: number;
  /** False when the land filter could not run for lack of a land-use column */
  readonly landFilterApplied: boolean;
}

/**
 * One attribute of one table after land filtering and classification.
 * `levels[i]` is the level index of row i, or -1 when the row is not counted.
 */
export interface ClassifiedTable {
  readonly kind: TableKind;
  readonly attrKey: AttrKey;
  readonly values: Float64Array;
  readonly levels: Int16Array;
  readonly area: Float64Array | null;
  readonly region: readonly (string | null)[] | null;
  readonly landUse: readonly LandUseClass[] | null;
  readonly soilTaxonomy: readonly (SoilTaxonomyClass | null)[] | null;
  readonly diagnostics: ClassificationDiagnostics;
}
