/**
 * DimensionalAggregator
 *
 * Groups classified rows by region, land use or soil taxonomy. Each group
 * gets per-grade sample counts from the sample table and per-grade area sums
 * from the mapped table: two parallel reductions sharing one scale, not a
 * join. Hierarchical dimensions are tallied at the leaves and rolled up, so
 * a parent's per-grade numbers are exactly the sums of its children's.
 *
 * Output order:
 * - region: Chinese (pinyin) collation
 * - land use: fixed structure in pre-order, zero buckets included
 * - soil taxonomy: pre-order, each node sorted by its smallest descendant key
 */

import type { GradeCode } from '../core/types/grading.js';
import type { ClassifiedTable, SoilTaxonomyClass } from '../core/types/observation.js';
import type { DimensionKind, DimensionalBucket, SampleValueStats } from '../core/types/summary.js';
import { NOT_COUNTED } from '../core/constants.js';
import type { GradeScale } from '../grading/grade-scale.js';
import { LAND_USE_STRUCTURE } from '../normalization/land-use.js';
import { compareSoilTaxonomy } from '../normalization/soil-taxonomy.js';
import { weightedAvgGradeByLevel } from './weighted-grade.js';

// ============================================================================
// Tally
// ============================================================================

/**
 * Per-level counts and areas of one group
 */
export class GradeTally {
  readonly counts: Float64Array;
  readonly areas: Float64Array;
  private sampleCount = 0;
  private sampleSum = 0;
  private sampleMin = Number.POSITIVE_INFINITY;
  private sampleMax = Number.NEGATIVE_INFINITY;

  constructor(levelCount: number) {
    this.counts = new Float64Array(levelCount);
    this.areas = new Float64Array(levelCount);
  }

  addSample(level: number, value: number): void {
    this.counts[level] += 1;
    this.sampleCount += 1;
    this.sampleSum += value;
    if (value < this.sampleMin) this.sampleMin = value;
    if (value > this.sampleMax) this.sampleMax = value;
  }

  addArea(level: number, area: number): void {
    this.areas[level] += area;
  }

  merge(other: GradeTally): this {
    for (let i = 0; i < this.counts.length; i++) {
      this.counts[i] += other.counts[i];
      this.areas[i] += other.areas[i];
    }
    this.sampleCount += other.sampleCount;
    this.sampleSum += other.sampleSum;
    this.sampleMin = Math.min(this.sampleMin, other.sampleMin);
    this.sampleMax = Math.max(this.sampleMax, other.sampleMax);
    return this;
  }

  get totalCount(): number {
    return this.sampleCount;
  }

  get totalArea(): number {
    let total = 0;
    for (const area of this.areas) total += area;
    return total;
  }

  sampleValues(): SampleValueStats | null {
    if (this.sampleCount === 0) {
      return null;
    }
    return {
      count: this.sampleCount,
      mean: this.sampleSum / this.sampleCount,
      min: this.sampleMin,
      max: this.sampleMax,
    };
  }

  perGradeCounts(scale: GradeScale): Record<GradeCode, number> {
    return Object.fromEntries(scale.levels.map((level, i) => [level.code, this.counts[i]]));
  }

  perGradeArea(scale: GradeScale): Record<GradeCode, number> {
    return Object.fromEntries(scale.levels.map((level, i) => [level.code, this.areas[i]]));
  }

  toBucket(
    dimension: DimensionKind,
    keyPath: readonly string[],
    label: string,
    scale: GradeScale
  ): DimensionalBucket {
    return {
      dimension,
      keyPath: [...keyPath],
      label,
      perGradeCounts: this.perGradeCounts(scale),
      perGradeArea: this.perGradeArea(scale),
      totalCount: this.totalCount,
      totalArea: this.totalArea,
      weightedAvgGrade: weightedAvgGradeByLevel(this.areas, scale),
      sampleValues: this.sampleValues(),
    };
  }
}

/**
 * Add every counted row of a table to a tally
 */
export function tallyTable(tally: GradeTally, table: ClassifiedTable): GradeTally {
  tallyRows(table, () => tally);
  return tally;
}

// ============================================================================
// Grouping
// ============================================================================

export interface AggregationInput {
  readonly sample?: ClassifiedTable | null;
  readonly mapped?: ClassifiedTable | null;
}

type RowKey = (row: number) => string | null;

function tallyRows(table: ClassifiedTable, target: (row: number) => GradeTally | null): void {
  const { levels, values } = table;
  const area = table.area;
  if (table.kind === 'mapped' && !area) {
    return;
  }
  for (let row = 0; row < levels.length; row++) {
    const level = levels[row];
    if (level === NOT_COUNTED) continue;
    const tally = target(row);
    if (!tally) continue;
    if (table.kind === 'sample') {
      tally.addSample(level, values[row]);
    } else if (area) {
      tally.addArea(level, area[row]);
    }
  }
}

/**
 * Leaf tallies keyed by `keyOf`. Null when no table provides the column.
 */
function tallyByKey(
  input: AggregationInput,
  scale: GradeScale,
  keyFor: (table: ClassifiedTable) => RowKey | null
): Map<string, GradeTally> | null {
  const tallies = new Map<string, GradeTally>();
  let hasColumn = false;

  for (const table of [input.sample, input.mapped]) {
    if (!table) continue;
    const keyOf = keyFor(table);
    if (!keyOf) continue;
    hasColumn = true;
    tallyRows(table, (row) => {
      const key = keyOf(row);
      if (key === null) return null;
      let tally = tallies.get(key);
      if (!tally) {
        tally = new GradeTally(scale.size);
        tallies.set(key, tally);
      }
      return tally;
    });
  }
  return hasColumn ? tallies : null;
}

const pathKey = (...parts: readonly string[]): string => parts.join('\u0000');

// ============================================================================
// Dimensions
// ============================================================================

const regionCollator = new Intl.Collator('zh-CN');

function aggregateRegion(input: AggregationInput, scale: GradeScale): DimensionalBucket[] | null {
  const tallies = tallyByKey(input, scale, (table) => {
    const region = table.region;
    return region ? (row) => region[row] : null;
  });
  if (!tallies) return null;

  return [...tallies.keys()]
    .sort(regionCollator.compare)
    .map((region) => {
      const tally = tallies.get(region) ?? new GradeTally(scale.size);
      return tally.toBucket('region', [region], region, scale);
    });
}

function aggregateLandUse(input: AggregationInput, scale: GradeScale): DimensionalBucket[] | null {
  const tallies = tallyByKey(input, scale, (table) => {
    const landUse = table.landUse;
    return landUse ? (row) => pathKey(landUse[row].primary, landUse[row].secondary) : null;
  });
  if (!tallies) return null;

  const leaf = (primary: string, secondary: string): GradeTally =>
    tallies.get(pathKey(primary, secondary)) ?? new GradeTally(scale.size);

  const buckets: DimensionalBucket[] = [];
  for (const category of LAND_USE_STRUCTURE) {
    if (category.children.length === 0) {
      buckets.push(leaf(category.id, category.id).toBucket('land_use', [category.id], category.label, scale));
      continue;
    }
    const children = category.children.map((child) => ({ child, tally: leaf(category.id, child.id) }));
    const parent = new GradeTally(scale.size);
    for (const { tally } of children) parent.merge(tally);

    buckets.push(parent.toBucket('land_use', [category.id], category.label, scale));
    for (const { child, tally } of children) {
      buckets.push(tally.toBucket('land_use', [category.id, child.id], child.label, scale));
    }
  }
  return buckets;
}

function aggregateSoilTaxonomy(input: AggregationInput, scale: GradeScale): DimensionalBucket[] | null {
  const classes = new Map<string, SoilTaxonomyClass>();
  const tallies = tallyByKey(input, scale, (table) => {
    const soil = table.soilTaxonomy;
    if (!soil) return null;
    return (row) => {
      const cls = soil[row];
      if (!cls) return null;
      const key = pathKey(cls.order, cls.suborder, cls.family);
      classes.set(key, cls);
      return key;
    };
  });
  if (!tallies) return null;

  // Sorted leaves: the first leaf seen under a parent is its smallest descendant
  const tree = new Map<string, Map<string, SoilTaxonomyClass[]>>();
  for (const cls of [...classes.values()].sort(compareSoilTaxonomy)) {
    let suborders = tree.get(cls.order);
    if (!suborders) {
      suborders = new Map();
      tree.set(cls.order, suborders);
    }
    const families = suborders.get(cls.suborder);
    if (families) {
      families.push(cls);
    } else {
      suborders.set(cls.suborder, [cls]);
    }
  }

  const leafTally = (cls: SoilTaxonomyClass): GradeTally =>
    tallies.get(pathKey(cls.order, cls.suborder, cls.family)) ?? new GradeTally(scale.size);

  const buckets: DimensionalBucket[] = [];
  for (const [order, suborders] of tree) {
    const orderTally = new GradeTally(scale.size);
    const subBuckets: DimensionalBucket[] = [];

    for (const [suborder, families] of suborders) {
      const suborderTally = new GradeTally(scale.size);
      const familyBuckets = families.map((cls) => {
        const tally = leafTally(cls);
        suborderTally.merge(tally);
        return tally.toBucket('soil_taxonomy', [order, suborder, cls.family], cls.family, scale);
      });
      orderTally.merge(suborderTally);
      subBuckets.push(suborderTally.toBucket('soil_taxonomy', [order, suborder], suborder, scale));
      subBuckets.push(...familyBuckets);
    }

    buckets.push(orderTally.toBucket('soil_taxonomy', [order], order, scale), ...subBuckets);
  }
  return buckets;
}

/**
 * Aggregate classified tables along one dimension. Null when the dimension
 * column is absent from every provided table.
 */
export function aggregate(
  input: AggregationInput,
  dimension: DimensionKind,
  scale: GradeScale
): DimensionalBucket[] | null {
  switch (dimension) {
    case 'region':
      return aggregateRegion(input, scale);
    case 'land_use':
      return aggregateLandUse(input, scale);
    case 'soil_taxonomy':
      return aggregateSoilTaxonomy(input, scale);
  }
}
