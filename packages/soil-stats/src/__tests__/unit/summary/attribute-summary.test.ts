/**
 * Per-attribute summaries
 */

import { describe, it, expect } from 'vitest';
import { computeAttributeSummary } from '../../../summary/attribute-summary.js';
import { normalizeDataset } from '../../../normalization/dataset.js';
import { isIngestionError, isSoilStatsError } from '../../../core/types/errors.js';
import { createMappedTable, createSampleTable, createStandard } from '../../utils/fixtures.js';

const standard = createStandard();

describe('computeAttributeSummary', () => {
  const dataset = normalizeDataset({ sample: createSampleTable(), mapped: createMappedTable() }, standard);
  const summary = computeAttributeSummary(dataset, 'OM', standard);

  it('should carry the attribute metadata', () => {
    expect(summary.attrKey).toBe('OM');
    expect(summary.displayName).toBe('有机质');
    expect(summary.unit).toBe('g/kg');
    expect(summary.standardId).toBe('test');
    expect(summary.reverseDisplay).toBe(true);
    expect(summary.gradeLabels.map((label) => label.code)).toEqual(['5级', '4级', '3级', '2级', '1级']);
  });

  it('should describe counted sample values and mapped areas', () => {
    expect(summary.sampleStats).toMatchObject({ count: 4, mean: 21.5, median: 18.5, min: 8, max: 41 });
    expect(summary.areaStats).toMatchObject({ totalArea: 180, median: 22, min: 18, max: 45 });
    expect(summary.areaStats?.mean).toBeCloseTo(85 / 3, 10);
  });

  it('should break grades down by area share', () => {
    const breakdown = summary.globalGradeBreakdown;
    expect(Object.keys(breakdown)).toEqual(['5级', '4级', '3级', '2级', '1级']);
    expect(breakdown['5级']).toEqual({ count: 1, area: 0, pct: 0 });
    expect(breakdown['2级']).toEqual({ count: 0, area: 0, pct: 0 });
    expect(breakdown['3级'].count).toBe(1);
    expect(breakdown['3级'].area).toBe(100);
    expect(breakdown['3级'].pct).toBeCloseTo((100 / 180) * 100, 10);
    expect(breakdown['4级'].pct).toBeCloseTo((50 / 180) * 100, 10);
    expect(breakdown['1级'].pct).toBeCloseTo((30 / 180) * 100, 10);

    const pctTotal = Object.values(breakdown).reduce((sum, entry) => sum + entry.pct, 0);
    expect(pctTotal).toBeCloseToRelative(100);
  });

  it('should compute the area-weighted grade over all mapped rows', () => {
    expect(summary.weightedAvgGrade).toBeCloseTo(550 / 180, 10);
  });

  it('should list every available dimension with its buckets', () => {
    expect(summary.dimensions).toEqual(['region', 'land_use', 'soil_taxonomy']);
    const regions = summary.buckets.filter((bucket) => bucket.dimension === 'region');
    expect(regions.map((bucket) => bucket.label)).toEqual(['白马镇', '城关镇']);
    expect(regions[1].totalArea).toBe(150);
    expect(regions[1].totalCount).toBe(2);
  });

  it('should report sample percentiles', () => {
    expect(Object.keys(summary.percentiles)).toEqual(['2%', '5%', '10%', '20%', '80%', '90%', '95%', '98%']);
    expect(summary.percentiles['2%']).toBeCloseTo(8.24, 10);
    expect(summary.percentiles['98%']).toBeCloseTo(40.04, 10);
  });

  it('should return a deeply frozen summary', () => {
    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.buckets)).toBe(true);
    expect(Object.isFrozen(summary.buckets[0].perGradeArea)).toBe(true);
    expect(Reflect.set(summary, 'attrKey', 'changed')).toBe(false);
    expect(summary.attrKey).toBe('OM');
  });

  it('should use sample count shares when there is no area', () => {
    const sampleOnly = normalizeDataset({ sample: createSampleTable() }, standard);
    const result = computeAttributeSummary(sampleOnly, 'OM', standard);

    expect(result.areaStats).toBeNull();
    expect(result.weightedAvgGrade).toBeNull();
    expect(result.globalGradeBreakdown['3级'].pct).toBe(25);
    expect(result.globalGradeBreakdown['2级'].pct).toBe(0);
  });

  it('should report no percentiles without sample values', () => {
    const mappedOnly = normalizeDataset({ mapped: createMappedTable() }, standard);
    const result = computeAttributeSummary(mappedOnly, 'OM', standard, { percentiles: [0.5] });

    expect(result.sampleStats).toBeNull();
    expect(result.percentiles).toEqual({});
    expect(result.areaStats?.totalArea).toBe(180);
  });

  it('should honour custom percentile sets', () => {
    const result = computeAttributeSummary(dataset, 'OM', standard, { percentiles: [0.5] });
    expect(result.percentiles).toEqual({ '50%': 18.5 });
  });

  it('should fail for attributes the standard or the tables lack', () => {
    let unknown: unknown;
    try {
      computeAttributeSummary(dataset, 'XX', standard);
    } catch (error) {
      unknown = error;
    }
    expect(isSoilStatsError(unknown) ? unknown.code : null).toBe('unknown_attribute');

    let missing: unknown;
    try {
      computeAttributeSummary(dataset, 'ph', standard);
    } catch (error) {
      missing = error;
    }
    expect(isIngestionError(missing, 'missing_column')).toBe(true);
  });
});
