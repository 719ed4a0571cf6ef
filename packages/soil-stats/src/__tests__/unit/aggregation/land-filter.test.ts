/**
 * Land filters and row exclusion
 */

import { describe, it, expect, vi } from 'vitest';
import { landFilterAccepts } from '../../../aggregation/land-filter.js';
import { classifyTable, countedAreas, countedValues } from '../../../aggregation/classified-table.js';
import { normalizeDataset } from '../../../normalization/dataset.js';
import { normalizeLandUse } from '../../../normalization/land-use.js';
import { createLogger } from '../../../core/utils/logger.js';
import type { AttributeGradeConfig } from '../../../core/types/grading.js';
import type { ObservationTable } from '../../../core/types/observation.js';
import { createMappedTable, createRawTable, createStandard } from '../../utils/fixtures.js';

const standard = createStandard();

function attribute(key: string): AttributeGradeConfig {
  const config = standard.attributes.get(key);
  if (!config) throw new Error(`fixture standard has no ${key}`);
  return config;
}

function sampleTable(headers: string[], rows: unknown[][]): ObservationTable {
  const table = normalizeDataset({ sample: createRawTable(headers, rows) }, standard).sample;
  if (!table) throw new Error('expected a sample table');
  return table;
}

describe('landFilterAccepts', () => {
  const paddy = normalizeLandUse('水田');
  const dry = normalizeLandUse('旱地');
  const orchard = normalizeLandUse('果园');
  const forest = normalizeLandUse('林地');

  it('should accept every class without a filter', () => {
    expect([paddy, dry, orchard, forest].every((cls) => landFilterAccepts('none', cls))).toBe(true);
  });

  it('should restrict to cultivated and garden land', () => {
    expect(landFilterAccepts('cultivated_and_garden', dry)).toBe(true);
    expect(landFilterAccepts('cultivated_and_garden', orchard)).toBe(true);
    expect(landFilterAccepts('cultivated_and_garden', forest)).toBe(false);
  });

  it('should restrict to paddy fields or cultivated land', () => {
    expect(landFilterAccepts('paddy_only', paddy)).toBe(true);
    expect(landFilterAccepts('paddy_only', dry)).toBe(false);
    expect(landFilterAccepts('cultivated_only', dry)).toBe(true);
    expect(landFilterAccepts('cultivated_only', orchard)).toBe(false);
  });
});

describe('classifyTable', () => {
  it('should exclude unclassifiable rows and rows outside the land filter', () => {
    const table = sampleTable(
      ['地类名称', '缓效钾'],
      [
        ['水田', 400],
        ['果园', 600],
        ['有林地', 200],
        ['旱地', 0],
        ['其他', 350],
      ]
    );
    const classified = classifyTable(table, attribute('SK'));

    expect(Array.from(classified?.levels ?? [])).toEqual([1, 2, -1, -1, -1]);
    expect(classified?.diagnostics).toEqual({
      totalRows: 5,
      graded: 2,
      unclassifiable: 1,
      filteredByLandUse: 2,
      invalidArea: 0,
      landFilterApplied: true,
    });
    if (classified) {
      expect(Array.from(countedValues(classified))).toEqual([400, 600]);
      expect(countedAreas(classified).length).toBe(0);
    }
  });

  it('should skip the land filter and warn when there is no land-use column', () => {
    const log = createLogger({ module: 'test' });
    const warn = vi.spyOn(log, 'warn');
    const table = sampleTable(['缓效钾'], [[400], [600]]);

    const classified = classifyTable(table, attribute('SK'), log);

    expect(classified?.diagnostics.landFilterApplied).toBe(false);
    expect(classified?.diagnostics.graded).toBe(2);
    expect(warn).toHaveBeenCalledWith('Land filter skipped: table has no land-use column', {
      attrKey: 'SK',
      table: 'sample',
      landFilter: 'cultivated_and_garden',
    });
  });

  it('should exclude mapped rows without positive area', () => {
    const mapped = normalizeDataset({ mapped: createMappedTable() }, standard).mapped;
    expect(mapped).not.toBeNull();
    if (!mapped) return;

    const classified = classifyTable(mapped, attribute('OM'));
    expect(Array.from(classified?.levels ?? [])).toEqual([2, 1, 4, -1]);
    expect(classified?.diagnostics.invalidArea).toBe(1);
    if (classified) {
      expect(Array.from(countedValues(classified))).toEqual([22, 18, 45]);
      expect(Array.from(countedAreas(classified))).toEqual([100, 50, 30]);
    }
  });

  it('should return null when the table lacks the attribute', () => {
    expect(classifyTable(sampleTable(['有机质'], [[10]]), attribute('ph'))).toBeNull();
  });
});
