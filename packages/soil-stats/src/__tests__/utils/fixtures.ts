/**
 * Test Fixture Factories
 *
 * Small grading standards, raw tables and observations with hand-checked
 * numbers. Every factory returns fresh objects.
 */

import type { GradeLevel, GradingStandard } from '../../core/types/grading.js';
import type { Observation, RawTable } from '../../core/types/observation.js';
import { GradeScale } from '../../grading/grade-scale.js';
import { buildGradingStandard } from '../../grading/standard-loader.js';

// ============================================================================
// Grading
// ============================================================================

/**
 * Scale from [threshold, code] pairs; description defaults to the code
 */
export function createScale(levels: ReadonlyArray<readonly [number, string]>): GradeScale {
  const gradeLevels: GradeLevel[] = levels.map(([threshold, code]) => ({
    threshold,
    code,
    description: code,
  }));
  return GradeScale.create(gradeLevels);
}

/**
 * Standard file data used across tests:
 * - OM: five levels 10/20/30/40/inf, 5级 lowest
 * - SK: cultivated and garden land only
 * - ASI: paddy fields only
 * - ph: three levels, 1级 lowest
 * - RK: three levels 1级/2级/3级 at 10/20/inf, for roll-up checks
 */
export function createStandardData(): Record<string, unknown> {
  return {
    id: 'test',
    name: '测试分级',
    description: 'fixture standard',
    attributes: {
      OM: {
        name: '有机质',
        unit: 'g/kg',
        reverse_display: true,
        levels: [
          [10, '5级', '低'],
          [20, '4级', '较低'],
          [30, '3级', '中'],
          [40, '2级', '较高'],
          ['inf', '1级', '高'],
        ],
      },
      SK: {
        name: '缓效钾',
        unit: 'mg/kg',
        reverse_display: true,
        land_filter: 'cultivated_and_garden',
        levels: [
          [300, '3级', '缺乏'],
          [500, '2级', '中等'],
          ['inf', '1级', '丰富'],
        ],
      },
      ASI: {
        name: '有效硅',
        unit: 'mg/kg',
        land_filter: 'paddy_only',
        levels: [
          [100, '2级', '缺乏'],
          ['inf', '1级', '丰富'],
        ],
      },
      ph: {
        name: 'pH',
        levels: [
          [5.5, '1级', '酸性'],
          [7.5, '2级', '中性'],
          ['inf', '3级', '碱性'],
        ],
      },
      RK: {
        name: '测试指标',
        unit: '',
        levels: [
          [10, '1级', '一'],
          [20, '2级', '二'],
          ['inf', '3级', '三'],
        ],
      },
    },
  };
}

export function createStandard(): GradingStandard {
  return buildGradingStandard(createStandardData(), 'fixture');
}

// ============================================================================
// Tables
// ============================================================================

export function createRawTable(
  headers: readonly string[],
  rows: ReadonlyArray<readonly unknown[]>
): RawTable {
  return { headers: [...headers], rows: rows.map((row) => [...row]) };
}

/**
 * Sample points with region, land use and soil taxonomy columns
 */
export function createSampleTable(): RawTable {
  return createRawTable(
    ['乡镇', '地类名称', '土类', '亚类', '土属', '有机质', '速效钾'],
    [
      ['城关镇', '水田', '水稻土', '潴育水稻土', '潮泥田', 25, 120],
      ['城关镇', '旱地', '潮土', '灰潮土', '灰潮土', 12, 90],
      ['白马镇', '果园', '黄棕壤', '典型黄棕壤', '黄土质黄棕壤', '41', 150],
      ['白马镇', '有林地', '黄棕壤', '典型黄棕壤', '黄土质黄棕壤', 8, null],
      ['白马镇', '水田', '水稻土', '潴育水稻土', '潮泥田', 'nan', 100],
    ]
  );
}

/**
 * Mapped zones with area
 */
export function createMappedTable(): RawTable {
  return createRawTable(
    ['乡镇', '地类名称', '土类', '亚类', '土属', '有机质', '面积'],
    [
      ['城关镇', '水田', '水稻土', '潴育水稻土', '潮泥田', 22, 100],
      ['城关镇', '旱地', '潮土', '灰潮土', '灰潮土', 18, 50],
      ['白马镇', '果园', '黄棕壤', '典型黄棕壤', '黄土质黄棕壤', 45, 30],
      ['白马镇', '水田', '水稻土', '潴育水稻土', '潮泥田', 35, 0],
    ]
  );
}

// ============================================================================
// Observations
// ============================================================================

export function createObservation(overrides: Partial<Observation> = {}): Observation {
  return {
    region: null,
    landUseRaw: null,
    soilTaxonomyRaw: null,
    area: null,
    attributeValues: {},
    ...overrides,
  };
}
