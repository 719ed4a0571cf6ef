/**
 * Batch runs and the service facade
 */

import { describe, it, expect } from 'vitest';
import { runReport } from '../../../summary/batch.js';
import { normalizeDataset } from '../../../normalization/dataset.js';
import { SoilStatsService } from '../../../core/soil-stats-service.js';
import { GradingStandardRegistry } from '../../../grading/registry.js';
import { GradingStandardNotFoundError } from '../../../core/types/errors.js';
import {
  createMappedTable,
  createObservation,
  createSampleTable,
  createStandard,
} from '../../utils/fixtures.js';

const standard = createStandard();

function testRegistry(): GradingStandardRegistry {
  const registry = new GradingStandardRegistry();
  registry.register(standard.id, standard);
  return registry;
}

describe('runReport', () => {
  const dataset = normalizeDataset({ sample: createSampleTable(), mapped: createMappedTable() }, standard);

  it('should default to the attributes found in the dataset', () => {
    const result = runReport(dataset, { standard });
    expect(result.standardId).toBe('test');
    expect(result.summaries.map((summary) => summary.attrKey)).toEqual(['OM']);
    expect(result.failures).toEqual([]);
  });

  it('should record failed attributes and keep going', () => {
    const result = runReport(dataset, { standard, attributes: ['ph', 'OM', 'XX'] });

    expect(result.summaries.map((summary) => summary.attrKey)).toEqual(['OM']);
    expect(result.failures).toEqual([
      { attrKey: 'ph', error: 'No table has a column for ph', code: 'missing_column' },
      { attrKey: 'XX', error: 'Attribute XX is not graded by standard test', code: 'unknown_attribute' },
    ]);
  });
});

describe('SoilStatsService', () => {
  it('should resolve the active standard when none is named', () => {
    const service = new SoilStatsService({}, testRegistry());
    const result = service.generateReport({ sample: createSampleTable(), mapped: createMappedTable() });

    expect(result.standardId).toBe('test');
    expect(result.summaries[0].weightedAvgGrade).toBeCloseTo(550 / 180, 10);
  });

  it('should abort on an unknown standard before reading tables', () => {
    const service = new SoilStatsService({}, testRegistry());
    expect(() => service.generateReport({ standardId: 'missing', sample: createSampleTable() })).toThrow(
      GradingStandardNotFoundError
    );
  });

  it('should accept observation rows', () => {
    const service = new SoilStatsService({ percentiles: [0.5] }, testRegistry());
    const result = service.generateReportFromObservations({
      sample: [
        createObservation({ attributeValues: { ph: 6 }, landUseRaw: '水田' }),
        createObservation({ attributeValues: { ph: 8 }, landUseRaw: '旱地' }),
      ],
    });

    const ph = result.summaries[0];
    expect(ph.attrKey).toBe('ph');
    expect(ph.percentiles).toEqual({ '50%': 7 });
    expect(ph.globalGradeBreakdown['2级'].count).toBe(1);
    expect(ph.globalGradeBreakdown['3级'].count).toBe(1);
    expect(ph.dimensions).toEqual(['land_use']);
  });

  it('should load the builtin standards by default', () => {
    const service = new SoilStatsService();
    expect(service.resolveStandard().id).toBe('jiangsu');
    expect(service.config.maxFileMb).toBe(50);
  });
});
