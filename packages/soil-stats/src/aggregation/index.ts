/**
 * Aggregation exports
 */

export { landFilterAccepts } from './land-filter.js';
export { classifyTable, countedAreas, countedValues } from './classified-table.js';
export { GradeTally, aggregate, tallyTable } from './dimensional-aggregator.js';
export type { AggregationInput } from './dimensional-aggregator.js';
export { weightedAvgGrade, weightedAvgGradeByLevel } from './weighted-grade.js';
export { percentileLabel, percentiles, quantileSorted, sortedPositive } from './percentiles.js';
export { describeArea, describeValues } from './descriptive-stats.js';
