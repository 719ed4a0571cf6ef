/**
 * Summary exports
 */

export { assembleSummary } from './assembler.js';
export type { SummaryParts } from './assembler.js';
export { computeAttributeSummary } from './attribute-summary.js';
export type { AttributeSummaryOptions } from './attribute-summary.js';
export { runReport } from './batch.js';
export type { RunReportOptions } from './batch.js';
