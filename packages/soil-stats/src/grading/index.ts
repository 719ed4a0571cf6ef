/**
 * Grading exports
 */

export { GradeScale, searchLevel } from './grade-scale.js';
export type { GradeScaleContext } from './grade-scale.js';
export { classify, classifyCode, classifyColumn } from './classifier.js';
export { GradingStandardRegistry } from './registry.js';
export {
  buildGradingStandard,
  parseStandardText,
  loadStandardFile,
  loadStandardsFromDirectory,
  standardFileFormat,
} from './standard-loader.js';
export type { StandardFileFormat } from './standard-loader.js';
export { loadBuiltinStandards, createDefaultRegistry } from './builtin-standards.js';
export type { DefaultRegistryOptions } from './builtin-standards.js';
export { describeGradeLevels, levelRangeText, toRomanGradeCode } from './grade-labels.js';
