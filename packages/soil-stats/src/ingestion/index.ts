/**
 * Ingestion exports
 */

export {
  decodeText,
  parseDelimitedText,
  parseWorkbook,
  readTableFile,
  readTableFiles,
  tableFileFormat,
} from './table-reader.js';
export type { ReadTableOptions, TableFile, TableFileFormat, TextEncodingName } from './table-reader.js';
