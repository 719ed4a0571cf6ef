/**
 * Classified tables
 *
 * Classifies one attribute column of a table and marks the rows that must
 * not be counted: unclassifiable values, rows outside the attribute's land
 * filter and (mapped tables only) rows without a positive finite area.
 */

import type { AttributeGradeConfig } from '../core/types/grading.js';
import type { ClassifiedTable, ObservationTable } from '../core/types/observation.js';
import { NOT_COUNTED } from '../core/constants.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { classifyColumn } from '../grading/classifier.js';
import { landFilterAccepts } from './land-filter.js';

const defaultLog = createLogger({ module: 'aggregation' });

/**
 * Classify `config.key` in a table. Returns null when the table has no such
 * attribute column.
 */
export function classifyTable(
  table: ObservationTable,
  config: AttributeGradeConfig,
  log: Logger = defaultLog
): ClassifiedTable | null {
  const values = table.attributes.get(config.key);
  if (!values) {
    return null;
  }

  const levels = classifyColumn(values, config.scale);
  const rowCount = levels.length;

  let unclassifiable = 0;
  for (let i = 0; i < rowCount; i++) {
    if (levels[i] === NOT_COUNTED) unclassifiable++;
  }

  let filteredByLandUse = 0;
  let landFilterApplied = true;
  if (config.landFilter !== 'none') {
    const landUse = table.landUse;
    if (landUse === null) {
      landFilterApplied = false;
      log.warn('Land filter skipped: table has no land-use column', {
        attrKey: config.key,
        table: table.kind,
        landFilter: config.landFilter,
      });
    } else {
      for (let i = 0; i < rowCount; i++) {
        if (levels[i] !== NOT_COUNTED && !landFilterAccepts(config.landFilter, landUse[i])) {
          levels[i] = NOT_COUNTED;
          filteredByLandUse++;
        }
      }
    }
  }

  let invalidArea = 0;
  const area = table.kind === 'mapped' ? table.area : null;
  if (area) {
    for (let i = 0; i < rowCount; i++) {
      const a = area[i];
      if (levels[i] !== NOT_COUNTED && !(Number.isFinite(a) && a > 0)) {
        levels[i] = NOT_COUNTED;
        invalidArea++;
      }
    }
  }

  return {
    kind: table.kind,
    attrKey: config.key,
    values,
    levels,
    area,
    region: table.region,
    landUse: table.landUse,
    soilTaxonomy: table.soilTaxonomy,
    diagnostics: {
      totalRows: rowCount,
      graded: rowCount - unclassifiable - filteredByLandUse - invalidArea,
      unclassifiable,
      filteredByLandUse,
      invalidArea,
      landFilterApplied,
    },
  };
}

/**
 * Values of the counted rows, in row order
 */
export function countedValues(table: ClassifiedTable): Float64Array {
  const out = new Float64Array(table.diagnostics.graded);
  let n = 0;
  for (let i = 0; i < table.levels.length; i++) {
    if (table.levels[i] !== NOT_COUNTED) {
      out[n++] = table.values[i];
    }
  }
  return out;
}

/**
 * Areas of the counted rows of a mapped table, in row order
 */
export function countedAreas(table: ClassifiedTable): Float64Array {
  const area = table.area;
  const out = new Float64Array(area ? table.diagnostics.graded : 0);
  if (!area) {
    return out;
  }
  let n = 0;
  for (let i = 0; i < table.levels.length; i++) {
    if (table.levels[i] !== NOT_COUNTED) {
      out[n++] = area[i];
    }
  }
  return out;
}
