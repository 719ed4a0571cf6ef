/**
 * Dataset normalization
 *
 * Builds the sample and mapped ObservationTables of one report request and
 * enforces the dataset-level failure mode: at least one attribute column
 * must resolve in some table.
 */

import type { AttrKey, GradingStandard } from '../core/types/grading.js';
import type { Observation, ObservationDataset, ObservationTable, RawTable } from '../core/types/observation.js';
import { IngestionError } from '../core/types/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { ColumnResolution } from './column-resolver.js';
import { buildTableFromObservations, buildTableFromRaw, concatRawTables } from './table-builder.js';

const log = createLogger({ module: 'normalization' });

export interface RawDatasetInput {
  readonly sample?: RawTable | readonly RawTable[] | null;
  readonly mapped?: RawTable | readonly RawTable[] | null;
}

export interface ObservationDatasetInput {
  readonly sample?: readonly Observation[] | null;
  readonly mapped?: readonly Observation[] | null;
}

export interface NormalizedDataset extends ObservationDataset {
  readonly resolutions: {
    readonly sample: ColumnResolution | null;
    readonly mapped: ColumnResolution | null;
  };
}

function toTableList(input: RawTable | readonly RawTable[] | null | undefined): readonly RawTable[] {
  if (!input) return [];
  return 'headers' in input ? [input] : input;
}

/**
 * Standard attribute keys present in any table of the dataset, in standard
 * order
 */
export function availableAttributes(dataset: ObservationDataset, standard: GradingStandard): AttrKey[] {
  return [...standard.attributes.keys()].filter(
    (key) => dataset.sample?.attributes.has(key) === true || dataset.mapped?.attributes.has(key) === true
  );
}

function assertUsable(dataset: ObservationDataset, standard: GradingStandard): void {
  if (availableAttributes(dataset, standard).length === 0) {
    throw new IngestionError(
      `No column matches an attribute of grading standard ${standard.id}`,
      'no_usable_attributes',
      {
        standardId: standard.id,
        sampleColumns: dataset.sample ? [...dataset.sample.attributes.keys()] : [],
        mappedColumns: dataset.mapped ? [...dataset.mapped.attributes.keys()] : [],
      }
    );
  }
}

/**
 * Normalize raw header/row tables. Several tables of one kind are
 * concatenated by header union first.
 *
 * @throws IngestionError no_usable_attributes, missing_column
 */
export function normalizeDataset(input: RawDatasetInput, standard: GradingStandard): NormalizedDataset {
  const sampleTables = toTableList(input.sample);
  const mappedTables = toTableList(input.mapped);

  const sample = sampleTables.length > 0 ? buildTableFromRaw(concatRawTables(sampleTables), 'sample', standard) : null;
  const mapped = mappedTables.length > 0 ? buildTableFromRaw(concatRawTables(mappedTables), 'mapped', standard) : null;

  for (const built of [sample, mapped]) {
    if (built && built.resolution.unresolved.length > 0) {
      log.debug('Columns not used', { table: built.table.kind, columns: built.resolution.unresolved });
    }
  }

  const dataset: NormalizedDataset = {
    sample: sample?.table ?? null,
    mapped: mapped?.table ?? null,
    resolutions: {
      sample: sample?.resolution ?? null,
      mapped: mapped?.resolution ?? null,
    },
  };
  assertUsable(dataset, standard);
  return dataset;
}

/**
 * Build a dataset from Observation rows
 *
 * @throws IngestionError no_usable_attributes, missing_column
 */
export function datasetFromObservations(
  input: ObservationDatasetInput,
  standard: GradingStandard
): ObservationDataset {
  const sample: ObservationTable | null = input.sample ? buildTableFromObservations(input.sample, 'sample') : null;
  const mapped: ObservationTable | null = input.mapped ? buildTableFromObservations(input.mapped, 'mapped') : null;
  const dataset: ObservationDataset = { sample, mapped };
  assertUsable(dataset, standard);
  return dataset;
}
