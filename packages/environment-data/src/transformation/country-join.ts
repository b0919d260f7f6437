/**
 * Country Join
 *
 * Left-joins tabular datasets onto the boundary layer by normalized country
 * code. The boundary layer drives the join:
 *
 * - every boundary feature appears exactly once, in boundary order
 * - countries without data keep their geometry, every value cell is null
 * - tabular rows whose country is absent from the boundary layer are dropped
 * - more than one row per country is a JoinIntegrityError
 */

import {
  TABULAR_DATASET_NAMES,
  getTabularDescriptor,
  type TabularDatasetName,
} from '../config/catalog.js';
import { DatasetBatchError, JoinIntegrityError } from '../core/errors.js';
import type {
  BoundaryLayer,
  CellValue,
  DownloadedFiles,
  MergedCollection,
  MergedDataset,
  MergedDatasets,
  MergedFeature,
  MergedProperties,
  TabularDataset,
  TabularRow,
} from '../core/types.js';
import { settleInBatches } from '../core/utils/batch.js';
import { createLogger } from '../core/utils/logger.js';
import { loadTabularDataset, selectLatestPerCountry } from './tabular-loader.js';

const logger = createLogger('merge');

/**
 * Merge every tabular dataset with the boundary layer
 *
 * The archive entry of `files` is ignored. Each dataset is merged
 * independently; failures are raised together once all were attempted.
 *
 * @throws {DatasetBatchError} with stage 'merge' if any dataset failed
 */
export async function mergeDatasets(
  files: DownloadedFiles,
  boundary: BoundaryLayer
): Promise<MergedDatasets> {
  const outcome = await settleInBatches(TABULAR_DATASET_NAMES, 'merge', (name) =>
    mergeDataset(name, files[name], boundary)
  );

  if (outcome.failures.length > 0) {
    for (const failure of outcome.failures) {
      logger.child({ dataset: failure.dataset }).error('Dataset merge failed', {
        error: failure.error.message,
      });
    }
    throw new DatasetBatchError('merge', outcome.failures);
  }

  const merged: Partial<Record<TabularDatasetName, MergedDataset>> = {};
  for (const [name, dataset] of outcome.results) {
    merged[name] = dataset;
  }

  return Object.freeze(requireAll(merged));
}

/**
 * Load one downloaded CSV, reduce it to the latest year per country and
 * join it onto the boundary layer
 */
export async function mergeDataset(
  name: TabularDatasetName,
  filePath: string,
  boundary: BoundaryLayer
): Promise<MergedDataset> {
  const dataset = await loadTabularDataset(name, filePath);
  return joinWithBoundary(selectLatestPerCountry(dataset), boundary);
}

/**
 * Left-join a tabular dataset onto the boundary layer
 *
 * @throws {JoinIntegrityError} if a country has more than one row
 */
export function joinWithBoundary(dataset: TabularDataset, boundary: BoundaryLayer): MergedDataset {
  const byCountry = indexByCountry(dataset);
  const boundaryIds = new Set(boundary.features.map((f) => f.countryId));

  const features: MergedFeature[] = boundary.features.map((feature) => {
    const row = byCountry.get(feature.countryId);

    const values: Record<string, CellValue> = {};
    for (const column of dataset.valueColumns) {
      values[column] = row?.values[column] ?? null;
    }

    const properties: MergedProperties = Object.freeze({
      ...values,
      countryId: feature.countryId,
      countryName: feature.countryName,
      year: row?.year ?? null,
    });

    return Object.freeze({
      type: 'Feature' as const,
      geometry: feature.geometry,
      properties,
    });
  });

  const unmatched = [...byCountry.keys()].filter((id) => !boundaryIds.has(id));
  const matched = byCountry.size - unmatched.length;

  const log = logger.child({ dataset: dataset.name });
  log.info('Joined dataset with boundary layer', {
    features: features.length,
    matched,
    noData: features.length - matched,
    droppedRows: unmatched.length,
  });
  if (unmatched.length > 0) {
    log.debug('Dropped rows without boundary feature', {
      countries: unmatched,
    });
  }

  const descriptor = getTabularDescriptor(dataset.name);
  const collection: MergedCollection = Object.freeze({
    type: 'FeatureCollection' as const,
    features: Object.freeze(features),
  });

  return Object.freeze({
    name: dataset.name,
    displayName: descriptor.displayName,
    valueColumns: Object.freeze([...dataset.valueColumns]),
    primaryColumn: resolvePrimaryColumn(dataset, descriptor.valueColumn),
    collection,
  });
}

/**
 * Index rows by country, rejecting duplicate keys
 */
function indexByCountry(dataset: TabularDataset): Map<string, TabularRow> {
  const byCountry = new Map<string, TabularRow>();
  const duplicates = new Set<string>();

  for (const row of dataset.rows) {
    if (byCountry.has(row.countryId)) {
      duplicates.add(row.countryId);
    } else {
      byCountry.set(row.countryId, row);
    }
  }

  if (duplicates.size > 0) {
    throw new JoinIntegrityError(dataset.name, [...duplicates].sort());
  }

  return byCountry;
}

/**
 * Catalog column when present, otherwise the first mostly-numeric value column
 */
function resolvePrimaryColumn(dataset: TabularDataset, preferred: string): string | null {
  if (dataset.valueColumns.includes(preferred)) {
    return preferred;
  }

  for (const column of dataset.valueColumns) {
    const numeric = dataset.rows.filter((row) => typeof row.values[column] === 'number').length;
    if (numeric > 0 && numeric * 2 >= dataset.rows.length) {
      return column;
    }
  }

  return dataset.valueColumns[0] ?? null;
}

function requireAll(
  merged: Partial<Record<TabularDatasetName, MergedDataset>>
): Record<TabularDatasetName, MergedDataset> {
  const {
    annual_change_forest_area,
    annual_deforestation,
    share_land_protected,
    share_land_degraded,
    forest_area_total,
  } = merged;

  if (
    !annual_change_forest_area ||
    !annual_deforestation ||
    !share_land_protected ||
    !share_land_degraded ||
    !forest_area_total
  ) {
    const missing = TABULAR_DATASET_NAMES.filter((name) => !merged[name]);
    throw new Error(`Merge result incomplete, missing: ${missing.join(', ')}`);
  }

  return {
    annual_change_forest_area,
    annual_deforestation,
    share_land_protected,
    share_land_degraded,
    forest_area_total,
  };
}
