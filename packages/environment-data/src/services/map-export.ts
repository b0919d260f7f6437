/**
 * Writes merged maps as standalone GeoJSON files, one per dataset.
 */

import { join, resolve } from 'node:path';
import type { FeatureCollection } from 'geojson';
import { TABULAR_DATASET_NAMES, type TabularDatasetName } from '../config/catalog.js';
import { DatasetIOError } from '../core/errors.js';
import type { BoundaryGeometry, MergedDataset, MergedProperties } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type { EnvironmentData } from './environment-data.js';

const logger = createLogger('export');

export type ExportedMap = {
  readonly dataset: TabularDatasetName;
  readonly path: string;
  readonly features: number;
};

/**
 * Plain GeoJSON copy of a merged map, with dataset metadata as foreign members
 */
export function toGeoJSON(
  map: MergedDataset
): FeatureCollection<BoundaryGeometry, MergedProperties> & {
  readonly name: string;
  readonly title: string;
  readonly valueColumns: readonly string[];
  readonly primaryColumn: string | null;
} {
  return {
    type: 'FeatureCollection',
    name: map.name,
    title: map.displayName,
    valueColumns: map.valueColumns,
    primaryColumn: map.primaryColumn,
    features: [...map.collection.features],
  };
}

/**
 * Write every merged map to `<outDir>/<dataset>.geojson`
 *
 * @throws {DatasetIOError} naming the dataset whose file could not be written
 */
export async function exportMaps(
  data: EnvironmentData,
  outDir: string,
  datasets: readonly TabularDatasetName[] = TABULAR_DATASET_NAMES
): Promise<ExportedMap[]> {
  const targetDir = resolve(outDir);
  const exported: ExportedMap[] = [];

  for (const dataset of datasets) {
    const map = data.getMap(dataset);
    const path = join(targetDir, `${dataset}.geojson`);

    try {
      await atomicWriteJSON(path, toGeoJSON(map), 0);
    } catch (error) {
      throw new DatasetIOError(dataset, path, error);
    }

    exported.push({ dataset, path, features: map.collection.features.length });
  }

  logger.info('Exported merged maps', { outDir: targetDir, files: exported.length });
  return exported;
}
