/**
 * Okavango Environment Data
 *
 * Acquisition and merge pipeline: downloads the Our World in Data tables and
 * the Natural Earth country boundaries, joins each table onto the boundary
 * layer and exposes the merged maps for visualization.
 */

// Catalog
export {
  BOUNDARY_DATASET,
  DATASET_CATALOG,
  NATURAL_EARTH_URL,
  TABULAR_DATASETS,
  TABULAR_DATASET_NAMES,
  getTabularDescriptor,
} from './config/catalog.js';
export type {
  BoundaryDatasetName,
  DatasetDescriptor,
  DatasetKind,
  DatasetName,
  MapDisplayName,
  TabularDatasetDescriptor,
  TabularDatasetName,
} from './config/catalog.js';

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  DEFAULT_CONFIG,
  EnvironmentConfigSchema,
  createConfig,
  resolveEnvironmentConfig,
} from './core/config.js';
export type { EnvironmentConfig } from './core/config.js';
export { HTTPClient } from './core/http-client.js';
export type { HTTPClientConfig } from './core/http-client.js';
export { logger, createLogger } from './core/utils/logger.js';

// Pipeline stages
export { downloadDatasets, downloadDataset, localFiles } from './acquisition/dataset-downloader.js';
export type { DownloadOptions } from './acquisition/dataset-downloader.js';
export { loadBoundary } from './providers/natural-earth-boundary-provider.js';
export { transformShapefileToGeoJSON } from './transformation/shapefile-to-geojson.js';
export {
  loadTabularDataset,
  parseTabularDataset,
  selectLatestPerCountry,
} from './transformation/tabular-loader.js';
export { joinWithBoundary, mergeDataset, mergeDatasets } from './transformation/country-join.js';
export { normalizeCountryId } from './transformation/country-id.js';

// Data manager
export { EnvironmentData, DEFAULT_STAGES } from './services/environment-data.js';
export type { EnvironmentDataStages, EnvironmentMaps } from './services/environment-data.js';
export { exportMaps, toGeoJSON } from './services/map-export.js';
export type { ExportedMap } from './services/map-export.js';
