/**
 * EnvironmentData: central data manager
 *
 * Runs Downloader → Boundary Loader → Merger and exposes the five merged
 * maps as fixed, read-only fields. Acquisition happens in the async
 * factories, never in the constructor; an instance only exists once every
 * dataset merged successfully. Reconstruction is the only way to refresh.
 *
 * @example
 * ```typescript
 * const data = await EnvironmentData.load({ downloadsDir: 'downloads' });
 * const maps = data.listAvailableMaps();
 * const selected = maps['Annual Deforestation'];
 * ```
 */

import { downloadDatasets } from '../acquisition/dataset-downloader.js';
import {
  BOUNDARY_DATASET,
  type MapDisplayName,
  type TabularDatasetName,
} from '../config/catalog.js';
import { resolveEnvironmentConfig, type EnvironmentConfig } from '../core/config.js';
import { DatasetBatchError, toError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import type {
  BoundaryLayer,
  DownloadedFiles,
  MergedDataset,
  MergedDatasets,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { loadBoundary } from '../providers/natural-earth-boundary-provider.js';
import { mergeDatasets } from '../transformation/country-join.js';

const logger = createLogger('environment-data');

/**
 * One field per tabular catalog entry
 */
export interface EnvironmentMaps {
  readonly annualChangeForestArea: MergedDataset;
  readonly annualDeforestation: MergedDataset;
  readonly shareLandProtected: MergedDataset;
  readonly shareLandDegraded: MergedDataset;
  readonly forestAreaTotal: MergedDataset;
}

/**
 * Pipeline stages, replaceable for tests
 */
export interface EnvironmentDataStages {
  readonly download: (downloadDir: string, config: EnvironmentConfig) => Promise<DownloadedFiles>;
  readonly loadBoundary: (archivePath: string) => Promise<BoundaryLayer>;
  readonly merge: (files: DownloadedFiles, boundary: BoundaryLayer) => Promise<MergedDatasets>;
}

export const DEFAULT_STAGES: EnvironmentDataStages = {
  download: (downloadDir, config) =>
    downloadDatasets(downloadDir, {
      concurrency: config.concurrency,
      client: new HTTPClient({ timeoutMs: config.timeoutMs, maxRetries: config.maxRetries }),
    }),
  loadBoundary,
  merge: mergeDatasets,
};

export class EnvironmentData implements EnvironmentMaps {
  readonly annualChangeForestArea: MergedDataset;
  readonly annualDeforestation: MergedDataset;
  readonly shareLandProtected: MergedDataset;
  readonly shareLandDegraded: MergedDataset;
  readonly forestAreaTotal: MergedDataset;

  private constructor(
    readonly config: EnvironmentConfig,
    readonly files: DownloadedFiles,
    merged: MergedDatasets
  ) {
    this.annualChangeForestArea = merged.annual_change_forest_area;
    this.annualDeforestation = merged.annual_deforestation;
    this.shareLandProtected = merged.share_land_protected;
    this.shareLandDegraded = merged.share_land_degraded;
    this.forestAreaTotal = merged.forest_area_total;
    Object.freeze(this);
  }

  /**
   * Download every dataset, then load and merge
   *
   * @throws {ConfigError} for invalid configuration
   * @throws {DatasetBatchError} naming each dataset that failed and its stage
   */
  static async load(
    overrides: Partial<EnvironmentConfig> = {},
    stages: Partial<EnvironmentDataStages> = {}
  ): Promise<EnvironmentData> {
    const config = await resolveEnvironmentConfig(overrides);
    const pipeline = { ...DEFAULT_STAGES, ...stages };

    logger.info('Downloading datasets', { downloadsDir: config.downloadsDir });
    const files = await pipeline.download(config.downloadsDir, config);

    return EnvironmentData.build(config, files, pipeline);
  }

  /**
   * Load and merge previously downloaded files without touching the network
   */
  static async fromFiles(
    files: DownloadedFiles,
    overrides: Partial<EnvironmentConfig> = {},
    stages: Partial<EnvironmentDataStages> = {}
  ): Promise<EnvironmentData> {
    const config = await resolveEnvironmentConfig(overrides);
    return EnvironmentData.build(config, files, { ...DEFAULT_STAGES, ...stages });
  }

  private static async build(
    config: EnvironmentConfig,
    files: DownloadedFiles,
    pipeline: EnvironmentDataStages
  ): Promise<EnvironmentData> {
    let boundary: BoundaryLayer;
    try {
      boundary = await pipeline.loadBoundary(files.geodata);
    } catch (error) {
      throw new DatasetBatchError('boundary', [
        { dataset: BOUNDARY_DATASET.name, stage: 'boundary', error: toError(error) },
      ]);
    }

    logger.info('Merging with world map', { boundaryFeatures: boundary.features.length });
    const merged = await pipeline.merge(files, boundary);

    const data = new EnvironmentData(config, Object.freeze({ ...files }), merged);
    logger.info('EnvironmentData is ready', { maps: Object.keys(data.listAvailableMaps()).length });
    return data;
  }

  /**
   * All merged maps keyed by display name, for the map selector
   */
  listAvailableMaps(): Readonly<Record<MapDisplayName, MergedDataset>> {
    return Object.freeze({
      'Annual Change in Forest Area': this.annualChangeForestArea,
      'Annual Deforestation': this.annualDeforestation,
      'Share of Land Protected': this.shareLandProtected,
      'Share of Land Degraded': this.shareLandDegraded,
      'Forest Area Total Share': this.forestAreaTotal,
    });
  }

  getMap(name: TabularDatasetName): MergedDataset {
    switch (name) {
      case 'annual_change_forest_area':
        return this.annualChangeForestArea;
      case 'annual_deforestation':
        return this.annualDeforestation;
      case 'share_land_protected':
        return this.shareLandProtected;
      case 'share_land_degraded':
        return this.shareLandDegraded;
      case 'forest_area_total':
        return this.forestAreaTotal;
    }
  }
}
