/**
 * Dataset Downloader
 *
 * Fetches every catalog entry and writes the raw bytes to
 * `<downloadDir>/<fileName>`, replacing whatever was there. There is no
 * skip-if-exists path: each call re-fetches every dataset.
 *
 * Failures are isolated per dataset. After all entries were attempted, any
 * failure is raised as one DatasetBatchError naming each failed dataset.
 */

import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  DATASET_CATALOG,
  type DatasetDescriptor,
  type DatasetName,
} from '../config/catalog.js';
import { HTTPClient } from '../core/http-client.js';
import {
  DatasetBatchError,
  DatasetIOError,
  NetworkError,
} from '../core/errors.js';
import type { DownloadedFiles } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { settleInBatches } from '../core/utils/batch.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger('downloader');

export interface DownloadOptions {
  /** Client used for every request (default: new HTTPClient with its defaults) */
  readonly client?: HTTPClient;

  /** Maximum concurrent downloads (default: 1, sequential) */
  readonly concurrency?: number;
}

/**
 * Download all catalog datasets into `downloadDir`
 *
 * The directory is created if absent.
 *
 * @returns Local path for every catalog name
 * @throws {DatasetBatchError} with stage 'download' if any dataset failed
 */
export async function downloadDatasets(
  downloadDir: string,
  options: DownloadOptions = {}
): Promise<DownloadedFiles> {
  const outputDir = resolve(downloadDir);
  const catalog = DATASET_CATALOG;
  const client = options.client ?? new HTTPClient();

  await mkdir(outputDir, { recursive: true });

  logger.info('Downloading datasets', {
    downloadDir: outputDir,
    datasets: catalog.length,
    concurrency: options.concurrency ?? 1,
  });

  const byName = new Map(catalog.map((d) => [d.name, d]));
  const outcome = await settleInBatches(
    catalog.map((d) => d.name),
    'download',
    async (name) => {
      const descriptor = byName.get(name);
      if (!descriptor) {
        throw new Error(`Dataset "${name}" missing from catalog`);
      }
      return downloadDataset(descriptor, outputDir, client);
    },
    options.concurrency
  );

  if (outcome.failures.length > 0) {
    for (const failure of outcome.failures) {
      logger.child({ dataset: failure.dataset }).error('Dataset download failed', {
        error: failure.error.message,
      });
    }
    throw new DatasetBatchError('download', outcome.failures);
  }

  const files: Partial<Record<DatasetName, string>> = {};
  for (const [name, path] of outcome.results) {
    files[name] = path;
  }

  return assertComplete(files);
}

/**
 * Download one dataset and write it atomically
 *
 * @returns Absolute path of the written file
 * @throws {NetworkError} on request failure or empty body
 * @throws {DatasetIOError} on local write failure
 */
export async function downloadDataset(
  descriptor: DatasetDescriptor<DatasetName>,
  downloadDir: string,
  client: HTTPClient = new HTTPClient()
): Promise<string> {
  const filePath = join(downloadDir, descriptor.fileName);
  const startTime = Date.now();

  let data: Buffer;
  try {
    data = await client.fetchBuffer(descriptor.url);
  } catch (error) {
    throw new NetworkError(descriptor.name, descriptor.url, error);
  }

  if (data.length === 0) {
    throw new NetworkError(descriptor.name, descriptor.url, new Error('Empty response body'));
  }

  try {
    await atomicWriteFile(filePath, data);
  } catch (error) {
    throw new DatasetIOError(descriptor.name, filePath, error);
  }

  logger.child({ dataset: descriptor.name }).info('Downloaded dataset', {
    kind: descriptor.kind,
    bytes: data.length,
    durationMs: Date.now() - startTime,
    path: filePath,
  });

  return filePath;
}

function assertComplete(files: Partial<Record<DatasetName, string>>): DownloadedFiles {
  const {
    annual_change_forest_area,
    annual_deforestation,
    share_land_protected,
    share_land_degraded,
    forest_area_total,
    geodata,
  } = files;

  if (
    annual_change_forest_area === undefined ||
    annual_deforestation === undefined ||
    share_land_protected === undefined ||
    share_land_degraded === undefined ||
    forest_area_total === undefined ||
    geodata === undefined
  ) {
    const missing = DATASET_CATALOG.map((d) => d.name).filter((name) => files[name] === undefined);
    throw new Error(`Download result incomplete, missing: ${missing.join(', ')}`);
  }

  return Object.freeze({
    annual_change_forest_area,
    annual_deforestation,
    share_land_protected,
    share_land_degraded,
    forest_area_total,
    geodata,
  });
}

/**
 * Paths the downloader writes to, for reusing a previous download
 */
export function localFiles(downloadDir: string): DownloadedFiles {
  const outputDir = resolve(downloadDir);
  const files: Partial<Record<DatasetName, string>> = {};
  for (const descriptor of DATASET_CATALOG) {
    files[descriptor.name] = join(outputDir, descriptor.fileName);
  }
  return assertComplete(files);
}
