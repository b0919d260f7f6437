/**
 * Fetch Command
 *
 * Download every catalog dataset into the downloads directory.
 *
 * Usage:
 *   okavango fetch [options]
 *
 * Options:
 *   -d, --downloads-dir <path>  Download directory (default: downloads)
 *   --concurrency <n>           Parallel downloads (default: 1)
 *   --json                      Output as JSON
 */

import type { Command } from 'commander';
import { stat } from 'node:fs/promises';
import { downloadDatasets } from '../../acquisition/dataset-downloader.js';
import { DATASET_CATALOG } from '../../config/catalog.js';
import { resolveEnvironmentConfig } from '../../core/config.js';
import { HTTPClient } from '../../core/http-client.js';
import { formatBytes, formatJson, formatTable } from '../lib/output.js';

export interface FetchOptions {
  readonly downloadsDir?: string;
  readonly concurrency?: number;
  readonly json?: boolean;
}

export type FetchedFile = {
  readonly dataset: string;
  readonly kind: string;
  readonly path: string;
  readonly bytes: number;
};

export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .description('Download all datasets (always re-fetches)')
    .option('-d, --downloads-dir <path>', 'Download directory')
    .option('--concurrency <n>', 'Parallel downloads', (value: string) => parseInt(value, 10))
    .option('--json', 'Output as JSON')
    .action(async (options: FetchOptions) => {
      console.log(await runFetch(options));
    });
}

export async function runFetch(options: FetchOptions): Promise<string> {
  const config = await resolveEnvironmentConfig({
    downloadsDir: options.downloadsDir,
    concurrency: options.concurrency,
  });

  const files = await downloadDatasets(config.downloadsDir, {
    concurrency: config.concurrency,
    client: new HTTPClient({ timeoutMs: config.timeoutMs, maxRetries: config.maxRetries }),
  });

  const fetched: FetchedFile[] = [];
  for (const descriptor of DATASET_CATALOG) {
    const path = files[descriptor.name];
    const { size } = await stat(path);
    fetched.push({ dataset: descriptor.name, kind: descriptor.kind, path, bytes: size });
  }

  if (options.json) {
    return formatJson({ success: true, downloadsDir: config.downloadsDir, files: fetched });
  }

  return formatTable(fetched, [
    { key: 'dataset', header: 'Dataset' },
    { key: 'kind', header: 'Kind' },
    {
      key: 'bytes',
      header: 'Size',
      align: 'right',
      formatter: (value) => (typeof value === 'number' ? formatBytes(value) : ''),
    },
    { key: 'path', header: 'Path' },
  ]);
}
