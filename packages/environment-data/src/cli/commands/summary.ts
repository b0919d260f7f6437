/**
 * Summary Command
 *
 * Build every merged map and report its coverage.
 *
 * Usage:
 *   okavango summary [--offline] [-d <path>] [--json]
 */

import type { Command } from 'commander';
import { TABULAR_DATASET_NAMES } from '../../config/catalog.js';
import type { MergedDataset } from '../../core/types.js';
import type { EnvironmentData } from '../../services/environment-data.js';
import { loadEnvironmentData, type LoadOptions } from '../lib/load.js';
import { formatJson, formatTable } from '../lib/output.js';

export interface SummaryOptions extends LoadOptions {
  readonly json?: boolean;
}

export type MapSummary = {
  readonly map: string;
  readonly dataset: string;
  readonly rows: number;
  readonly withData: number;
  readonly noData: number;
  readonly primaryColumn: string | null;
};

export function registerSummaryCommand(program: Command): void {
  program
    .command('summary')
    .description('Merge every dataset with the world map and report coverage')
    .option('-d, --downloads-dir <path>', 'Download directory')
    .option('--offline', 'Use previously downloaded files')
    .option('--json', 'Output as JSON')
    .action(async (options: SummaryOptions) => {
      const data = await loadEnvironmentData(options);
      console.log(formatSummary(summarizeMaps(data), options.json ?? false));
    });
}

/**
 * Row count and coverage of every map, in catalog order
 */
export function summarizeMaps(data: EnvironmentData): MapSummary[] {
  return TABULAR_DATASET_NAMES.map((name) => summarizeMap(data.getMap(name)));
}

export function summarizeMap(map: MergedDataset): MapSummary {
  const rows = map.collection.features.length;
  const withData = map.collection.features.filter((feature) =>
    map.valueColumns.some((column) => feature.properties[column] !== null)
  ).length;

  return {
    map: map.displayName,
    dataset: map.name,
    rows,
    withData,
    noData: rows - withData,
    primaryColumn: map.primaryColumn,
  };
}

export function formatSummary(summaries: readonly MapSummary[], json: boolean): string {
  if (json) {
    return formatJson({ success: true, maps: summaries });
  }

  return formatTable(summaries, [
    { key: 'map', header: 'Map' },
    { key: 'rows', header: 'Rows', align: 'right' },
    { key: 'withData', header: 'With data', align: 'right' },
    { key: 'noData', header: 'No data', align: 'right' },
    { key: 'primaryColumn', header: 'Column' },
  ]);
}
