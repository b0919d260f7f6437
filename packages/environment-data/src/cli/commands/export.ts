/**
 * Export Command
 *
 * Write every merged map as `<dataset>.geojson`.
 *
 * Usage:
 *   okavango export -o <dir> [--offline] [-d <path>] [--json]
 */

import type { Command } from 'commander';
import { exportMaps } from '../../services/map-export.js';
import { loadEnvironmentData, type LoadOptions } from '../lib/load.js';
import { formatJson, formatTable } from '../lib/output.js';

export interface ExportOptions extends LoadOptions {
  readonly output: string;
  readonly json?: boolean;
}

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Write merged maps as GeoJSON files')
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('-d, --downloads-dir <path>', 'Download directory')
    .option('--offline', 'Use previously downloaded files')
    .option('--json', 'Output as JSON')
    .action(async (options: ExportOptions) => {
      const data = await loadEnvironmentData(options);
      const exported = await exportMaps(data, options.output);

      if (options.json) {
        console.log(formatJson({ success: true, files: exported }));
        return;
      }

      console.log(
        formatTable(
          exported,
          [
            { key: 'dataset', header: 'Dataset' },
            { key: 'features', header: 'Features', align: 'right' },
            { key: 'path', header: 'Path' },
          ]
        )
      );
    });
}
