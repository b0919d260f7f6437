import { localFiles } from '../../acquisition/dataset-downloader.js';
import { createConfig } from '../../core/config.js';
import {
  EnvironmentData,
  type EnvironmentDataStages,
} from '../../services/environment-data.js';

export interface LoadOptions {
  readonly downloadsDir?: string;
  /** Reuse files from a previous `fetch` instead of downloading */
  readonly offline?: boolean;
}

/**
 * Build the data manager for a CLI command
 */
export async function loadEnvironmentData(
  options: LoadOptions,
  stages: Partial<EnvironmentDataStages> = {}
): Promise<EnvironmentData> {
  const overrides = { downloadsDir: options.downloadsDir };

  if (options.offline) {
    const { downloadsDir } = createConfig(overrides);
    return EnvironmentData.fromFiles(localFiles(downloadsDir), overrides, stages);
  }

  return EnvironmentData.load(overrides, stages);
}
