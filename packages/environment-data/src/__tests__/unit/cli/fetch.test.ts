/**
 * Fetch Command Unit Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runFetch } from '../../../cli/commands/fetch.js';
import { DatasetBatchError } from '../../../core/errors.js';
import { NATURAL_EARTH_URL } from '../../../config/catalog.js';
import { catalogResponses } from '../../utils/fixtures.js';
import { serveFromMap } from '../../utils/fetch-stub.js';

describe('runFetch', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'okavango-fetch-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('should report every downloaded file as JSON', async () => {
    serveFromMap(await catalogResponses());

    const output: unknown = JSON.parse(await runFetch({ downloadsDir: dir, json: true }));

    expect(output).toMatchObject({ success: true, downloadsDir: dir });
    const zip = join(dir, 'ne_110m_admin_0_countries.zip');
    expect(output).toHaveProperty(['files', 5], {
      dataset: 'geodata',
      kind: 'archive',
      path: zip,
      bytes: (await stat(zip)).size,
    });
  });

  it('should render a table with one row per dataset', async () => {
    serveFromMap(await catalogResponses());

    const table = await runFetch({ downloadsDir: dir, concurrency: 2 });
    const lines = table.split('\n');

    expect(lines).toHaveLength(8);
    expect(lines[0]?.startsWith('Dataset ')).toBe(true);
    expect(lines[7]?.startsWith('geodata ')).toBe(true);
  });

  it('should fail with a download batch error when the archive is unavailable', async () => {
    const responses = await catalogResponses();
    serveFromMap(responses, new Set([NATURAL_EARTH_URL]));

    const error = await runFetch({ downloadsDir: dir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetBatchError);
    expect(error).toMatchObject({ stage: 'download', datasets: ['geodata'] });
  });
});
