/**
 * Map Export Unit Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EnvironmentData } from '../../../services/environment-data.js';
import { exportMaps, toGeoJSON } from '../../../services/map-export.js';
import { seedDownloads } from '../../utils/fixtures.js';

describe('map export', () => {
  let dir: string;
  let data: EnvironmentData;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'okavango-export-'));
    const downloadsDir = join(dir, 'downloads');
    data = await EnvironmentData.fromFiles(await seedDownloads(downloadsDir), { downloadsDir });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should describe the dataset as foreign members', () => {
    const geojson = toGeoJSON(data.annualDeforestation);

    expect(geojson.type).toBe('FeatureCollection');
    expect(geojson.name).toBe('annual_deforestation');
    expect(geojson.title).toBe('Annual Deforestation');
    expect(geojson.primaryColumn).toBe('_1d_deforestation');
    expect(geojson.features).toHaveLength(5);
  });

  it('should write one GeoJSON file per dataset', async () => {
    const outDir = join(dir, 'out');

    const exported = await exportMaps(data, outDir);

    expect(exported.map((e) => e.path)).toEqual([
      join(outDir, 'annual_change_forest_area.geojson'),
      join(outDir, 'annual_deforestation.geojson'),
      join(outDir, 'share_land_protected.geojson'),
      join(outDir, 'share_land_degraded.geojson'),
      join(outDir, 'forest_area_total.geojson'),
    ]);
    expect(exported.every((e) => e.features === 5)).toBe(true);

    const written: unknown = JSON.parse(
      await readFile(join(outDir, 'forest_area_total.geojson'), 'utf-8')
    );
    expect(written).toMatchObject({
      type: 'FeatureCollection',
      name: 'forest_area_total',
      features: [
        { properties: { countryId: 'BRA', forest_share: 59.4, year: 2020 } },
        { properties: { countryId: 'COD', forest_share: null, year: null } },
        { properties: { countryId: 'FRA', forest_share: 31.5 } },
        { properties: { countryId: 'IDN', forest_share: 49.1 } },
        { properties: { countryId: 'ATA', forest_share: null } },
      ],
    });
  });

  it('should export a subset of datasets', async () => {
    const exported = await exportMaps(data, join(dir, 'subset'), ['share_land_protected']);

    expect(exported).toEqual([
      {
        dataset: 'share_land_protected',
        path: join(dir, 'subset', 'share_land_protected.geojson'),
        features: 5,
      },
    ]);
  });
});
