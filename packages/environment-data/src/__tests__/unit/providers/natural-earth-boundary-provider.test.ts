/**
 * Natural Earth Boundary Provider Unit Tests
 *
 * - loadBoundary() returns one feature per usable shapefile record
 * - ISO_A3 "-99" falls back to ADM0_A3
 * - missing files and empty layers are reported per failure kind
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadBoundary,
  resolveCountryId,
  toBoundaryFeature,
} from '../../../providers/natural-earth-boundary-provider.js';
import { DatasetIOError, FormatError } from '../../../core/errors.js';
import { FIXTURE_COUNTRIES, buildBoundaryZip } from '../../utils/fixtures.js';

describe('loadBoundary', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'okavango-boundary-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load one feature per country with normalized identifiers', async () => {
    const archivePath = join(dir, 'ne_110m_admin_0_countries.zip');
    await writeFile(archivePath, await buildBoundaryZip());

    const layer = await loadBoundary(archivePath);

    expect(layer.source).toBe(archivePath);
    expect(layer.features.map((f) => f.countryId)).toEqual(['BRA', 'COD', 'FRA', 'IDN', 'ATA']);
    expect(layer.features.map((f) => f.countryName)).toEqual(
      FIXTURE_COUNTRIES.map((c) => c.name)
    );
    expect(layer.features[2]?.properties).toEqual({ ISO_A3: '-99', ADM0_A3: 'FRA', NAME: 'France' });
    expect(Object.isFrozen(layer.features)).toBe(true);
  });

  it('should skip records without a usable identifier', async () => {
    const archivePath = join(dir, 'partial.zip');
    await writeFile(
      archivePath,
      await buildBoundaryZip([
        { isoA3: 'KEN', adm0A3: 'KEN', name: 'Kenya' },
        { isoA3: '-99', adm0A3: '', name: 'Nowhere' },
      ])
    );

    const layer = await loadBoundary(archivePath);

    expect(layer.features.map((f) => f.countryId)).toEqual(['KEN']);
  });

  it('should fail when no record has a usable identifier', async () => {
    const archivePath = join(dir, 'unusable.zip');
    await writeFile(archivePath, await buildBoundaryZip([{ isoA3: '-99', adm0A3: '-99', name: 'X' }]));

    const error = await loadBoundary(archivePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FormatError);
    expect(error).toMatchObject({
      message: 'Unexpected format for "geodata": archive contains no usable country features',
    });
  });

  it('should report a missing archive as an I/O failure', async () => {
    const archivePath = join(dir, 'absent.zip');

    const error = await loadBoundary(archivePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetIOError);
    expect(error).toMatchObject({ dataset: 'geodata', path: archivePath });
  });

  it('should report an archive without .dbf as a format failure', async () => {
    const archivePath = join(dir, 'no-dbf.zip');
    await writeFile(archivePath, await buildBoundaryZip(undefined, { omit: 'dbf' }));

    await expect(loadBoundary(archivePath)).rejects.toBeInstanceOf(FormatError);
  });
});

describe('resolveCountryId', () => {
  it('should prefer ISO_A3', () => {
    expect(resolveCountryId({ ISO_A3: 'nor', ADM0_A3: 'NOR' })).toBe('NOR');
  });

  it('should fall back to ADM0_A3 when ISO_A3 is -99', () => {
    expect(resolveCountryId({ ISO_A3: '-99', ADM0_A3: 'KOS' })).toBe('KOS');
  });

  it('should fall back to ISO_A3_EH last', () => {
    expect(resolveCountryId({ ISO_A3: '-99', ADM0_A3: ' ', ISO_A3_EH: 'SDS' })).toBe('SDS');
  });

  it('should return null when no field holds a code', () => {
    expect(resolveCountryId({ ISO_A3: '-99', ADM0_A3: null, NAME: 'Somewhere' })).toBeNull();
  });
});

describe('toBoundaryFeature', () => {
  it('should reject non-polygon geometry', () => {
    expect(toBoundaryFeature({ type: 'Point', coordinates: [0, 0] }, { ISO_A3: 'BRA' })).toBeNull();
    expect(toBoundaryFeature(null, { ISO_A3: 'BRA' })).toBeNull();
  });

  it('should fall back to the identifier when no name field is present', () => {
    const feature = toBoundaryFeature(
      { type: 'MultiPolygon', coordinates: [[[[0, 0], [0, 1], [1, 1], [0, 0]]]] },
      { ISO_A3: 'bra' }
    );

    expect(feature?.countryId).toBe('BRA');
    expect(feature?.countryName).toBe('BRA');
  });
});
