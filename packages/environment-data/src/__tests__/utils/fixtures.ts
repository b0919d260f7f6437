/**
 * Test fixtures: hand-built shapefile archives, OWID-style CSVs and
 * boundary layers. Everything is generated in-process.
 */

import JSZip from 'jszip';
import { mkdir, writeFile } from 'node:fs/promises';
import { DATASET_CATALOG, TABULAR_DATASETS } from '../../config/catalog.js';
import type { BoundaryFeature, BoundaryLayer, DownloadedFiles } from '../../core/types.js';
import { localFiles } from '../../acquisition/dataset-downloader.js';
import { toBoundaryFeature } from '../../providers/natural-earth-boundary-provider.js';

// ============================================================================
// Boundary countries
// ============================================================================

export interface FixtureCountry {
  readonly isoA3: string;
  readonly adm0A3: string;
  readonly name: string;
}

export const FIXTURE_COUNTRIES: readonly FixtureCountry[] = [
  { isoA3: 'BRA', adm0A3: 'BRA', name: 'Brazil' },
  { isoA3: 'COD', adm0A3: 'COD', name: 'Dem. Rep. Congo' },
  { isoA3: '-99', adm0A3: 'FRA', name: 'France' },
  { isoA3: 'IDN', adm0A3: 'IDN', name: 'Indonesia' },
  { isoA3: 'ATA', adm0A3: 'ATA', name: 'Antarctica' },
];

/**
 * Unit square (clockwise, closed) offset by `index` along the x axis
 */
export function squareRing(index: number): number[][] {
  const x = index * 2;
  return [
    [x, 0],
    [x, 1],
    [x + 1, 1],
    [x + 1, 0],
    [x, 0],
  ];
}

export function makeBoundaryFeature(country: FixtureCountry, index: number): BoundaryFeature {
  const feature = toBoundaryFeature(
    { type: 'Polygon', coordinates: [squareRing(index)] },
    { ISO_A3: country.isoA3, ADM0_A3: country.adm0A3, NAME: country.name }
  );
  if (!feature) {
    throw new Error(`Fixture country ${country.name} has no usable identifier`);
  }
  return feature;
}

export function makeBoundaryLayer(
  countries: readonly FixtureCountry[] = FIXTURE_COUNTRIES
): BoundaryLayer {
  return Object.freeze({
    source: 'fixture',
    features: Object.freeze(countries.map((country, i) => makeBoundaryFeature(country, i))),
  });
}

/**
 * `count` synthetic countries with codes C001, C002, ...
 */
export function syntheticCountries(count: number): FixtureCountry[] {
  return Array.from({ length: count }, (_, i) => {
    const code = `C${String(i + 1).padStart(3, '0')}`;
    return { isoA3: code, adm0A3: code, name: `Country ${i + 1}` };
  });
}

// ============================================================================
// Shapefile encoding
// ============================================================================

const SHP_HEADER_BYTES = 100;
const SHAPE_TYPE_POLYGON = 5;

/**
 * Encode single-ring polygons as a .shp file (ESRI Shapefile, type 5)
 */
export function encodeShp(rings: readonly number[][][]): Buffer {
  const records = rings.map((ring, i) => {
    const contentBytes = 4 + 32 + 4 + 4 + 4 + ring.length * 16;
    const record = Buffer.alloc(8 + contentBytes);
    const xs = ring.map((p) => p[0]);
    const ys = ring.map((p) => p[1]);

    record.writeInt32BE(i + 1, 0);
    record.writeInt32BE(contentBytes / 2, 4);

    let offset = 8;
    record.writeInt32LE(SHAPE_TYPE_POLYGON, offset);
    record.writeDoubleLE(Math.min(...xs), offset + 4);
    record.writeDoubleLE(Math.min(...ys), offset + 12);
    record.writeDoubleLE(Math.max(...xs), offset + 20);
    record.writeDoubleLE(Math.max(...ys), offset + 28);
    record.writeInt32LE(1, offset + 36); // parts
    record.writeInt32LE(ring.length, offset + 40); // points
    record.writeInt32LE(0, offset + 44); // first part starts at point 0
    offset += 48;

    for (const [x, y] of ring) {
      record.writeDoubleLE(x, offset);
      record.writeDoubleLE(y, offset + 8);
      offset += 16;
    }
    return record;
  });

  const allX = rings.flatMap((ring) => ring.map((p) => p[0]));
  const allY = rings.flatMap((ring) => ring.map((p) => p[1]));
  const body = Buffer.concat(records);
  const header = Buffer.alloc(SHP_HEADER_BYTES);

  header.writeInt32BE(9994, 0);
  header.writeInt32BE((SHP_HEADER_BYTES + body.length) / 2, 24);
  header.writeInt32LE(1000, 28);
  header.writeInt32LE(SHAPE_TYPE_POLYGON, 32);
  header.writeDoubleLE(Math.min(...allX), 36);
  header.writeDoubleLE(Math.min(...allY), 44);
  header.writeDoubleLE(Math.max(...allX), 52);
  header.writeDoubleLE(Math.max(...allY), 60);

  return Buffer.concat([header, body]);
}

export interface DbfField {
  readonly name: string;
  readonly length: number;
}

/**
 * Encode character fields as a dBASE III table (UTF-8 values)
 */
export function encodeDbf(
  fields: readonly DbfField[],
  rows: readonly Readonly<Record<string, string>>[]
): Buffer {
  const headerLength = 32 + fields.length * 32 + 1;
  const recordLength = 1 + fields.reduce((sum, f) => sum + f.length, 0);
  const header = Buffer.alloc(headerLength);

  header.writeUInt8(0x03, 0);
  header.writeUInt8(124, 1);
  header.writeUInt8(1, 2);
  header.writeUInt8(1, 3);
  header.writeUInt32LE(rows.length, 4);
  header.writeUInt16LE(headerLength, 8);
  header.writeUInt16LE(recordLength, 10);

  fields.forEach((field, i) => {
    const offset = 32 + i * 32;
    header.write(field.name, offset, 11, 'ascii');
    header.writeUInt8('C'.charCodeAt(0), offset + 11);
    header.writeUInt8(field.length, offset + 16);
  });
  header.writeUInt8(0x0d, headerLength - 1);

  const records = rows.map((row) => {
    const record = Buffer.alloc(recordLength, 0x20);
    let offset = 1;
    for (const field of fields) {
      record.write((row[field.name] ?? '').padEnd(field.length, ' '), offset, field.length, 'utf-8');
      offset += field.length;
    }
    return record;
  });

  return Buffer.concat([header, ...records, Buffer.from([0x1a])]);
}

export const BOUNDARY_DBF_FIELDS: readonly DbfField[] = [
  { name: 'ISO_A3', length: 3 },
  { name: 'ADM0_A3', length: 3 },
  { name: 'NAME', length: 40 },
];

export interface BoundaryZipOptions {
  readonly omit?: 'shp' | 'dbf';
}

/**
 * Natural Earth-style archive for the given countries
 */
export async function buildBoundaryZip(
  countries: readonly FixtureCountry[] = FIXTURE_COUNTRIES,
  options: BoundaryZipOptions = {}
): Promise<Buffer> {
  const zip = new JSZip();
  const base = 'ne_110m_admin_0_countries';

  if (options.omit !== 'shp') {
    zip.file(`${base}.shp`, encodeShp(countries.map((_, i) => squareRing(i))));
  }
  if (options.omit !== 'dbf') {
    zip.file(
      `${base}.dbf`,
      encodeDbf(
        BOUNDARY_DBF_FIELDS,
        countries.map((c) => ({ ISO_A3: c.isoA3, ADM0_A3: c.adm0A3, NAME: c.name }))
      )
    );
  }
  zip.file(`${base}.cpg`, 'UTF-8');
  zip.file(`${base}.prj`, 'GEOGCS["GCS_WGS_1984"]');

  return zip.generateAsync({ type: 'nodebuffer' });
}

// ============================================================================
// Tabular fixtures
// ============================================================================

export type CsvRow = readonly [entity: string, code: string, year: number | string, value: number | string];

/**
 * OWID grapher CSV with short column names
 */
export function owidCsv(valueColumn: string, rows: readonly CsvRow[]): string {
  const lines = [`entity,code,year,${valueColumn}`];
  for (const [entity, code, year, value] of rows) {
    lines.push(`${entity},${code},${year},${value}`);
  }
  return `${lines.join('\n')}\n`;
}

export const FOREST_ROWS: readonly CsvRow[] = [
  ['Brazil', 'BRA', 2010, 61.2],
  ['Brazil', 'BRA', 2020, 59.4],
  ['France', 'FRA', 2020, 31.5],
  ['Indonesia', 'IDN', 2020, 49.1],
  ['World', '', 2020, 31.1],
  ['Singapore', 'SGP', 2020, 21.7],
];

/**
 * Write a complete, valid set of downloaded files into `dir`
 */
export async function seedDownloads(
  dir: string,
  countries: readonly FixtureCountry[] = FIXTURE_COUNTRIES
): Promise<DownloadedFiles> {
  await mkdir(dir, { recursive: true });
  const files = localFiles(dir);

  for (const descriptor of TABULAR_DATASETS) {
    await writeFile(files[descriptor.name], owidCsv(descriptor.valueColumn, FOREST_ROWS));
  }
  await writeFile(files.geodata, await buildBoundaryZip(countries));

  return files;
}

/**
 * Response body served for every catalog URL by the fetch stub
 */
export async function catalogResponses(): Promise<Map<string, Buffer>> {
  const responses = new Map<string, Buffer>();
  const zip = await buildBoundaryZip();

  for (const descriptor of DATASET_CATALOG) {
    const tabular = TABULAR_DATASETS.find((d) => d.name === descriptor.name);
    responses.set(
      descriptor.url,
      tabular ? Buffer.from(owidCsv(tabular.valueColumn, FOREST_ROWS)) : zip
    );
  }
  return responses;
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}
