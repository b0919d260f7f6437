/**
 * Tabular Loader
 *
 * Parses an Our World in Data grapher CSV into typed rows keyed by
 * normalized country code.
 *
 * Expected header (short column names): `entity,code,year,<value>...`.
 * Capitalized headers (`Entity,Code,Year`) are accepted as well.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { TabularDatasetName } from '../config/catalog.js';
import { DatasetIOError, FormatError } from '../core/errors.js';
import type { CellValue, TabularDataset, TabularRow } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { normalizeCountryId } from './country-id.js';

const logger = createLogger('tabular');

const COUNTRY_COLUMNS = ['code', 'Code'] as const;
const ENTITY_COLUMNS = ['entity', 'Entity'] as const;
const YEAR_COLUMNS = ['year', 'Year'] as const;

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Read and parse a downloaded CSV
 *
 * @throws {DatasetIOError} if the file cannot be read
 * @throws {FormatError} if the file is not CSV or has no country column
 */
export async function loadTabularDataset(
  name: TabularDatasetName,
  filePath: string
): Promise<TabularDataset> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DatasetIOError(name, filePath, error);
  }

  return parseTabularDataset(name, text);
}

/**
 * Parse CSV text into a TabularDataset
 *
 * Rows without a country code (regional aggregates such as "World" or
 * "Europe") are dropped; they can never match a boundary feature.
 */
export function parseTabularDataset(name: TabularDatasetName, text: string): TabularDataset {
  const records = parseRecords(name, text);
  if (records.length === 0) {
    throw new FormatError(name, 'file is empty');
  }

  const [header, ...body] = records;
  const columns = header.map((column) => column.trim());

  const countryIndex = findColumn(columns, COUNTRY_COLUMNS);
  if (countryIndex === -1) {
    throw new FormatError(
      name,
      `missing country column (expected one of ${COUNTRY_COLUMNS.join(', ')}; found ${columns.join(', ')})`
    );
  }
  const entityIndex = findColumn(columns, ENTITY_COLUMNS);
  const yearIndex = findColumn(columns, YEAR_COLUMNS);

  const metaIndexes = new Set([countryIndex, entityIndex, yearIndex]);
  const valueIndexes = columns
    .map((_, index) => index)
    .filter((index) => !metaIndexes.has(index));
  const valueColumns = valueIndexes.map((index) => columns[index]);

  const rows: TabularRow[] = [];
  let aggregates = 0;

  for (const record of body) {
    const countryId = normalizeCountryId(record[countryIndex] ?? '');
    if (countryId === '') {
      aggregates++;
      continue;
    }

    const values: Record<string, CellValue> = {};
    for (const index of valueIndexes) {
      values[columns[index]] = parseCell(record[index] ?? '');
    }

    rows.push({
      countryId,
      entity: entityIndex === -1 ? countryId : (record[entityIndex] ?? '').trim(),
      year: yearIndex === -1 ? null : parseYear(record[yearIndex] ?? ''),
      values,
    });
  }

  logger.child({ dataset: name }).debug('Parsed tabular dataset', {
    rows: rows.length,
    droppedAggregates: aggregates,
    valueColumns,
  });

  return { name, columns, valueColumns, rows };
}

/**
 * Keep, per country, only the rows of that country's most recent year
 *
 * Datasets without a year column are returned unchanged.
 */
export function selectLatestPerCountry(dataset: TabularDataset): TabularDataset {
  const latestYear = new Map<string, number>();

  for (const row of dataset.rows) {
    if (row.year === null) continue;
    const current = latestYear.get(row.countryId);
    if (current === undefined || row.year > current) {
      latestYear.set(row.countryId, row.year);
    }
  }

  if (latestYear.size === 0) {
    return dataset;
  }

  const rows = dataset.rows.filter((row) => {
    const latest = latestYear.get(row.countryId);
    return latest === undefined || row.year === latest;
  });

  return { ...dataset, rows };
}

/**
 * Parse a CSV cell: finite number, trimmed string, or null when empty
 */
export function parseCell(raw: string): CellValue {
  const value = raw.trim();
  if (value === '') {
    return null;
  }
  if (NUMERIC_PATTERN.test(value)) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return value;
}

function parseYear(raw: string): number | null {
  const value = parseCell(raw);
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function findColumn(columns: readonly string[], candidates: readonly string[]): number {
  for (const candidate of candidates) {
    const index = columns.indexOf(candidate);
    if (index !== -1) return index;
  }
  return -1;
}

function parseRecords(name: TabularDatasetName, text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new FormatError(
      name,
      `not valid CSV: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!Array.isArray(parsed)) {
    throw new FormatError(name, 'CSV parser returned no records');
  }

  return parsed.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? '')) : []
  );
}
