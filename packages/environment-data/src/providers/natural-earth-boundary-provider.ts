/**
 * Natural Earth Boundary Provider
 *
 * Loads the admin-0 country layer from the downloaded Natural Earth archive
 * and normalizes each feature's country identifier so it compares equal to
 * the `code` column of the Our World in Data tables.
 *
 * Identifier resolution per feature:
 * 1. ISO_A3 when it holds a real code
 * 2. ADM0_A3 otherwise (Natural Earth marks France, Norway and Kosovo
 *    with ISO_A3 = "-99")
 */

import { readFile } from 'node:fs/promises';
import type { Geometry, GeoJsonProperties } from 'geojson';
import { BOUNDARY_DATASET } from '../config/catalog.js';
import { DatasetIOError, FormatError } from '../core/errors.js';
import type { BoundaryFeature, BoundaryGeometry, BoundaryLayer } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { normalizeCountryId } from '../transformation/country-id.js';
import { transformShapefileToGeoJSON } from '../transformation/shapefile-to-geojson.js';

const logger = createLogger('boundary');

/** Attribute columns tried, in order, for the country identifier */
export const COUNTRY_ID_FIELDS = ['ISO_A3', 'ADM0_A3', 'ISO_A3_EH'] as const;

/** Attribute columns tried, in order, for the display name */
export const COUNTRY_NAME_FIELDS = ['NAME', 'ADMIN', 'NAME_LONG'] as const;

/** Placeholder Natural Earth uses where no ISO code is assigned */
const MISSING_CODE = '-99';

/**
 * Load the boundary layer from a downloaded archive
 *
 * @throws {DatasetIOError} if the archive cannot be read or extracted
 * @throws {FormatError} if the archive lacks shapefile components or no
 *   feature carries a usable identifier
 */
export async function loadBoundary(archivePath: string): Promise<BoundaryLayer> {
  let data: Buffer;
  try {
    data = await readFile(archivePath);
  } catch (error) {
    throw new DatasetIOError(BOUNDARY_DATASET.name, archivePath, error);
  }

  const collection = await transformShapefileToGeoJSON(data, {
    dataset: BOUNDARY_DATASET.name,
    sourcePath: archivePath,
  });

  const features: BoundaryFeature[] = [];
  let skipped = 0;

  for (const feature of collection.features) {
    const boundary = toBoundaryFeature(feature.geometry, feature.properties);
    if (boundary) {
      features.push(boundary);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.warn('Skipped boundary features without polygon geometry or identifier', {
      skipped,
      archivePath,
    });
  }

  if (features.length === 0) {
    throw new FormatError(BOUNDARY_DATASET.name, 'archive contains no usable country features');
  }

  logger.info('Loaded boundary layer', { features: features.length, archivePath });

  return Object.freeze({
    source: archivePath,
    features: Object.freeze(features),
  });
}

/**
 * Build a frozen boundary feature, or null when the row cannot be joined
 */
export function toBoundaryFeature(
  geometry: Geometry | null,
  properties: GeoJsonProperties
): BoundaryFeature | null {
  if (!isBoundaryGeometry(geometry)) {
    return null;
  }

  const attributes = properties ?? {};
  const countryId = resolveCountryId(attributes);
  if (countryId === null) {
    return null;
  }

  return Object.freeze({
    countryId,
    countryName: resolveCountryName(attributes, countryId),
    geometry,
    properties: Object.freeze({ ...attributes }),
  });
}

export function resolveCountryId(attributes: Readonly<Record<string, unknown>>): string | null {
  for (const field of COUNTRY_ID_FIELDS) {
    const value = attributes[field];
    if (typeof value !== 'string') continue;

    const normalized = normalizeCountryId(value);
    if (normalized !== '' && normalized !== MISSING_CODE) {
      return normalized;
    }
  }
  return null;
}

function resolveCountryName(attributes: Readonly<Record<string, unknown>>, fallback: string): string {
  for (const field of COUNTRY_NAME_FIELDS) {
    const value = attributes[field];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return fallback;
}

function isBoundaryGeometry(geometry: Geometry | null): geometry is BoundaryGeometry {
  return geometry !== null && (geometry.type === 'Polygon' || geometry.type === 'MultiPolygon');
}
