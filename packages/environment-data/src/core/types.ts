/**
 * Core types shared by the acquisition, transformation and service layers.
 */

import type { Feature, GeoJsonProperties, MultiPolygon, Polygon } from 'geojson';
import type {
  DatasetName,
  MapDisplayName,
  TabularDatasetName,
} from '../config/catalog.js';

export type BoundaryGeometry = Polygon | MultiPolygon;

/**
 * Local path for every catalog entry, as written by the downloader
 */
export type DownloadedFiles = Readonly<Record<DatasetName, string>>;

// ============================================================================
// Boundary layer
// ============================================================================

export interface BoundaryFeature {
  /** Normalized ISO 3166-1 alpha-3 code (trimmed, upper-case) */
  readonly countryId: string;
  readonly countryName: string;
  readonly geometry: BoundaryGeometry;
  /** Attribute table row from the shapefile */
  readonly properties: Readonly<NonNullable<GeoJsonProperties>>;
}

/**
 * One feature per country/territory; frozen after load
 */
export interface BoundaryLayer {
  readonly source: string;
  readonly features: readonly BoundaryFeature[];
}

// ============================================================================
// Tabular datasets
// ============================================================================

export type CellValue = number | string | null;

export interface TabularRow {
  readonly countryId: string;
  readonly entity: string;
  readonly year: number | null;
  readonly values: Readonly<Record<string, CellValue>>;
}

export interface TabularDataset {
  readonly name: TabularDatasetName;
  readonly columns: readonly string[];
  readonly valueColumns: readonly string[];
  readonly rows: readonly TabularRow[];
}

// ============================================================================
// Merged datasets
// ============================================================================

export interface MergedProperties {
  readonly countryId: string;
  readonly countryName: string;
  readonly year: number | null;
  readonly [column: string]: CellValue;
}

export type MergedFeature = Feature<BoundaryGeometry, MergedProperties>;

/**
 * GeoJSON FeatureCollection with a frozen feature list, one feature per
 * boundary feature
 */
export interface MergedCollection {
  readonly type: 'FeatureCollection';
  readonly features: readonly MergedFeature[];
}

export interface MergedDataset {
  readonly name: TabularDatasetName;
  readonly displayName: MapDisplayName;
  readonly valueColumns: readonly string[];
  /** Column the visualization layer plots by default */
  readonly primaryColumn: string | null;
  readonly collection: MergedCollection;
}

export type MergedDatasets = Readonly<Record<TabularDatasetName, MergedDataset>>;
