/**
 * Dataset Catalog
 *
 * Single source of truth for every remote dataset the pipeline acquires:
 * five Our World in Data grapher tables plus the Natural Earth boundary
 * archive they are joined to.
 *
 * Our World in Data
 * License: CC BY 4.0
 * Format: CSV, `useColumnShortNames=true` gives `entity,code,year,<value>`
 *
 * Natural Earth
 * License: Public domain
 * Format: ESRI shapefile inside a ZIP archive (1:110m admin-0 countries)
 */

const OWID_GRAPHER = 'https://ourworldindata.org/grapher';
const OWID_QUERY = 'v=1&csvType=full&useColumnShortNames=true';

function owidUrl(slug: string): string {
  return `${OWID_GRAPHER}/${slug}.csv?${OWID_QUERY}`;
}

export const NATURAL_EARTH_URL =
  'https://naturalearth.s3.amazonaws.com/110m_cultural/ne_110m_admin_0_countries.zip';

export type DatasetKind = 'tabular' | 'archive';

export interface DatasetDescriptor<N extends string = string> {
  readonly name: N;
  readonly displayName: string;
  readonly url: string;
  readonly fileName: string;
  readonly kind: DatasetKind;
  /** Headline indicator column for tabular datasets */
  readonly valueColumn?: string;
}

export const TABULAR_DATASETS = [
  {
    name: 'annual_change_forest_area',
    displayName: 'Annual Change in Forest Area',
    url: owidUrl('annual-change-forest-area'),
    fileName: 'annual_change_forest_area.csv',
    kind: 'tabular',
    valueColumn: 'net_change_forest_area',
  },
  {
    name: 'annual_deforestation',
    displayName: 'Annual Deforestation',
    url: owidUrl('annual-deforestation'),
    fileName: 'annual_deforestation.csv',
    kind: 'tabular',
    valueColumn: '_1d_deforestation',
  },
  {
    name: 'share_land_protected',
    displayName: 'Share of Land Protected',
    url: owidUrl('terrestrial-protected-areas'),
    fileName: 'share_land_protected.csv',
    kind: 'tabular',
    valueColumn: 'er_lnd_ptld_zs',
  },
  {
    name: 'share_land_degraded',
    displayName: 'Share of Land Degraded',
    url: owidUrl('forest-area-net-change-rate'),
    fileName: 'share_land_degraded.csv',
    kind: 'tabular',
    valueColumn: '_15_2_1__ag_lnd_frstchg',
  },
  {
    name: 'forest_area_total',
    displayName: 'Forest Area Total Share',
    url: owidUrl('forest-area-as-share-of-land-area'),
    fileName: 'forest_area_total.csv',
    kind: 'tabular',
    valueColumn: 'forest_share',
  },
] as const satisfies readonly DatasetDescriptor[];

export const BOUNDARY_DATASET = {
  name: 'geodata',
  displayName: 'Natural Earth Admin 0 Countries (1:110m)',
  url: NATURAL_EARTH_URL,
  fileName: 'ne_110m_admin_0_countries.zip',
  kind: 'archive',
} as const satisfies DatasetDescriptor;

export type TabularDatasetName = (typeof TABULAR_DATASETS)[number]['name'];
export type MapDisplayName = (typeof TABULAR_DATASETS)[number]['displayName'];
export type BoundaryDatasetName = typeof BOUNDARY_DATASET.name;
export type DatasetName = TabularDatasetName | BoundaryDatasetName;

export type TabularDatasetDescriptor = (typeof TABULAR_DATASETS)[number];

export const DATASET_CATALOG: readonly DatasetDescriptor<DatasetName>[] = Object.freeze([
  ...TABULAR_DATASETS,
  BOUNDARY_DATASET,
]);

export const TABULAR_DATASET_NAMES: readonly TabularDatasetName[] = TABULAR_DATASETS.map(
  (d) => d.name
);

export function getTabularDescriptor(name: TabularDatasetName): TabularDatasetDescriptor {
  const descriptor = TABULAR_DATASETS.find((d) => d.name === name);
  if (!descriptor) {
    throw new Error(`Unknown tabular dataset: ${name}`);
  }
  return descriptor;
}
