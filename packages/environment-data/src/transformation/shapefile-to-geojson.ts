import type { Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';
import * as shapefile from 'shapefile';
import JSZip from 'jszip';
import { gunzipSync } from 'node:zlib';
import { BOUNDARY_DATASET, type DatasetName } from '../config/catalog.js';
import { DatasetIOError, FormatError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger('shapefile');

export interface TransformOptions {
    /** Dataset the archive belongs to, used in error reports */
    dataset?: DatasetName;
    /** Archive location, used in error reports */
    sourcePath?: string;
}

interface ShapefileComponents {
    shpBuffer: Buffer;
    dbfBuffer: Buffer;
}

/**
 * Transform a zipped shapefile to GeoJSON
 *
 * Natural Earth ships .shp, .shx, .dbf, .prj and .cpg inside one ZIP.
 * Gzipped archives are accepted as well.
 *
 * @throws {FormatError} if the buffer is not an archive or lacks .shp/.dbf
 * @throws {DatasetIOError} if the archive cannot be decompressed or parsed
 */
export async function transformShapefileToGeoJSON(
    data: Buffer,
    options: TransformOptions = {}
): Promise<FeatureCollection<Geometry | null, GeoJsonProperties>> {
    const dataset = options.dataset ?? BOUNDARY_DATASET.name;
    const sourcePath = options.sourcePath ?? '<buffer>';

    if (data.length === 0) {
        throw new FormatError(dataset, 'empty shapefile archive');
    }

    logger.debug('Starting shapefile transformation', {
        dataset,
        dataSize: data.length,
    });

    const { shpBuffer, dbfBuffer } = await extractShapefileComponents(data, dataset, sourcePath);

    const features: Array<Feature<Geometry | null, GeoJsonProperties>> = [];

    try {
        // Natural Earth attribute tables are UTF-8 (their .cpg says so)
        const source = await shapefile.open(shpBuffer, dbfBuffer, { encoding: 'utf-8' });

        let result = await source.read();
        while (!result.done) {
            if (result.value) {
                features.push(result.value);
            }
            result = await source.read();
        }
    } catch (error) {
        logger.error('Shapefile parsing failed', {
            dataset,
            error: error instanceof Error ? error.message : String(error),
            shpSize: shpBuffer.length,
            dbfSize: dbfBuffer.length,
        });
        throw new DatasetIOError(dataset, sourcePath, error);
    }

    logger.info('Shapefile transformation complete', {
        dataset,
        featureCount: features.length,
    });

    return {
        type: 'FeatureCollection',
        features,
    };
}

/**
 * Extract .shp and .dbf from a shapefile archive
 *
 * Detects format using magic bytes:
 * - ZIP: 0x50 0x4B (PK)
 * - GZIP: 0x1F 0x8B
 */
async function extractShapefileComponents(
    data: Buffer,
    dataset: DatasetName,
    sourcePath: string
): Promise<ShapefileComponents> {
    const isGzip = data[0] === 0x1f && data[1] === 0x8b;
    const isZip = data[0] === 0x50 && data[1] === 0x4b;

    if (isGzip) {
        let zipData: Buffer;
        try {
            zipData = gunzipSync(data);
        } catch (error) {
            throw new DatasetIOError(dataset, sourcePath, error);
        }
        return extractFromZip(zipData, dataset, sourcePath);
    }

    if (isZip) {
        return extractFromZip(data, dataset, sourcePath);
    }

    throw new FormatError(dataset, 'unknown archive format (expected ZIP or GZIP)');
}

async function extractFromZip(
    data: Buffer,
    dataset: DatasetName,
    sourcePath: string
): Promise<ShapefileComponents> {
    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(data);
    } catch (error) {
        throw new DatasetIOError(dataset, sourcePath, error);
    }

    let shpBuffer: Buffer | null = null;
    let dbfBuffer: Buffer | null = null;

    for (const [filename, file] of Object.entries(zip.files)) {
        if (file.dir) continue;

        const lowerName = filename.toLowerCase();

        // macOS resource forks carry the same extensions
        if (lowerName.startsWith('__macosx/')) continue;

        if (lowerName.endsWith('.shp') && !shpBuffer) {
            shpBuffer = await file.async('nodebuffer');
            logger.debug('Found .shp file', { filename });
        } else if (lowerName.endsWith('.dbf') && !dbfBuffer) {
            dbfBuffer = await file.async('nodebuffer');
            logger.debug('Found .dbf file', { filename });
        }
    }

    if (!shpBuffer) {
        throw new FormatError(dataset, 'no .shp file found in archive');
    }
    if (!dbfBuffer) {
        throw new FormatError(dataset, 'no .dbf file found in archive');
    }

    return { shpBuffer, dbfBuffer };
}
