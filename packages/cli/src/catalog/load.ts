import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { Catalog } from '@geosite-probe/core';
import { decodeGeoSiteList } from './geosite-dat.js';
import { parseTextCatalog } from './text-catalog.js';

export type CatalogFormat = 'geosite' | 'text';

const TEXT_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

/**
 * Text catalogs by extension; anything else is treated as geosite.dat.
 */
export function catalogFormatOf(path: string): CatalogFormat {
    return TEXT_EXTENSIONS.has(extname(path).toLowerCase()) ? 'text' : 'geosite';
}

/**
 * Reads and decodes a catalog file.
 * Any failure here is fatal to the run: nothing can be scanned without a catalog.
 */
export async function loadCatalog(path: string): Promise<Catalog> {
    let bytes: Buffer;
    try {
        bytes = await readFile(path);
    } catch (err) {
        throw new Error(`Cannot read catalog ${path}: ${errorMessage(err)}`, { cause: err });
    }

    try {
        return catalogFormatOf(path) === 'text'
            ? parseTextCatalog(bytes.toString('utf8'))
            : decodeGeoSiteList(bytes);
    } catch (err) {
        throw new Error(`Cannot decode catalog ${path}: ${errorMessage(err)}`, { cause: err });
    }
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
