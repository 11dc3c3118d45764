import { readFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { prepareRouteDomains, buildRouteDocument, encodeRouteToken } from '@geosite-probe/core';
import { fail } from '../utils/console.js';

/**
 * Packages a domain list file into an import_route token on stdout.
 * No trailing newline, so the output can be piped straight into a clipboard.
 */
export async function route(domainsPath: string | undefined): Promise<void> {
    if (!domainsPath) {
        fail('usage: geoprobe route <domains-file>');
        process.exit(1);
    }

    let content: string;
    try {
        content = await readFile(domainsPath, 'utf8');
    } catch (err) {
        fail(`Error reading file: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }

    const domains = prepareRouteDomains(content.split(/\r?\n/));
    if (domains.length === 0) {
        fail('domain list is empty');
        process.exit(1);
    }

    const token = encodeRouteToken(buildRouteDocument(domains, randomUUID));
    process.stdout.write(token);
}
