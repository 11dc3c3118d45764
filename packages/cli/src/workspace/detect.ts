import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { CLI_DEFAULTS } from '@geosite-probe/shared';

/**
 * Searches for 'geoprobe.yaml' starting at startPath and bubbling up to the root.
 * Returns the config file path, or null if none is found.
 */
export function detectConfigFile(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, CLI_DEFAULTS.CONFIG_FILENAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
