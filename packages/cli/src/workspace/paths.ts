import { join, dirname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Absolute path of a file shipped in the CLI package's assets/ directory.
 */
export function resolveAssetPath(name: string): string {
    // packages/cli/{src,dist}/workspace -> packages/cli
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', name);
}

/**
 * Resolve a user-supplied path against a base directory.
 */
export function resolveFrom(baseDir: string, path: string): string {
    return isAbsolute(path) ? path : resolve(baseDir, path);
}
