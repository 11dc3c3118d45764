import { readFile } from 'node:fs/promises';

/**
 * Splits file content into input lines: trimmed, without blank lines or
 * `#` comment lines.
 */
export function splitInputLines(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Reads a domains/URLs file, one entry per line.
 */
export async function readInputLines(path: string): Promise<string[]> {
    const content = await readFile(path, 'utf8');
    return splitInputLines(content);
}
