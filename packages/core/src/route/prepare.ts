/**
 * Domain list preparation for route tokens.
 *
 * This is a plain list cleanup, not host normalization: no URL parsing,
 * no port handling. It mirrors what import_route consumers expect.
 */

/**
 * Clean and deduplicate a domain list.
 *
 * Per line: skip blank and `#` lines, cut inline `# comment`, lowercase,
 * drop a leading `https://`, then `http://`, then `www.`, drop one trailing
 * dot. First occurrence wins on duplicates.
 *
 * @param lines - Raw lines of a domain list file
 * @returns Domains in first-seen order
 */
export function prepareRouteDomains(lines: readonly string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];

    for (const line of lines) {
        let s = line.trim();
        if (s === '' || s.startsWith('#')) continue;

        const hash = s.indexOf('#');
        if (hash >= 0) {
            s = s.slice(0, hash).trim();
        }

        s = s.toLowerCase();
        s = stripPrefix(s, 'https://');
        s = stripPrefix(s, 'http://');
        s = stripPrefix(s, 'www.');
        if (s.endsWith('.')) {
            s = s.slice(0, -1);
        }

        if (s === '' || seen.has(s)) continue;

        seen.add(s);
        out.push(s);
    }

    return out;
}

function stripPrefix(s: string, prefix: string): string {
    return s.startsWith(prefix) ? s.slice(prefix.length) : s;
}
