/**
 * Host and rule-value normalization for matching.
 *
 * Both sides of every comparison go through the same cleanup: lowercase,
 * no surrounding whitespace, no trailing dot.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures are returned as data.
 */

import { splitHostPort } from './host-port.js';

export type NormalizeHostResult =
    | { ok: true; host: string }
    | { ok: false; error: string };

/**
 * Normalize an input line into a canonical host.
 *
 * Accepts:
 * - bare host: `sub.example.com`
 * - host:port: `example.com:8443`, `[::1]:53`
 * - URL, with or without scheme: `https://example.com/x`, `example.com/path?q=1`
 *
 * @param raw - Input text (one line)
 * @returns Lowercase host without trailing dot, or the reason it was rejected
 */
export function normalizeHost(raw: string): NormalizeHostResult {
    const text = raw.trim();
    if (text === '') {
        return { ok: false, error: 'empty' };
    }

    const hasScheme = text.includes('://');

    if (hasScheme) {
        const host = hostFromUrl(text);
        if (host !== null) return cleanHost(host);
    }

    // Path or query without a scheme: assume http
    if (!hasScheme && (text.includes('/') || text.includes('?'))) {
        const host = hostFromUrl(`http://${text}`);
        if (host !== null) return cleanHost(host);
    }

    const split = splitHostPort(text);
    if (split) {
        return cleanHost(split.host);
    }

    return cleanHost(text);
}

/**
 * Final cleanup applied to every extracted host.
 */
export function cleanHost(host: string): NormalizeHostResult {
    const cleaned = stripTrailingDot(host.trim().toLowerCase());
    if (cleaned === '') {
        return { ok: false, error: 'empty host after normalization' };
    }
    if (/\s/.test(cleaned)) {
        return { ok: false, error: `invalid host: ${JSON.stringify(cleaned)}` };
    }
    return { ok: true, host: cleaned };
}

/**
 * Normalize a rule value the same way hosts are normalized.
 * An empty result means the rule can never match.
 */
export function normalizeRuleValue(value: string): string {
    return stripTrailingDot(value.trim()).toLowerCase();
}

function stripTrailingDot(s: string): string {
    return s.endsWith('.') ? s.slice(0, -1) : s;
}

const SCHEME = /^[a-z][a-z0-9+.-]*$/i;

/**
 * Host component of a URL with any port removed, or null if the text has
 * no scheme or no host.
 *
 * The authority is taken as written: no punycode conversion and no port
 * range check, so a URL names the same host as its bare form.
 */
function hostFromUrl(text: string): string | null {
    const sep = text.indexOf('://');
    if (sep <= 0 || !SCHEME.test(text.slice(0, sep))) return null;

    const rest = text.slice(sep + 3);
    const end = rest.search(/[/?#]/);
    const authority = end < 0 ? rest : rest.slice(0, end);
    const host = authority.slice(authority.lastIndexOf('@') + 1);
    if (host === '') return null;

    const split = splitHostPort(host);
    return split ? split.host : host;
}
