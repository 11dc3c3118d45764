import { describe, it, expect } from 'vitest';
import { buildRouteDocument, encodeRouteToken } from '../../src/route/token.js';

function sequentialIds(): () => string {
    let n = 0;
    return () => `id-${++n}`;
}

function decodeToken(token: string): string {
    const prefix = 'v2rayTun://import_route/';
    expect(token.startsWith(prefix)).toBe(true);
    const b64 = token.slice(prefix.length).replace(/-/g, '+').replace(/_/g, '/');
    return new TextDecoder().decode(Uint8Array.from(atob(b64), (c) => c.charCodeAt(0)));
}

describe('buildRouteDocument', () => {
    it('wraps domains in a single direct rule', () => {
        expect(buildRouteDocument(['example.com', 'example.net'], sequentialIds())).toEqual({
            name: 'Default',
            domainStrategy: 'AsIs',
            id: 'id-1',
            domainMatcher: 'hybrid',
            rules: [
                {
                    id: 'id-2',
                    type: 'field',
                    domain: ['example.com', 'example.net'],
                    outboundTag: 'direct',
                    __name__: 'Default',
                },
            ],
            balancers: [],
        });
    });

    it('rejects an empty list', () => {
        expect(() => buildRouteDocument([], sequentialIds())).toThrow('domain list is empty');
    });
});

describe('encodeRouteToken', () => {
    it('serializes compact JSON in document key order', () => {
        const token = encodeRouteToken(buildRouteDocument(['example.com'], sequentialIds()));
        expect(decodeToken(token)).toBe(
            '{"name":"Default","domainStrategy":"AsIs","id":"id-1","domainMatcher":"hybrid",' +
                '"rules":[{"id":"id-2","type":"field","domain":["example.com"],"outboundTag":"direct","__name__":"Default"}],' +
                '"balancers":[]}'
        );
    });

    it('uses URL-safe base64 with padding', () => {
        const token = encodeRouteToken(buildRouteDocument(['a.test'], sequentialIds()));
        const payload = token.slice('v2rayTun://import_route/'.length);
        expect(payload).toMatch(/^[A-Za-z0-9_-]+=*$/);
        expect(payload.length % 4).toBe(0);
    });

    it('escapes HTML-sensitive characters', () => {
        const token = encodeRouteToken(buildRouteDocument(['a<b>&c'], sequentialIds()));
        expect(decodeToken(token)).toContain('"domain":["a\\u003cb\\u003e\\u0026c"]');
    });
});
