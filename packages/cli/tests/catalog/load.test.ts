import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fsPromises from 'node:fs/promises';
import { loadCatalog, catalogFormatOf } from '../../src/catalog/load.js';
import { loadGeoSiteListType } from '../../src/catalog/geosite-dat.js';

vi.mock('node:fs/promises');

describe('catalogFormatOf', () => {
    it('detects text catalogs by extension', () => {
        expect(catalogFormatOf('rules.yaml')).toBe('text');
        expect(catalogFormatOf('rules.YML')).toBe('text');
        expect(catalogFormatOf('/data/rules.json')).toBe('text');
    });

    it('treats everything else as geosite.dat', () => {
        expect(catalogFormatOf('dlc.dat')).toBe('geosite');
        expect(catalogFormatOf('geosite')).toBe('geosite');
    });
});

describe('loadCatalog', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('loads a YAML catalog', async () => {
        vi.mocked(fsPromises.readFile).mockResolvedValue(
            Buffer.from('categories:\n  - tag: ads\n    rules:\n      - { type: plain, value: track }\n')
        );

        await expect(loadCatalog('/fake/catalog.yaml')).resolves.toEqual({
            categories: [{ tag: 'ads', rules: [{ type: { kind: 'plain' }, value: 'track', attributes: [] }] }],
        });
    });

    it('loads a geosite.dat catalog', async () => {
        const type = loadGeoSiteListType();
        const bytes = type.encode({ entry: [{ countryCode: 'cn', domain: [{ type: 3, value: 'weibo.com' }] }] }).finish();
        vi.mocked(fsPromises.readFile).mockResolvedValue(Buffer.from(bytes));

        await expect(loadCatalog('/fake/dlc.dat')).resolves.toEqual({
            categories: [{ tag: 'cn', rules: [{ type: { kind: 'full' }, value: 'weibo.com', attributes: [] }] }],
        });
    });

    it('wraps read failures', async () => {
        vi.mocked(fsPromises.readFile).mockRejectedValue(new Error('ENOENT: no such file or directory'));

        await expect(loadCatalog('/fake/dlc.dat')).rejects.toThrow(
            'Cannot read catalog /fake/dlc.dat: ENOENT: no such file or directory'
        );
    });

    it('wraps decode failures', async () => {
        vi.mocked(fsPromises.readFile).mockResolvedValue(Buffer.from('categories: nope\n'));

        await expect(loadCatalog('/fake/catalog.yaml')).rejects.toThrow('Cannot decode catalog /fake/catalog.yaml');
    });
});
