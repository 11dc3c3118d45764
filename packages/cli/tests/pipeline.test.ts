import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fsPromises from 'node:fs/promises';
import { runPipeline } from '../src/pipeline/runner.js';
import type { ProbeSettings } from '../src/types.js';

vi.mock('node:fs/promises');

const CATALOG_YAML = [
    'categories:',
    '  - tag: ads',
    '    rules:',
    '      - { type: domain, value: ads.example.com, attributes: [tracker] }',
    '      - { type: plain, value: track }',
    '  - tag: cn',
    '    rules:',
    '      - { type: 2, value: weibo.com, attributes: [cn, ext] }',
    '',
].join('\n');

const DOMAINS = '# hosts to check\nsub.ads.example.com\n\nbad host\nhttps://m.weibo.com/u/1\nunrelated.org\n';

function line(selector: string, size: number, via: string): string {
    return `${selector.padEnd(42)} size=${String(size).padEnd(6)} via=${via}`;
}

describe('Lookup Pipeline', () => {
    const settings: ProbeSettings = {
        catalogPath: '/fake/catalog.yaml',
        domainsPath: '/fake/domains.txt',
        showWhy: true,
        selectorPrefix: 'geosite',
        configPath: null,
    };

    beforeEach(() => {
        vi.clearAllMocks();
        vi.mocked(fsPromises.readFile).mockImplementation(async (p) => {
            if (String(p) === '/fake/catalog.yaml') return Buffer.from(CATALOG_YAML);
            if (String(p) === '/fake/domains.txt') return DOMAINS;
            throw new Error(`ENOENT: no such file or directory, open '${String(p)}'`);
        });
    });

    it('should run the full pipeline without errors', async () => {
        const state = await runPipeline(settings);

        expect(state.errors).toHaveLength(0);
        expect(state.warnings).toHaveLength(0);
        expect(state.lines).toEqual(['sub.ads.example.com', 'bad host', 'https://m.weibo.com/u/1', 'unrelated.org']);
        expect(state.scan?.stats).toEqual({ total: 4, matched: 2, unmatched: 1, invalid: 1 });
    });

    it('should render the report in input order with ranked selectors', async () => {
        const state = await runPipeline(settings);

        expect(state.report).toEqual([
            '== sub.ads.example.com ==',
            line('geosite:ads@tracker', 1, 'domain:ads.example.com'),
            line('geosite:ads', 2, 'domain:ads.example.com'),
            '',
            'bad host\tERROR\tinvalid host: "bad host"',
            '== m.weibo.com ==',
            line('geosite:cn', 1, 'domain:weibo.com'),
            line('geosite:cn@cn', 1, 'domain:weibo.com'),
            line('geosite:cn@ext', 1, 'domain:weibo.com'),
            '',
            '== unrelated.org ==',
            '(no geosite match found)',
            '',
        ]);
    });

    it('should apply the configured prefix and hide reasons', async () => {
        const state = await runPipeline({ ...settings, showWhy: false, selectorPrefix: 'site' });

        expect(state.report.slice(0, 3)).toEqual([
            '== sub.ads.example.com ==',
            `${'site:ads@tracker'.padEnd(42)} size=1`,
            `${'site:ads'.padEnd(42)} size=2`,
        ]);
    });

    it('should stop on a catalog load failure before reading input', async () => {
        const state = await runPipeline({ ...settings, catalogPath: '/fake/missing.yaml' });

        expect(state.errors).toHaveLength(1);
        expect(state.errors[0]).toMatchObject({ step: 'load-catalog', fatal: true });
        expect(state.errors[0].message).toBe(
            "Cannot read catalog /fake/missing.yaml: ENOENT: no such file or directory, open '/fake/missing.yaml'"
        );
        expect(fsPromises.readFile).toHaveBeenCalledTimes(1);
        expect(state.report).toEqual([]);
    });

    it('should report an unreadable input file as fatal', async () => {
        const state = await runPipeline({ ...settings, domainsPath: '/fake/none.txt' });

        expect(state.catalog?.categories).toHaveLength(2);
        expect(state.errors).toEqual([
            expect.objectContaining({ step: 'read-input', fatal: true }),
        ]);
        expect(state.scan).toBeUndefined();
    });

    it('should warn about an empty catalog', async () => {
        vi.mocked(fsPromises.readFile).mockImplementation(async (p) =>
            String(p) === '/fake/domains.txt' ? DOMAINS : Buffer.from('categories: []\n')
        );

        const state = await runPipeline(settings);

        expect(state.warnings).toEqual(['Catalog /fake/catalog.yaml has no categories.']);
        expect(state.scan?.stats.unmatched).toBe(3);
    });
});
