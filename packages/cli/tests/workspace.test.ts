import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { detectConfigFile } from '../src/workspace/detect.js';
import { loadProbeConfig, resolveSettings } from '../src/workspace/config.js';
import { resolveFrom } from '../src/workspace/paths.js';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Config Detection', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('finds geoprobe.yaml in a parent directory', () => {
        vi.mocked(fs.existsSync).mockImplementation((p) => String(p) === path.join('/projects', 'geoprobe.yaml'));

        expect(detectConfigFile('/projects/lists/today')).toBe(path.join('/projects', 'geoprobe.yaml'));
    });

    it('returns null if no config is found in parents', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(detectConfigFile('/projects/lists')).toBeNull();
    });
});

describe('Config Loading', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('parses and validates geoprobe.yaml', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('catalog: geo.dat\nwhy: false\n');

        expect(loadProbeConfig('/p/geoprobe.yaml')).toEqual({
            path: '/p/geoprobe.yaml',
            config: { catalog: 'geo.dat', why: false },
        });
    });

    it('treats an empty file as an empty config', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('');

        expect(loadProbeConfig('/p/geoprobe.yaml').config).toEqual({});
    });

    it('throws for a missing file', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(() => loadProbeConfig('/p/geoprobe.yaml')).toThrow('Config file not found: /p/geoprobe.yaml');
    });

    it('throws for unknown keys', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('geosite: dlc.dat\n');

        expect(() => loadProbeConfig('/p/geoprobe.yaml')).toThrow();
    });
});

describe('Settings Resolution', () => {
    const cwd = '/work';

    it('falls back to defaults relative to cwd', () => {
        expect(resolveSettings({ verbose: false }, null, cwd)).toEqual({
            catalogPath: path.join(cwd, 'dlc.dat'),
            domainsPath: path.join(cwd, 'domains.txt'),
            showWhy: true,
            selectorPrefix: 'geosite',
            configPath: null,
        });
    });

    it('resolves config paths against the config directory', () => {
        const loaded = {
            path: '/etc/probe/geoprobe.yaml',
            config: { catalog: 'data/dlc.dat', why: false, selectorPrefix: 'site' },
        };

        expect(resolveSettings({ domains: 'in.txt', verbose: false }, loaded, cwd)).toEqual({
            catalogPath: path.join('/etc/probe', 'data/dlc.dat'),
            domainsPath: path.join(cwd, 'in.txt'),
            showWhy: false,
            selectorPrefix: 'site',
            configPath: '/etc/probe/geoprobe.yaml',
        });
    });

    it('lets flags win over config', () => {
        const loaded = { path: '/etc/probe/geoprobe.yaml', config: { catalog: 'a.dat', why: false } };

        const settings = resolveSettings({ catalog: '/abs/b.dat', why: true, prefix: 'x', verbose: false }, loaded, cwd);

        expect(settings.catalogPath).toBe('/abs/b.dat');
        expect(settings.showWhy).toBe(true);
        expect(settings.selectorPrefix).toBe('x');
    });

    it('rejects a prefix flag containing separators', () => {
        expect(() => resolveSettings({ prefix: 'a:b', verbose: false }, null, cwd)).toThrow();
    });
});

describe('Path Resolution', () => {
    it('keeps absolute paths', () => {
        expect(resolveFrom('/base', '/abs/file')).toBe('/abs/file');
    });

    it('resolves relative paths against the base', () => {
        expect(resolveFrom('/base', 'rel/file')).toBe(path.join('/base', 'rel/file'));
    });
});
