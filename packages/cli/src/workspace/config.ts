import { readFileSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { parse } from 'yaml';
import {
    CLI_DEFAULTS,
    SELECTOR,
    ProbeConfigSchema,
    type ProbeConfig,
} from '@geosite-probe/shared';
import { resolveFrom } from './paths.js';
import type { LookupOptions, ProbeSettings } from '../types.js';

export interface LoadedConfig {
    path: string;
    config: ProbeConfig;
}

/**
 * Loads geoprobe.yaml. An empty file is an empty config.
 */
export function loadProbeConfig(path: string): LoadedConfig {
    if (!existsSync(path)) {
        throw new Error(`Config file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    const config = ProbeConfigSchema.parse(data ?? {});
    return { path, config };
}

/**
 * Merges flags over config over defaults.
 * Flag paths resolve against cwd; config paths against the config file's directory.
 */
export function resolveSettings(
    options: LookupOptions,
    loaded: LoadedConfig | null,
    cwd: string = process.cwd()
): ProbeSettings {
    const config: ProbeConfig = loaded?.config ?? {};
    const configDir = loaded ? dirname(loaded.path) : cwd;
    const flagPrefix = ProbeConfigSchema.shape.selectorPrefix.parse(options.prefix);

    function pick(flag: string | undefined, fromConfig: string | undefined, fallback: string): string {
        if (flag) return resolveFrom(cwd, flag);
        if (fromConfig) return resolveFrom(configDir, fromConfig);
        return resolveFrom(cwd, fallback);
    }

    return {
        catalogPath: pick(options.catalog, config.catalog, CLI_DEFAULTS.CATALOG_PATH),
        domainsPath: pick(options.domains, config.domains, CLI_DEFAULTS.DOMAINS_PATH),
        showWhy: options.why ?? config.why ?? CLI_DEFAULTS.SHOW_WHY,
        selectorPrefix: flagPrefix ?? config.selectorPrefix ?? SELECTOR.DEFAULT_PREFIX,
        configPath: loaded?.path ?? null,
    };
}
