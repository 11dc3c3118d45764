import { detectConfigFile } from '../workspace/detect.js';
import { loadProbeConfig, resolveSettings, type LoadedConfig } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, fail } from '../utils/console.js';
import type { LookupOptions, ProbeSettings } from '../types.js';

export async function lookup(options: LookupOptions): Promise<void> {
    // 1. Config discovery (--config wins over geoprobe.yaml lookup)
    let loaded: LoadedConfig | null = null;
    const configPath = options.config ?? detectConfigFile();
    if (configPath) {
        try {
            loaded = loadProbeConfig(configPath);
        } catch (err) {
            fail(`Error: Invalid config ${configPath}. ${err instanceof Error ? err.message : String(err)}`);
            process.exit(1);
        }
    }

    let settings: ProbeSettings;
    try {
        settings = resolveSettings(options, loaded);
    } catch (err) {
        fail(`Error: Invalid option. ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }

    if (options.verbose) {
        arrow(`Config: ${settings.configPath ?? '(none)'}`);
        arrow(`Catalog: ${settings.catalogPath}`);
        arrow(`Input: ${settings.domainsPath}`);
    }

    // 2. Run Pipeline
    const state = await runPipeline(settings, options.verbose);

    for (const line of state.report) {
        log(line);
    }

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            fail(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            process.exit(1);
        }
    }

    // 3. Report Final Status
    if (state.scan) {
        const { stats } = state.scan;
        log('--- Lookup Summary ---');
        success(`Scanned ${stats.total} entries against ${state.catalog?.categories.length ?? 0} categories.`);
        arrow(`Matched: ${stats.matched}`);
        arrow(`No match: ${stats.unmatched}`);
        arrow(`Invalid: ${stats.invalid}`);
    }
}
