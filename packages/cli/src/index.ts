#!/usr/bin/env node
/**
 * Geosite Probe CLI
 *
 * - CLI handles all file I/O and console output
 * - Core receives a decoded catalog and raw lines, returns results as data
 */

import { parseArgs } from 'node:util';
import { lookup } from './commands/lookup.js';
import { route } from './commands/route.js';
import { log } from './utils/console.js';

function printUsage(): void {
    log('Geosite Probe');
    log('');
    log('Usage:');
    log('  geoprobe [lookup] [domains-file] [--catalog dlc.dat] [--domains domains.txt] [--no-why]');
    log('                    [--prefix geosite] [--config geoprobe.yaml] [--verbose]');
    log('  geoprobe route <domains-file>');
    log('');
    log('Example:');
    log('  geoprobe --catalog dlc.dat --domains domains.txt');
}

async function main() {
    const { values, positionals } = parseArgs({
        args: process.argv.slice(2),
        allowPositionals: true,
        options: {
            catalog: { type: 'string', short: 'c' },
            geosite: { type: 'string' },
            domains: { type: 'string', short: 'd' },
            why: { type: 'boolean' },
            'no-why': { type: 'boolean' },
            prefix: { type: 'string' },
            config: { type: 'string' },
            verbose: { type: 'boolean', short: 'v' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (values.help) {
        printUsage();
        return;
    }

    const [command = 'lookup', ...rest] = positionals;

    switch (command) {
        case 'lookup':
            await lookup({
                // --geosite is accepted as an alias of --catalog
                catalog: values.catalog ?? values.geosite,
                domains: values.domains ?? rest[0],
                why: values['no-why'] ? false : values.why,
                prefix: values.prefix,
                config: values.config,
                verbose: values.verbose ?? false,
            });
            return;
        case 'route':
            await route(rest[0]);
            return;
        default:
            console.error(`Error: Unknown command "${command}".`);
            printUsage();
            process.exit(1);
    }
}

main().catch((err) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
