import type { PipelineState, PipelineStep } from './types.js';
import { loadCatalogStep } from './steps/load-catalog.js';
import { buildIndexStep } from './steps/build-index.js';
import { readInputStep } from './steps/read-input.js';
import { scanStep } from './steps/scan.js';
import { reportStep } from './steps/report.js';
import { arrow, fail } from '../utils/console.js';
import type { ProbeSettings } from '../types.js';

/**
 * Orchestrates the execution of the lookup pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 * Step progress is only printed when verbose, so stdout stays the report.
 */
export async function runPipeline(settings: ProbeSettings, verbose: boolean = false): Promise<PipelineState> {
    let state: PipelineState = {
        settings,
        lines: [],
        report: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Catalog Load', fn: loadCatalogStep },
        { name: 'Catalog Index', fn: buildIndexStep },
        { name: 'Input', fn: readInputStep },
        { name: 'Scan', fn: scanStep },
        { name: 'Report', fn: reportStep },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (verbose) {
            arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);
        }

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            if (verbose) {
                fail(`Fatal error in step "${step.name}". Stopping.`);
            }
            break;
        }
    }

    return state;
}
