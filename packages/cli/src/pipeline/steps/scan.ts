import { scanAll } from '@geosite-probe/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Scan
 * Every line is scanned against the full catalog with one shared pattern cache.
 */
export const scanStep: PipelineStep = async (state) => {
    if (!state.catalog || !state.index) {
        state.errors.push({ step: 'scan', message: 'Catalog not indexed.', fatal: true });
        return state;
    }

    const result = scanAll(state.lines, state.catalog, {
        index: state.index,
        selectorPrefix: state.settings.selectorPrefix,
    });

    state.scan = result;

    // Aggregate warnings
    for (const warning of result.warnings) {
        state.warnings.push(warning);
    }

    return state;
};
