import { buildCatalogIndex } from '@geosite-probe/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Catalog Index
 * Group sizes are computed once, before any host is scanned.
 */
export const buildIndexStep: PipelineStep = async (state) => {
    if (!state.catalog) {
        state.errors.push({ step: 'build-index', message: 'No catalog loaded.', fatal: true });
        return state;
    }

    state.index = buildCatalogIndex(state.catalog);

    if (state.catalog.categories.length === 0) {
        state.warnings.push(`Catalog ${state.settings.catalogPath} has no categories.`);
    }

    return state;
};
