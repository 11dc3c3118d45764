import type { PipelineStep } from '../types.js';
import { loadCatalog } from '../../catalog/load.js';

/**
 * Step 1: Catalog Load
 * Reads and decodes the rule catalog. Failure is fatal: no partial scan.
 */
export const loadCatalogStep: PipelineStep = async (state) => {
    try {
        state.catalog = await loadCatalog(state.settings.catalogPath);
    } catch (err) {
        state.errors.push({
            step: 'load-catalog',
            message: err instanceof Error ? err.message : String(err),
            fatal: true,
            error: err,
        });
    }
    return state;
};
