import type { PipelineStep } from '../types.js';
import { readInputLines } from '../../input/lines.js';

/**
 * Step 3: Input
 * Reads hosts/URLs, one per line. Blank and `#` lines are dropped here.
 */
export const readInputStep: PipelineStep = async (state) => {
    try {
        state.lines = await readInputLines(state.settings.domainsPath);
    } catch (err) {
        state.errors.push({
            step: 'read-input',
            message: `Failed to read input ${state.settings.domainsPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }
    return state;
};
