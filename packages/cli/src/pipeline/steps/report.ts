import type { PipelineStep } from '../types.js';
import { formatReport } from '../../report/format.js';

/**
 * Step 5: Report
 * Renders per-host blocks in input order. Printing is left to the command.
 */
export const reportStep: PipelineStep = async (state) => {
    if (!state.scan) {
        return state;
    }
    state.report = formatReport(state.scan.results, { showWhy: state.settings.showWhy });
    return state;
};
