import type { Catalog, CatalogIndex, ScanAllResult } from '@geosite-probe/core';
import type { ProbeSettings } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the lookup pipeline.
 */
export interface PipelineState {
    settings: ProbeSettings;

    // Accumulated during pipeline execution
    catalog?: Catalog;
    index?: CatalogIndex;
    lines: string[];
    scan?: ScanAllResult;
    report: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
