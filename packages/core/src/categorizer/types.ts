/**
 * Internal types for categorizer module.
 */

import type { MatchRecord, Strategy } from '../types/index.js';
import type { CatalogIndex } from '../catalog/types.js';

/**
 * Compiled regex, or the compile error that made it a permanent miss.
 */
export type CompiledPattern =
    | { ok: true; regex: RegExp }
    | { ok: false; error: string };

/**
 * Append-only map from normalized regex source to its compiled form.
 * One per run; pass the same object to every scan.
 */
export interface PatternCache {
    entries: Map<string, CompiledPattern>;
}

export interface PatternLookup {
    entry: CompiledPattern;
    compiled: boolean;
}

/**
 * Result of matching a host against a single rule.
 * `warning` is only set on the first failed compile of a regex.
 */
export interface RuleMatchResult {
    matched: boolean;
    strategy: Strategy;
    warning?: string;
}

/**
 * Options for scanHost() function.
 */
export interface ScanOptions {
    selectorPrefix?: string;
}

/**
 * Matches for one host, plus warnings raised while scanning it.
 */
export interface ScanOutput {
    matches: MatchRecord[];
    warnings: string[];
}

/**
 * Options for scanAll() function.
 * Index and cache are built fresh when not supplied.
 */
export interface ScanAllOptions extends ScanOptions {
    index?: CatalogIndex;
    cache?: PatternCache;
}

/**
 * Per-line outcome of a batch scan. Matches are ranked.
 */
export type LineResult =
    | { input: string; ok: true; host: string; matches: MatchRecord[] }
    | { input: string; ok: false; error: string };

/**
 * Statistics from batch scanning.
 */
export interface ScanStats {
    total: number;
    matched: number;
    unmatched: number;
    invalid: number;
}

export interface ScanAllResult {
    results: LineResult[];
    warnings: string[];
    stats: ScanStats;
}
