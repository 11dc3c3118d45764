/**
 * Categorizer module: host-to-selector matching over the rule catalog.
 */

export { scanHost } from './scan.js';
export { scanAll } from './scan-all.js';
export { matchRule } from './match.js';
export { rankMatches, compareMatches } from './rank.js';
export { createPatternCache, compilePattern } from './pattern-cache.js';
export { formatSelector } from './selector.js';
export type {
    CompiledPattern,
    PatternCache,
    PatternLookup,
    RuleMatchResult,
    ScanOptions,
    ScanOutput,
    ScanAllOptions,
    ScanAllResult,
    ScanStats,
    LineResult,
} from './types.js';
