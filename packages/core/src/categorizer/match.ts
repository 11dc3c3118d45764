/**
 * Rule matching against a normalized host.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Invalid regex returns warning in result,
 * once per pattern per run (see pattern-cache).
 */

import { normalizeRuleValue } from '../utils/normalize.js';
import { compilePattern } from './pattern-cache.js';
import type { CatalogRule } from '../types/index.js';
import type { PatternCache, RuleMatchResult } from './types.js';

/**
 * Match a normalized host against one rule.
 *
 * - plain: value is a substring of host
 * - domain: host is value or a subdomain of it (label boundary)
 * - full: host equals value
 * - regex: unanchored search; compile failure is a permanent miss
 * - unknown: exact equality only
 *
 * @param host - Already normalized host (via normalizeHost)
 * @param rule - Rule to match against
 * @param cache - Run-scoped pattern cache, populated on first use of a regex
 * @returns Verdict, strategy name, and a warning on a first failed compile
 */
export function matchRule(host: string, rule: CatalogRule, cache: PatternCache): RuleMatchResult {
    const strategy = rule.type.kind;
    const value = normalizeRuleValue(rule.value);
    if (value === '') {
        return { matched: false, strategy };
    }

    switch (rule.type.kind) {
        case 'plain':
            return { matched: host.includes(value), strategy };

        case 'domain':
            return { matched: host === value || host.endsWith(`.${value}`), strategy };

        case 'full':
            return { matched: host === value, strategy };

        case 'regex': {
            const { entry, compiled } = compilePattern(cache, value);
            if (!entry.ok) {
                return compiled
                    ? { matched: false, strategy, warning: `Invalid regex pattern "${value}": ${entry.error}` }
                    : { matched: false, strategy };
            }
            return { matched: entry.regex.test(host), strategy };
        }

        case 'unknown':
            return { matched: host === value, strategy };
    }
}
