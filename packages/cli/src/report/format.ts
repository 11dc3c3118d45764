/**
 * Plain-text report rendering. Pure: returns lines, prints nothing.
 */

import { REPORT_FORMAT } from '@geosite-probe/shared';
import type { LineResult, MatchRecord } from '@geosite-probe/core';

export interface ReportOptions {
    showWhy: boolean;
}

/**
 * One selector line, e.g.
 * `geosite:ads                                size=2      via=domain:ads.example.com`
 */
export function formatMatchLine(match: MatchRecord, options: ReportOptions): string {
    const selector = match.selector.padEnd(REPORT_FORMAT.SELECTOR_WIDTH);
    if (!options.showWhy) {
        return `${selector} size=${match.groupSize}`;
    }
    const size = String(match.groupSize).padEnd(REPORT_FORMAT.SIZE_WIDTH);
    return `${selector} size=${size} via=${match.strategy}:${match.ruleValue}`;
}

/**
 * Header, ranked selector lines (or the no-match marker), then a blank line.
 */
export function formatHostReport(
    host: string,
    matches: readonly MatchRecord[],
    options: ReportOptions
): string[] {
    const lines = [`== ${host} ==`];
    if (matches.length === 0) {
        lines.push(REPORT_FORMAT.NO_MATCH);
    } else {
        for (const match of matches) {
            lines.push(formatMatchLine(match, options));
        }
    }
    lines.push('');
    return lines;
}

export function formatLineError(input: string, error: string): string {
    return `${input}\tERROR\t${error}`;
}

/**
 * Full report for a batch, in input order.
 */
export function formatReport(results: readonly LineResult[], options: ReportOptions): string[] {
    const lines: string[] = [];
    for (const result of results) {
        if (result.ok) {
            lines.push(...formatHostReport(result.host, result.matches, options));
        } else {
            lines.push(formatLineError(result.input, result.error));
        }
    }
    return lines;
}
