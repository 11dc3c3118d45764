import { SELECTOR } from '../types/index.js';

/**
 * Format a selector: `<prefix>:<tag>` or `<prefix>:<tag>@<attribute>`.
 * An empty attribute yields the base selector.
 */
export function formatSelector(
    tag: string,
    attribute: string = '',
    prefix: string = SELECTOR.DEFAULT_PREFIX
): string {
    const base = `${prefix}${SELECTOR.PREFIX_SEPARATOR}${tag}`;
    return attribute === '' ? base : `${base}${SELECTOR.ATTRIBUTE_SEPARATOR}${attribute}`;
}
