/**
 * Internal types for catalog module.
 */

/**
 * Group sizes per selector, derived from the catalog.
 */
export interface CatalogIndex {
    baseSize: ReadonlyMap<string, number>;
    attributeSize: ReadonlyMap<string, ReadonlyMap<string, number>>;
}
