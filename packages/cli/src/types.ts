/**
 * Geosite Probe CLI - Core Types
 */

/**
 * Flags accepted by `geoprobe lookup`. Unset flags fall back to
 * geoprobe.yaml, then to built-in defaults.
 */
export interface LookupOptions {
    catalog?: string;
    domains?: string;
    why?: boolean;
    prefix?: string;
    config?: string;
    verbose: boolean;
}

/**
 * Fully resolved lookup settings. Paths are absolute.
 */
export interface ProbeSettings {
    catalogPath: string;
    domainsPath: string;
    showWhy: boolean;
    selectorPrefix: string;
    configPath: string | null;
}
