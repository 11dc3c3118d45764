export { normalizeHost, cleanHost, normalizeRuleValue } from './normalize.js';
export type { NormalizeHostResult } from './normalize.js';
export { splitHostPort } from './host-port.js';
export type { HostPort } from './host-port.js';
