export interface HostPort {
    host: string;
    port: string;
}

/**
 * Split `host:port` or `[host]:port` into its parts.
 *
 * The port is not validated; only the colon/bracket structure is.
 * A bare IPv6 address without brackets, a bracketed address without a
 * port, or a host with no colon at all returns null.
 */
export function splitHostPort(hostport: string): HostPort | null {
    const i = hostport.lastIndexOf(':');
    if (i < 0) return null;

    let host: string;
    let openFrom = 0;
    let closeFrom = 0;

    if (hostport.startsWith('[')) {
        const end = hostport.indexOf(']');
        // `]` must be immediately followed by the last colon
        if (end < 0 || end + 1 !== i) return null;
        host = hostport.slice(1, end);
        openFrom = 1;
        closeFrom = end + 1;
    } else {
        host = hostport.slice(0, i);
        if (host.includes(':')) return null;
    }

    if (hostport.indexOf('[', openFrom) >= 0) return null;
    if (hostport.indexOf(']', closeFrom) >= 0) return null;

    return { host, port: hostport.slice(i + 1) };
}
