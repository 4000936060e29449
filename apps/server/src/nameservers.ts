/**
 * Normalize configured upstreams into `host:port` addresses, keeping their order.
 *
 * An entry written `host#port` (as in dnsmasq) carries its own port; every other entry
 * gets `defaultPort`. Hosts are not validated.
 */
export function resolveNameservers(servers: readonly string[], defaultPort: string): string[] {
  return servers.map((server) => {
    const separator = server.indexOf('#');
    if (separator > 0) {
      return `${server.slice(0, separator)}:${server.slice(separator + 1)}`;
    }
    return `${server}:${defaultPort}`;
  });
}

/**
 * Split a comma-separated upstream setting, dropping blanks.
 */
export function parseNameserverList(value: string): string[] {
  return value
    .split(',')
    .map((server) => server.trim())
    .filter((server) => server.length > 0);
}

/**
 * Split `host:port` at the last colon. A bracketed IPv6 host loses its brackets.
 */
export function splitHostPort(address: string): { host: string; port: number } {
  const separator = address.lastIndexOf(':');
  if (separator <= 0) {
    return { host: address, port: NaN };
  }
  let host = address.slice(0, separator);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }
  return { host, port: Number(address.slice(separator + 1)) };
}
