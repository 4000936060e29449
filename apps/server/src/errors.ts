export type TransportMode = 'udp' | 'tcp' | 'http';

export function isTransportMode(value: string): value is TransportMode {
  return value === 'udp' || value === 'tcp' || value === 'http';
}

/**
 * Every upstream was tried and none produced an acceptable answer.
 */
export class ResolvError extends Error {
  readonly qname: string;
  readonly net: TransportMode;
  readonly nameservers: readonly string[];

  constructor(qname: string, net: TransportMode, nameservers: readonly string[]) {
    super(`${qname} resolv failed on ${nameservers.join('; ')} (${net})`);
    this.name = 'ResolvError';
    this.qname = qname;
    this.net = net;
    this.nameservers = [...nameservers];
  }
}

/**
 * Generic failure of the HTTP relay path. The failing stage is only logged.
 */
export class UnknownResolveError extends Error {
  constructor() {
    super('unknown error. failed to resolve...');
    this.name = 'UnknownResolveError';
  }
}

/**
 * A single query/response exchange with one upstream failed.
 */
export class ExchangeError extends Error {
  readonly upstream: string;

  constructor(upstream: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExchangeError';
    this.upstream = upstream;
  }
}
