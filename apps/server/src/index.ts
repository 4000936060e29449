// Library surface. The API and metrics modules open the settings database and are left to main.ts.
export {
  loadResolverConfig,
  loadServerConfig,
  parseResolvConf,
  type NegativeAnswerPolicy,
  type ResolvConf,
  type ResolverConfig,
  type ServerConfig,
} from './config.js';
export * from './dns-message.js';
export { DNSServer, type DNSServerOptions } from './dns-server.js';
export { ExchangeError, isTransportMode, ResolvError, UnknownResolveError, type TransportMode } from './errors.js';
export { HandoffSlot } from './handoff.js';
export { Logger, logger, type LoggerOptions, type LogLevel, type LogSink } from './logger.js';
export { parseNameserverList, resolveNameservers, splitHostPort } from './nameservers.js';
export { Resolver, type LookupOutcome, type ResolverOptions, type UpstreamAttempt, type UpstreamRecorder } from './resolver.js';
export { exchange, type Exchange, type ExchangeNet, type ExchangeResult } from './transport.js';
