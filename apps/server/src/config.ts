import { readFileSync } from 'fs';
import type { SettingsStore } from './db.js';
import { isTransportMode, type TransportMode } from './errors.js';
import { toError, type LogSink } from './logger.js';
import { parseNameserverList } from './nameservers.js';

/**
 * What a non-success, non-SERVFAIL answer does to the race.
 * - `definitive`: it wins immediately, like a success.
 * - `fallback`: it is held back and only returned if no upstream succeeds.
 */
export type NegativeAnswerPolicy = 'definitive' | 'fallback';

export interface ResolverConfig {
  /** Upstreams in dispatch order, raw (`host` or `host#port`). */
  servers: string[];
  port: string;
  /** Per-attempt exchange timeout, seconds. */
  timeout: number;
  /** Dispatch stagger, milliseconds. */
  interval: number;
  negativeAnswerPolicy: NegativeAnswerPolicy;
  http: {
    remote: string;
    resolver: string;
  };
}

export interface ServerConfig {
  transport: TransportMode;
  bindAddress: string;
  dnsPort: number;
  apiPort: number;
}

export interface ResolvConf {
  nameservers: string[];
  timeout?: number;
}

const DEFAULT_TIMEOUT_SECONDS = 5;
const DEFAULT_INTERVAL_MS = 200;

/**
 * Read the parts of a resolv.conf file the dispatcher uses: `nameserver` lines in order and
 * `options timeout:N`. Comments start with `#` or `;`.
 */
export function parseResolvConf(text: string): ResolvConf {
  const conf: ResolvConf = { nameservers: [] };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(/[#;].*$/, '').trim();
    if (!line) continue;

    const [keyword, ...args] = line.split(/\s+/);
    if (keyword === 'nameserver' && args[0]) {
      conf.nameservers.push(args[0]);
    } else if (keyword === 'options') {
      for (const option of args) {
        const match = option.match(/^timeout:(\d+)$/);
        if (match) {
          conf.timeout = Math.max(1, parseInt(match[1], 10));
        }
      }
    }
  }

  return conf;
}

function readInt(
  settings: SettingsStore,
  key: string,
  defaultValue: number,
  min: number,
  log: LogSink,
  override?: string,
): number {
  const raw = override ?? settings.get(key, String(defaultValue));
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min) {
    log.warn('Invalid numeric setting, using default', { key, value: raw, default: defaultValue });
    return defaultValue;
  }
  return value;
}

function readPositiveInt(
  settings: SettingsStore,
  key: string,
  defaultValue: number,
  log: LogSink,
  override?: string,
): number {
  return readInt(settings, key, defaultValue, 1, log, override);
}

/**
 * Build the resolver configuration from the settings store, with environment overrides.
 * A configured resolv.conf replaces the nameserver list and timeout from settings.
 */
export function loadResolverConfig(
  settings: SettingsStore,
  log: LogSink,
  env: NodeJS.ProcessEnv = process.env,
): ResolverConfig {
  let servers = parseNameserverList(env.DNS_NAMESERVERS ?? settings.get('nameservers', ''));
  let timeout = readPositiveInt(settings, 'resolvTimeout', DEFAULT_TIMEOUT_SECONDS, log);

  const resolvConfFile = env.DNS_RESOLV_CONF ?? settings.get('resolvConfFile', '');
  if (resolvConfFile) {
    try {
      const conf = parseResolvConf(readFileSync(resolvConfFile, 'utf8'));
      servers = conf.nameservers;
      timeout = conf.timeout ?? timeout;
      log.info('Loaded nameservers from resolv.conf', { file: resolvConfFile, nameservers: servers });
    } catch (error) {
      log.error('Failed to read resolv.conf, using configured nameservers', toError(error), {
        file: resolvConfFile,
      });
    }
  }

  const policy = settings.get('negativeAnswerPolicy', 'definitive');

  return {
    servers,
    port: settings.get('nameserverPort', '53'),
    timeout,
    // 0 dispatches every upstream at once
    interval: readInt(settings, 'resolvInterval', DEFAULT_INTERVAL_MS, 0, log),
    negativeAnswerPolicy: policy === 'fallback' ? 'fallback' : 'definitive',
    http: {
      remote: settings.get('httpRemote', '').replace(/\/+$/, ''),
      resolver: settings.get('httpResolver', 'resolve'),
    },
  };
}

export function loadServerConfig(
  settings: SettingsStore,
  log: LogSink,
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const transport = env.DNS_TRANSPORT ?? settings.get('transport', 'udp');
  if (!isTransportMode(transport)) {
    log.warn('Unknown transport, using udp', { transport });
  }

  return {
    transport: isTransportMode(transport) ? transport : 'udp',
    // Environment first, then settings, then localhost
    bindAddress: env.DNS_BIND_ADDRESS || settings.get('dnsBindAddress', '127.0.0.1'),
    dnsPort: readPositiveInt(settings, 'dnsPort', 53, log, env.DNS_PORT),
    apiPort: readPositiveInt(settings, 'apiPort', 3001, log, env.API_PORT),
  };
}
