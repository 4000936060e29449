import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { dbUpstreamMetrics, type UpstreamStats } from './db.js';
import { createQuery, encodeMessage, isRecordType, unFqdn } from './dns-message.js';
import { handleError, HttpError } from './error-handler.js';
import { ResolvError, type TransportMode } from './errors.js';
import type { Resolver } from './resolver.js';
import type { ExchangeNet } from './transport.js';

export interface ApiOptions {
  resolver: Resolver;
  /** Path segment the relay endpoint is served under. */
  resolverPath: string;
  /** Transport the relay endpoint races upstreams over. */
  relayNet?: ExchangeNet;
  transport?: TransportMode;
  getStats?: (sinceMs: number) => UpstreamStats[];
  now?: () => number;
}

const STATS_WINDOW_MS = 24 * 60 * 60 * 1000;

export function createApi(options: ApiOptions) {
  const { resolver, resolverPath } = options;
  const relayNet = options.relayNet ?? 'udp';
  const getStats = options.getStats ?? ((sinceMs: number) => dbUpstreamMetrics.getStats(sinceMs));
  const now = options.now ?? Date.now;
  const startTime = now();

  const app = new Hono();

  app.onError((error, c) => handleError(c, error, 'Failed to resolve query'));

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      uptime: Math.floor((now() - startTime) / 1000),
    });
  });

  app.get('/api/upstreams', (c) => {
    return c.json({
      transport: options.transport ?? relayNet,
      nameservers: resolver.nameservers(),
      stats: getStats(now() - STATS_WINDOW_MS),
    });
  });

  // Server side of the HTTP relay: base64 of the wire response
  const relay = new Hono();
  relay.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'OPTIONS'],
      maxAge: 600,
      credentials: false,
    }),
  );
  relay.get('/:name/:type', async (c) => {
    const name = unFqdn(c.req.param('name'));
    const type = c.req.param('type').toUpperCase();
    if (!name) {
      throw new HttpError(400, 'Missing query name');
    }
    if (!isRecordType(type)) {
      throw new HttpError(400, `Unsupported query type: ${type}`);
    }

    try {
      const response = await resolver.resolve(relayNet, createQuery(name, type));
      return c.text(encodeMessage(response).toString('base64'));
    } catch (error) {
      if (error instanceof ResolvError) {
        throw new HttpError(502, error.message, { cause: error });
      }
      throw error;
    }
  });
  app.route(`/${resolverPath}`, relay);

  return app;
}
