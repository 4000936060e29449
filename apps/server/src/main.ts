import { serve } from '@hono/node-server';
import { createApi } from './api.js';
import { loadResolverConfig, loadServerConfig } from './config.js';
import { dbSettings, dbUpstreamMetrics } from './db.js';
import { DNSServer } from './dns-server.js';
import { logger, toError } from './logger.js';
import { createUpstreamRecorder } from './metrics.js';
import { initializeOtelMetrics, loadOtelConfig, shutdownOtelMetrics } from './otel-metrics.js';
import { Resolver } from './resolver.js';

const resolverConfig = loadResolverConfig(dbSettings, logger);
const serverConfig = loadServerConfig(dbSettings, logger);

initializeOtelMetrics(loadOtelConfig(dbSettings));

const resolver = new Resolver({
  config: resolverConfig,
  logger,
  recorder: createUpstreamRecorder(logger),
});

const dnsServer = new DNSServer({
  resolver,
  logger,
  bindAddress: serverConfig.bindAddress,
  port: serverConfig.dnsPort,
  transport: serverConfig.transport,
});

const app = createApi({
  resolver,
  resolverPath: resolverConfig.http.resolver,
  transport: serverConfig.transport,
});

logger.info('Resolver configured', {
  nameservers: resolver.nameservers(),
  transport: serverConfig.transport,
  timeout: resolverConfig.timeout,
  interval: resolverConfig.interval,
  negativeAnswerPolicy: resolverConfig.negativeAnswerPolicy,
});

const DAY_MS = 24 * 60 * 60 * 1000;
const retentionDays = parseInt(dbSettings.get('metricsRetentionDays', '7'), 10) || 7;

function cleanupMetrics() {
  try {
    dbUpstreamMetrics.cleanup(Date.now() - retentionDays * DAY_MS);
  } catch (error) {
    logger.error('Error cleaning up upstream metrics', toError(error));
  }
}

cleanupMetrics();
const cleanupTimer = setInterval(cleanupMetrics, 60 * 60 * 1000);
cleanupTimer.unref();

const httpServer = serve({ fetch: app.fetch, port: serverConfig.apiPort }, (info) => {
  logger.info('API server running', { port: info.port });
});

dnsServer.start().catch((error: unknown) => {
  logger.error('Failed to start DNS server', toError(error));
  process.exitCode = 1;
  httpServer.close();
});

function shutdown(signal: string) {
  logger.info('Shutting down', { signal });
  clearInterval(cleanupTimer);
  httpServer.close();
  Promise.all([dnsServer.stop(), shutdownOtelMetrics()]).catch((error: unknown) => {
    logger.error('Error during shutdown', toError(error));
    process.exitCode = 1;
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
