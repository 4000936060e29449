import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { MeterProvider, PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
// Protobuf encoding, which most OTLP backends accept
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { SettingsStore } from './db.js';
import { logger, toError } from './logger.js';

const SERVICE_NAME = 'dns-dispatch';
const SERVICE_VERSION = '0.1.0';

export type OtelConfig = {
  enabled: boolean;
  exporterType: 'otlp' | 'prometheus';
  endpoint: string;
  headers?: Record<string, string>;
  prometheusPort?: number;
};

interface Instruments {
  upstreamQueries: Counter;
  upstreamErrors: Counter;
  upstreamResponseTime: Histogram;
  lookups: Counter;
  lookupDuration: Histogram;
}

let meterProvider: MeterProvider | null = null;
let instruments: Instruments | null = null;

/**
 * Read the OpenTelemetry settings. Malformed `otelHeaders` JSON is logged and ignored.
 */
export function loadOtelConfig(settings: SettingsStore): OtelConfig {
  const config: OtelConfig = {
    enabled: settings.get('otelEnabled', 'false') === 'true',
    exporterType: settings.get('otelExporterType', 'otlp') === 'prometheus' ? 'prometheus' : 'otlp',
    endpoint: settings.get('otelEndpoint', 'http://localhost:4318/v1/metrics'),
    prometheusPort: parseInt(settings.get('otelPrometheusPort', '9464'), 10),
  };

  const headersStr = settings.get('otelHeaders', '');
  if (headersStr) {
    try {
      const parsed: unknown = JSON.parse(headersStr);
      if (parsed && typeof parsed === 'object') {
        config.headers = Object.fromEntries(
          Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
        );
      }
    } catch (error) {
      logger.warn('Ignoring malformed otelHeaders setting', { error: toError(error).message });
    }
  }

  return config;
}

/**
 * Initialize OpenTelemetry metrics
 */
export function initializeOtelMetrics(config: OtelConfig): void {
  if (!config.enabled) {
    logger.info('OpenTelemetry metrics disabled');
    return;
  }

  try {
    const resource = resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    });

    const readers: MetricReader[] = [];

    if (config.exporterType === 'prometheus') {
      const port = config.prometheusPort || 9464;
      readers.push(
        new PrometheusExporter({ port, endpoint: '/metrics' }, () => {
          logger.info(`Prometheus metrics endpoint started on port ${port}`);
        }),
      );
    } else {
      const headers: Record<string, string> = { ...(config.headers || {}) };
      const authValue = headers.Authorization || headers.authorization;
      if (authValue) {
        delete headers.authorization;
        headers.Authorization = /^bearer /i.test(authValue) ? authValue : `Bearer ${authValue}`;
      }

      readers.push(
        new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({
            url: config.endpoint || 'http://localhost:4318/v1/metrics',
            headers,
          }),
          exportIntervalMillis: 10000,
        }),
      );

      logger.info('OpenTelemetry OTLP exporter configured', {
        endpoint: config.endpoint,
        headerKeys: Object.keys(headers),
        hasAuth: Boolean(headers.Authorization),
      });
    }

    meterProvider = new MeterProvider({ resource, readers });
    instruments = null;

    logger.info('OpenTelemetry metrics initialized', {
      exporterType: config.exporterType,
      endpoint:
        config.exporterType === 'otlp' ? config.endpoint : `http://localhost:${config.prometheusPort || 9464}/metrics`,
    });
  } catch (error) {
    logger.error('Failed to initialize OpenTelemetry metrics', toError(error));
  }
}

/**
 * Shutdown OpenTelemetry metrics
 */
export function shutdownOtelMetrics(): Promise<void> {
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  if (!provider) {
    return Promise.resolve();
  }
  return provider.shutdown().catch((error: unknown) => {
    logger.error('Error shutting down OpenTelemetry metrics', toError(error));
  });
}

export function getMeter(name: string = SERVICE_NAME, version: string = SERVICE_VERSION): Meter | null {
  return meterProvider ? meterProvider.getMeter(name, version) : null;
}

function getInstruments(): Instruments | null {
  if (instruments) return instruments;
  const meter = getMeter();
  if (!meter) return null;

  instruments = {
    upstreamQueries: meter.createCounter('dns.upstream.queries', {
      description: 'Number of upstream DNS exchanges',
    }),
    upstreamErrors: meter.createCounter('dns.upstream.errors', {
      description: 'Number of upstream DNS exchanges that failed or returned SERVFAIL',
    }),
    upstreamResponseTime: meter.createHistogram('dns.upstream.response_time', {
      description: 'Upstream DNS response time in milliseconds',
      unit: 'ms',
    }),
    lookups: meter.createCounter('dns.lookups', {
      description: 'Number of lookups by transport mode and outcome',
    }),
    lookupDuration: meter.createHistogram('dns.lookup.duration', {
      description: 'Lookup duration in milliseconds',
      unit: 'ms',
    }),
  };
  return instruments;
}

export function recordUpstreamMetrics(attributes: {
  upstream: string;
  success: boolean;
  responseTime?: number;
  queryType?: string;
}): void {
  const metrics = getInstruments();
  if (!metrics) return;

  try {
    const queryAttributes: Record<string, string> = {
      'dns.upstream.server': attributes.upstream,
    };
    if (attributes.queryType) queryAttributes['dns.query.type'] = attributes.queryType;

    metrics.upstreamQueries.add(1, queryAttributes);
    if (!attributes.success) {
      metrics.upstreamErrors.add(1, queryAttributes);
    }
    if (attributes.responseTime !== undefined) {
      metrics.upstreamResponseTime.record(attributes.responseTime, queryAttributes);
    }
  } catch (error) {
    logger.error('Error recording upstream metrics', toError(error), { upstream: attributes.upstream });
  }
}

export function recordLookupMetrics(attributes: { mode: string; success: boolean; duration: number }): void {
  const metrics = getInstruments();
  if (!metrics) return;

  try {
    const lookupAttributes = {
      'dns.transport': attributes.mode,
      'dns.outcome': attributes.success ? 'answered' : 'failed',
    };
    metrics.lookups.add(1, lookupAttributes);
    metrics.lookupDuration.record(attributes.duration, lookupAttributes);
  } catch (error) {
    logger.error('Error recording lookup metrics', toError(error), { mode: attributes.mode });
  }
}
