import { describe, it, expect, beforeEach } from 'vitest';
import { dbUpstreamMetrics } from '../src/db.js';
import { createUpstreamRecorder } from '../src/metrics.js';
import { loadOtelConfig } from '../src/otel-metrics.js';
import { createTestLogger } from './test-dns-helper.js';

describe('Upstream Metrics', () => {
  beforeEach(() => {
    dbUpstreamMetrics.clear();
  });

  it('should persist attempts and aggregate them per upstream', () => {
    const recorder = createUpstreamRecorder(createTestLogger(), () => 5000);

    recorder.recordAttempt({ upstream: '10.0.0.1:53', success: true, responseTime: 12.4, queryType: 'A', rcode: 0 });
    recorder.recordAttempt({ upstream: '10.0.0.1:53', success: false, responseTime: 30, queryType: 'A' });
    recorder.recordAttempt({ upstream: '10.0.0.2:53', success: true, responseTime: 8, queryType: 'AAAA', rcode: 0 });

    expect(dbUpstreamMetrics.getStats(0)).toEqual([
      { upstream: '10.0.0.1:53', queries: 2, failures: 1, avgResponseTime: 21, lastSeen: 5000 },
      { upstream: '10.0.0.2:53', queries: 1, failures: 0, avgResponseTime: 8, lastSeen: 5000 },
    ]);
  });

  it('should only report attempts inside the window', () => {
    let now = 1000;
    const recorder = createUpstreamRecorder(createTestLogger(), () => now);

    recorder.recordAttempt({ upstream: '10.0.0.1:53', success: true, responseTime: 10 });
    now = 9000;
    recorder.recordAttempt({ upstream: '10.0.0.1:53', success: true, responseTime: 20 });

    expect(dbUpstreamMetrics.getStats(5000)).toEqual([
      { upstream: '10.0.0.1:53', queries: 1, failures: 0, avgResponseTime: 20, lastSeen: 9000 },
    ]);
  });

  it('should delete attempts older than the cutoff', () => {
    let now = 1000;
    const recorder = createUpstreamRecorder(createTestLogger(), () => now);

    recorder.recordAttempt({ upstream: '10.0.0.1:53', success: true, responseTime: 10 });
    now = 9000;
    recorder.recordAttempt({ upstream: '10.0.0.2:53', success: true, responseTime: 10 });
    dbUpstreamMetrics.cleanup(5000);

    expect(dbUpstreamMetrics.getStats(0).map((stats) => stats.upstream)).toEqual(['10.0.0.2:53']);
  });

  it('should accept lookup outcomes without OpenTelemetry configured', () => {
    const log = createTestLogger();
    const recorder = createUpstreamRecorder(log);

    recorder.recordLookup({ mode: 'udp', success: true, duration: 3, queryType: 'A' });

    expect(log.records).toEqual([]);
  });
});

describe('OpenTelemetry Configuration', () => {
  function settings(values: Record<string, string>) {
    return { get: (key: string, defaultValue: string) => values[key] || defaultValue };
  }

  it('should be disabled by default', () => {
    expect(loadOtelConfig(settings({}))).toEqual({
      enabled: false,
      exporterType: 'otlp',
      endpoint: 'http://localhost:4318/v1/metrics',
      prometheusPort: 9464,
    });
  });

  it('should keep only string header values', () => {
    const config = loadOtelConfig(
      settings({
        otelEnabled: 'true',
        otelExporterType: 'prometheus',
        otelHeaders: '{"Authorization":"test-token","x-retries":3}',
      }),
    );

    expect(config.enabled).toBe(true);
    expect(config.exporterType).toBe('prometheus');
    expect(config.headers).toEqual({ Authorization: 'test-token' });
  });

  it('should ignore malformed header JSON', () => {
    const config = loadOtelConfig(settings({ otelHeaders: '{not json' }));
    expect(config.headers).toBeUndefined();
  });
});
