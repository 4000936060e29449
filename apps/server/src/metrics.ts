import { dbUpstreamMetrics } from './db.js';
import { toError, type LogSink } from './logger.js';
import { recordLookupMetrics, recordUpstreamMetrics } from './otel-metrics.js';
import type { UpstreamRecorder } from './resolver.js';

/**
 * Recorder persisting each upstream exchange to `upstream_metrics` and mirroring it to
 * OpenTelemetry when that is enabled.
 */
export function createUpstreamRecorder(log: LogSink, now: () => number = Date.now): UpstreamRecorder {
  return {
    recordAttempt(attempt) {
      try {
        dbUpstreamMetrics.insert({ ...attempt, timestamp: now() });
      } catch (error) {
        log.error('Error storing upstream metrics', toError(error), { upstream: attempt.upstream });
      }
      recordUpstreamMetrics(attempt);
    },

    recordLookup(outcome) {
      recordLookupMetrics(outcome);
    },
  };
}
