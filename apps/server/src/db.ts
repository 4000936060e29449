import Database from 'better-sqlite3';
import { join } from 'path';
import { tmpdir } from 'os';

// Use a throw-away database for tests
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
const dbPath =
  process.env.DNS_DISPATCH_DB ||
  (isTest
    ? join(tmpdir(), `dns-dispatch-test-${Date.now()}-${Math.random().toString(36).substring(7)}.db`)
    : join(process.cwd(), 'dns-dispatch.db'));
const db = new Database(dbPath);

db.pragma('journal_mode = WAL');

db.exec(`
  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updatedAt INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS upstream_metrics (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    upstream TEXT NOT NULL,
    responseTime INTEGER NOT NULL,
    success INTEGER NOT NULL,
    queryType TEXT,
    rcode INTEGER,
    timestamp INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_upstream_metrics_upstream ON upstream_metrics(upstream);
  CREATE INDEX IF NOT EXISTS idx_upstream_metrics_timestamp ON upstream_metrics(timestamp DESC);
`);

/**
 * Key/value view over the settings table, the shape `loadResolverConfig` reads from.
 */
export interface SettingsStore {
  get(key: string, defaultValue: string): string;
}

export const dbSettings = {
  get(key: string, defaultValue: string): string {
    const stmt = db.prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?');
    const row = stmt.get(key);
    return row?.value || defaultValue;
  },

  set(key: string, value: string) {
    const stmt = db.prepare(`
      INSERT INTO settings (key, value, updatedAt)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = ?, updatedAt = ?
    `);
    const now = Date.now();
    stmt.run(key, value, now, value, now);
  },
} satisfies SettingsStore & { set(key: string, value: string): void };

// Initialize default settings
const defaultSettings = {
  nameservers: '1.1.1.1,8.8.8.8',
  nameserverPort: '53',
  resolvTimeout: '5',
  resolvInterval: '200',
  transport: 'udp',
  httpResolver: 'resolve',
  negativeAnswerPolicy: 'definitive',
  dnsPort: '53',
  apiPort: '3001',
  metricsRetentionDays: '7',
};

for (const [key, value] of Object.entries(defaultSettings)) {
  if (!dbSettings.get(key, '')) {
    dbSettings.set(key, value);
  }
}

export interface UpstreamMetric {
  upstream: string;
  responseTime: number;
  success: boolean;
  queryType?: string;
  rcode?: number;
  timestamp: number;
}

export interface UpstreamStats {
  upstream: string;
  queries: number;
  failures: number;
  avgResponseTime: number;
  lastSeen: number;
}

export const dbUpstreamMetrics = {
  insert(metric: UpstreamMetric) {
    const stmt = db.prepare(`
      INSERT INTO upstream_metrics (upstream, responseTime, success, queryType, rcode, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      metric.upstream,
      Math.round(metric.responseTime),
      metric.success ? 1 : 0,
      metric.queryType ?? null,
      metric.rcode ?? null,
      metric.timestamp,
    );
  },

  getStats(sinceMs: number = 0): UpstreamStats[] {
    const stmt = db.prepare<
      [number],
      { upstream: string; queries: number; failures: number; avgResponseTime: number | null; lastSeen: number }
    >(`
      SELECT
        upstream,
        COUNT(*) AS queries,
        SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) AS failures,
        AVG(responseTime) AS avgResponseTime,
        MAX(timestamp) AS lastSeen
      FROM upstream_metrics
      WHERE timestamp >= ?
      GROUP BY upstream
      ORDER BY upstream
    `);
    return stmt.all(sinceMs).map((row) => ({
      upstream: row.upstream,
      queries: row.queries,
      failures: row.failures,
      avgResponseTime: Math.round(row.avgResponseTime ?? 0),
      lastSeen: row.lastSeen,
    }));
  },

  cleanup(olderThanMs: number) {
    db.prepare('DELETE FROM upstream_metrics WHERE timestamp < ?').run(olderThanMs);
  },

  clear() {
    db.prepare('DELETE FROM upstream_metrics').run();
  },
};

export default db;
