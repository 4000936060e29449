import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RCODE, responseCode } from '../src/dns-message.js';
import { ResolvError } from '../src/errors.js';
import { Resolver, type UpstreamRecorder } from '../src/resolver.js';
import {
  answerAddress,
  createFakeExchange,
  createTestConfig,
  createTestLogger,
  makeQuery,
  type UpstreamBehavior,
} from './test-dns-helper.js';

describe('Staggered Upstream Race', () => {
  let log: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    log = createTestLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function setup(servers: string[], behaviors: Record<string, UpstreamBehavior>, interval: number = 40) {
    const fake = createFakeExchange(behaviors);
    const resolver = new Resolver({
      config: createTestConfig({ servers, interval }),
      logger: log,
      exchange: fake.exchange,
    });
    return { resolver, fake };
  }

  describe('Early wins', () => {
    it('should return the first upstream answer without dispatching the rest', async () => {
      const { resolver, fake } = setup(['10.0.0.1', '10.0.0.2', '10.0.0.3'], {
        '10.0.0.1:53': { address: '192.0.2.1' },
        '10.0.0.2:53': { address: '192.0.2.2' },
      });

      const response = await resolver.lookup('udp', makeQuery());

      expect(answerAddress(response)).toBe('192.0.2.1');
      expect(fake.upstreams()).toEqual(['10.0.0.1:53']);
    });

    it('should let an earlier upstream win after a later one was dispatched', async () => {
      const { resolver, fake } = setup(
        ['10.0.0.1', '10.0.0.2'],
        {
          '10.0.0.1:53': { delay: 60, address: '192.0.2.1' },
          '10.0.0.2:53': { delay: 400, address: '192.0.2.2' },
        },
        40,
      );

      vi.useFakeTimers();
      const pending = resolver.lookup('udp', makeQuery());

      await vi.advanceTimersByTimeAsync(40);
      expect(fake.upstreams()).toEqual(['10.0.0.1:53', '10.0.0.2:53']);
      expect(fake.finished()).toBe(0);

      await vi.advanceTimersByTimeAsync(20);
      const response = await pending;

      expect(answerAddress(response)).toBe('192.0.2.1');
      // The slower worker is still running when the lookup returns
      expect(fake.finished()).toBe(1);
    });

    it('should return exactly one response when several upstreams succeed', async () => {
      const { resolver } = setup(
        ['10.0.0.1', '10.0.0.2'],
        {
          '10.0.0.1:53': { delay: 30, address: '192.0.2.1' },
          '10.0.0.2:53': { delay: 30, address: '192.0.2.2' },
        },
        0,
      );

      const response = await resolver.lookup('udp', makeQuery());

      expect(['192.0.2.1', '192.0.2.2']).toContain(answerAddress(response));
      expect(response.answers).toHaveLength(1);
    });
  });

  describe('Failover', () => {
    it('should skip SERVFAIL and transport errors and try the next upstream', async () => {
      const { resolver, fake } = setup(['10.0.0.1', '10.0.0.2', '10.0.0.3'], {
        '10.0.0.1:53': { rcode: RCODE.SERVFAIL },
        '10.0.0.2:53': { fail: 'DNS query timeout' },
        '10.0.0.3:53': { address: '192.0.2.3' },
      });

      const response = await resolver.lookup('udp', makeQuery());

      expect(responseCode(response)).toBe(RCODE.NOERROR);
      expect(answerAddress(response)).toBe('192.0.2.3');
      expect(fake.upstreams()).toEqual(['10.0.0.1:53', '10.0.0.2:53', '10.0.0.3:53']);
    });

    it('should log a warning for each skipped upstream', async () => {
      const { resolver } = setup(['10.0.0.1', '10.0.0.2', '10.0.0.3'], {
        '10.0.0.1:53': { rcode: RCODE.SERVFAIL },
        '10.0.0.2:53': { fail: 'connection refused' },
        '10.0.0.3:53': {},
      });

      await resolver.lookup('udp', makeQuery());

      const warnings = log.records.filter((record) => record.level === 'warn');
      expect(warnings.map((record) => record.message)).toEqual([
        'Upstream did not give a valid answer',
        'Upstream socket error',
      ]);
      expect(warnings[0]?.context).toEqual({
        qname: 'example.com',
        nameserver: '10.0.0.1:53',
        net: 'udp',
        rcode: 'SERVFAIL',
      });
      expect(warnings[1]?.context).toEqual({
        qname: 'example.com',
        nameserver: '10.0.0.2:53',
        net: 'udp',
        error: 'connection refused',
      });
    });

    it('should return a late answer that arrives after the last dispatch', async () => {
      const { resolver, fake } = setup(['10.0.0.1'], { '10.0.0.1:53': { delay: 120, address: '192.0.2.1' } }, 20);
      vi.useFakeTimers();
      let settled = false;
      const pending = resolver.lookup('tcp', makeQuery()).finally(() => {
        settled = true;
      });

      // Past the only dispatch interval, still waiting on the worker
      await vi.advanceTimersByTimeAsync(100);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(20);
      const response = await pending;

      expect(answerAddress(response)).toBe('192.0.2.1');
      expect(fake.calls).toEqual([{ upstream: '10.0.0.1:53', net: 'tcp', timeoutMs: 1000 }]);
    });

    it('should query duplicate upstreams independently', async () => {
      const { resolver, fake } = setup(['10.0.0.1', '10.0.0.1'], {
        '10.0.0.1:53': { rcode: RCODE.SERVFAIL },
      });

      await expect(resolver.lookup('udp', makeQuery())).rejects.toBeInstanceOf(ResolvError);
      expect(fake.upstreams()).toEqual(['10.0.0.1:53', '10.0.0.1:53']);
    });
  });

  describe('Negative answers', () => {
    it('should treat NXDOMAIN as definitive and stop dispatching', async () => {
      const { resolver, fake } = setup(['10.0.0.1', '10.0.0.2', '10.0.0.3', '10.0.0.4'], {
        '10.0.0.1:53': { rcode: RCODE.SERVFAIL },
        '10.0.0.2:53': { rcode: RCODE.NXDOMAIN },
        '10.0.0.3:53': { address: '192.0.2.3' },
        '10.0.0.4:53': { address: '192.0.2.4' },
      });

      const response = await resolver.lookup('udp', makeQuery());

      expect(responseCode(response)).toBe(RCODE.NXDOMAIN);
      expect(fake.upstreams()).toEqual(['10.0.0.1:53', '10.0.0.2:53']);
    });

    it('should treat REFUSED as definitive', async () => {
      const { resolver } = setup(['10.0.0.1', '10.0.0.2'], {
        '10.0.0.1:53': { rcode: RCODE.REFUSED },
        '10.0.0.2:53': {},
      });

      const response = await resolver.lookup('udp', makeQuery());

      expect(responseCode(response)).toBe(RCODE.REFUSED);
    });

    it('should prefer a later success under the fallback policy', async () => {
      const fake = createFakeExchange({
        '10.0.0.1:53': { rcode: RCODE.NXDOMAIN },
        '10.0.0.2:53': { address: '192.0.2.2' },
      });
      const resolver = new Resolver({
        config: createTestConfig({ negativeAnswerPolicy: 'fallback' }),
        logger: log,
        exchange: fake.exchange,
      });

      const response = await resolver.lookup('udp', makeQuery());

      expect(responseCode(response)).toBe(RCODE.NOERROR);
      expect(answerAddress(response)).toBe('192.0.2.2');
    });

    it('should return the held negative answer when nothing succeeds under the fallback policy', async () => {
      const fake = createFakeExchange({
        '10.0.0.1:53': { rcode: RCODE.NXDOMAIN },
        '10.0.0.2:53': { rcode: RCODE.SERVFAIL },
      });
      const resolver = new Resolver({
        config: createTestConfig({ negativeAnswerPolicy: 'fallback' }),
        logger: log,
        exchange: fake.exchange,
      });

      const response = await resolver.lookup('udp', makeQuery());

      expect(responseCode(response)).toBe(RCODE.NXDOMAIN);
      expect(fake.upstreams()).toEqual(['10.0.0.1:53', '10.0.0.2:53']);
    });
  });

  describe('Exhaustion', () => {
    it('should fail with every attempted upstream in dispatch order', async () => {
      const { resolver, fake } = setup(['10.0.0.1', '10.0.0.2#5353'], {
        '10.0.0.1:53': { rcode: RCODE.SERVFAIL },
        '10.0.0.2:5353': { fail: 'DNS query timeout' },
      });

      const error = await resolver.lookup('udp', makeQuery()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ResolvError);
      if (!(error instanceof ResolvError)) return;
      expect(error.qname).toBe('example.com');
      expect(error.net).toBe('udp');
      expect(error.nameservers).toEqual(['10.0.0.1:53', '10.0.0.2:5353']);
      expect(error.message).toBe('example.com resolv failed on 10.0.0.1:53; 10.0.0.2:5353 (udp)');
      // Every worker is joined before the failure is reported
      expect(fake.finished()).toBe(2);
    });

    it('should fail immediately when no upstreams are configured', async () => {
      const { resolver, fake } = setup([], {}, 1000);

      const startTime = Date.now();
      const error = await resolver.lookup('tcp', makeQuery()).catch((err: unknown) => err);

      expect(Date.now() - startTime).toBeLessThan(500);
      expect(error).toBeInstanceOf(ResolvError);
      expect(error).toMatchObject({ nameservers: [], net: 'tcp' });
      expect(fake.calls).toEqual([]);
    });
  });

  describe('Configuration', () => {
    it('should convert the timeout setting from seconds to milliseconds', () => {
      const resolver = new Resolver({ config: createTestConfig({ timeout: 3 }), logger: log });
      expect(resolver.timeout()).toBe(3000);
    });

    it('should expose normalized nameservers', () => {
      const resolver = new Resolver({
        config: createTestConfig({ servers: ['1.1.1.1', '8.8.8.8#5353'], port: '53' }),
        logger: log,
      });
      expect(resolver.nameservers()).toEqual(['1.1.1.1:53', '8.8.8.8:5353']);
    });
  });

  describe('Recording', () => {
    it('should report each attempt and the lookup outcome', async () => {
      const recorder: UpstreamRecorder = {
        recordAttempt: vi.fn(),
        recordLookup: vi.fn(),
      };
      const fake = createFakeExchange({
        '10.0.0.1:53': { rcode: RCODE.SERVFAIL },
        '10.0.0.2:53': { delay: 5 },
      });
      const resolver = new Resolver({ config: createTestConfig(), logger: log, exchange: fake.exchange, recorder });

      await resolver.resolve('udp', makeQuery('example.com', 'AAAA'));

      expect(recorder.recordAttempt).toHaveBeenCalledTimes(2);
      expect(recorder.recordAttempt).toHaveBeenNthCalledWith(1, {
        upstream: '10.0.0.1:53',
        success: false,
        responseTime: 0,
        queryType: 'AAAA',
        rcode: RCODE.SERVFAIL,
      });
      expect(recorder.recordAttempt).toHaveBeenNthCalledWith(2, {
        upstream: '10.0.0.2:53',
        success: true,
        responseTime: 5,
        queryType: 'AAAA',
        rcode: RCODE.NOERROR,
      });
      expect(recorder.recordLookup).toHaveBeenCalledWith(
        expect.objectContaining({ mode: 'udp', success: true, queryType: 'AAAA' }),
      );
    });

    it('should report a failed lookup', async () => {
      const recorder: UpstreamRecorder = {
        recordAttempt: vi.fn(),
        recordLookup: vi.fn(),
      };
      const resolver = new Resolver({
        config: createTestConfig({ servers: [] }),
        logger: log,
        exchange: createFakeExchange({}).exchange,
        recorder,
      });

      await expect(resolver.resolve('tcp', makeQuery())).rejects.toBeInstanceOf(ResolvError);
      expect(recorder.recordLookup).toHaveBeenCalledWith(expect.objectContaining({ mode: 'tcp', success: false }));
    });
  });
});
