import type { ResolverConfig } from './config.js';
import {
  decodeMessage,
  firstQuestion,
  queryName,
  rcodeName,
  RCODE,
  responseCode,
  unFqdn,
  type DNSMessage,
} from './dns-message.js';
import { ResolvError, UnknownResolveError, type TransportMode } from './errors.js';
import { HandoffSlot } from './handoff.js';
import { toError, type LogSink } from './logger.js';
import { resolveNameservers } from './nameservers.js';
import { exchange as socketExchange, type Exchange, type ExchangeNet, type ExchangeResult } from './transport.js';

export interface UpstreamAttempt {
  upstream: string;
  success: boolean;
  responseTime: number;
  queryType?: string;
  rcode?: number;
}

export interface LookupOutcome {
  mode: TransportMode;
  success: boolean;
  duration: number;
  queryType?: string;
}

/**
 * Receives one event per upstream exchange and one per lookup. Must not throw.
 */
export interface UpstreamRecorder {
  recordAttempt(attempt: UpstreamAttempt): void;
  recordLookup(outcome: LookupOutcome): void;
}

const noopRecorder: UpstreamRecorder = {
  recordAttempt() {},
  recordLookup() {},
};

export interface ResolverOptions {
  config: ResolverConfig;
  logger: LogSink;
  exchange?: Exchange;
  fetch?: typeof fetch;
  recorder?: UpstreamRecorder;
}

function delay(ms: number): { elapsed: Promise<void>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const elapsed = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return { elapsed, cancel: () => clearTimeout(timer) };
}

/**
 * Standard (padded) base64, as a relay body. Line breaks are ignored; anything else outside
 * the alphabet is rejected rather than skipped.
 */
function decodeBase64(text: string): Buffer {
  const compact = text.replace(/[\r\n]/g, '');
  if (compact.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(compact)) {
    throw new Error(`illegal base64 data (length ${compact.length})`);
  }
  return Buffer.from(compact, 'base64');
}

export class Resolver {
  private readonly config: ResolverConfig;
  private readonly logger: LogSink;
  private readonly exchange: Exchange;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly recorder: UpstreamRecorder;

  constructor(options: ResolverOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.exchange = options.exchange ?? socketExchange;
    this.fetchImpl = options.fetch;
    this.recorder = options.recorder ?? noopRecorder;
  }

  /**
   * Upstreams as `host:port`, in dispatch order.
   */
  nameservers(): string[] {
    return resolveNameservers(this.config.servers, this.config.port);
  }

  /**
   * Per-attempt exchange timeout in milliseconds.
   */
  timeout(): number {
    return this.config.timeout * 1000;
  }

  /**
   * Resolve `query` over the given transport: `http` goes through the relay, `udp` and
   * `tcp` race the configured upstreams.
   */
  async resolve(mode: TransportMode, query: DNSMessage): Promise<DNSMessage> {
    const startTime = Date.now();
    const queryType = firstQuestion(query)?.type;
    try {
      const response = mode === 'http' ? await this.lookupHttp(query) : await this.lookup(mode, query);
      this.recorder.recordLookup({ mode, success: true, duration: Date.now() - startTime, queryType });
      return response;
    } catch (error) {
      this.recorder.recordLookup({ mode, success: false, duration: Date.now() - startTime, queryType });
      throw error;
    }
  }

  /**
   * Ask each nameserver top to bottom, starting a new one every `interval` ms, and return as
   * soon as any of them has an acceptable answer.
   *
   * SERVFAIL and transport errors send the race on to the next upstream. Any other error
   * rcode (NXDOMAIN, REFUSED, ...) is a verified answer and, under the `definitive` policy,
   * wins like a success would. Rejects with {@link ResolvError} when nothing answered.
   */
  async lookup(net: ExchangeNet, query: DNSMessage): Promise<DNSMessage> {
    const qname = queryName(query);
    const queryType = firstQuestion(query)?.type;
    const nameservers = this.nameservers();
    const timeoutMs = this.timeout();

    const winner = new HandoffSlot<DNSMessage>();
    const negative = new HandoffSlot<DNSMessage>();
    const workers: Promise<void>[] = [];

    const attempt = async (nameserver: string): Promise<void> => {
      const startTime = Date.now();
      let result: ExchangeResult;
      try {
        result = await this.exchange(query, nameserver, net, timeoutMs);
      } catch (error) {
        this.logger.warn('Upstream socket error', { qname, nameserver, net, error: toError(error).message });
        this.recorder.recordAttempt({
          upstream: nameserver,
          success: false,
          responseTime: Date.now() - startTime,
          queryType,
        });
        return;
      }

      const { response, rtt } = result;
      const rcode = responseCode(response);
      this.recorder.recordAttempt({
        upstream: nameserver,
        success: rcode !== RCODE.SERVFAIL,
        responseTime: rtt,
        queryType,
        rcode,
      });

      if (rcode !== RCODE.NOERROR) {
        this.logger.warn('Upstream did not give a valid answer', { qname, nameserver, net, rcode: rcodeName(rcode) });
        if (rcode === RCODE.SERVFAIL) {
          return;
        }
        if (this.config.negativeAnswerPolicy === 'fallback') {
          negative.offer(response);
          return;
        }
      } else {
        this.logger.debug('Resolved', { qname: unFqdn(qname), nameserver, net, rtt });
      }

      winner.offer(response);
    };

    const won = winner.next().then((response) => ({ response }));

    for (const nameserver of nameservers) {
      workers.push(
        attempt(nameserver).catch((error: unknown) => {
          this.logger.error('Upstream worker failed', toError(error), { qname, nameserver, net });
        }),
      );

      // Exit early once there is an answer, otherwise start the next upstream
      const tick = delay(this.config.interval);
      const first = await Promise.race([won, tick.elapsed.then(() => null)]);
      tick.cancel();
      if (first) {
        return first.response;
      }
    }

    await Promise.all(workers);

    const late = winner.poll() ?? negative.poll();
    if (late) {
      return late;
    }
    throw new ResolvError(qname, net, nameservers);
  }

  /**
   * Resolve through the HTTP relay: `GET {remote}/{resolver}/{name}/{type}` answering with
   * the base64 wire response. The reply takes the query's id. Every failure is logged with
   * its stage and rejects with {@link UnknownResolveError}.
   */
  async lookupHttp(query: DNSMessage): Promise<DNSMessage> {
    const question = firstQuestion(query);
    if (!question) {
      throw new UnknownResolveError();
    }

    const url = [this.config.http.remote, this.config.http.resolver, unFqdn(question.name), question.type].join('/');
    const context = { qname: question.name, url, net: 'http' };
    const doFetch = this.fetchImpl ?? fetch;

    let response: Response;
    try {
      response = await doFetch(url, { method: 'GET', signal: AbortSignal.timeout(this.timeout()) });
    } catch (error) {
      this.logger.error('http.get failed', toError(error), context);
      throw new UnknownResolveError();
    }

    if (!response.ok) {
      this.logger.error('http.get returned an error status', undefined, { ...context, status: response.status });
      // An unread body keeps the connection open
      try {
        await response.body?.cancel();
      } catch (error) {
        this.logger.debug('http.cancel failed', { ...context, error: toError(error).message });
      }
      throw new UnknownResolveError();
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      this.logger.error('http.read failed', toError(error), context);
      throw new UnknownResolveError();
    }

    let data: Buffer;
    try {
      data = decodeBase64(body);
    } catch (error) {
      this.logger.error('http.decode failed', toError(error), context);
      throw new UnknownResolveError();
    }

    let message: DNSMessage;
    try {
      message = decodeMessage(data);
    } catch (error) {
      this.logger.error('http.unpack failed', toError(error), context);
      throw new UnknownResolveError();
    }

    return { ...message, id: query.id };
  }
}
