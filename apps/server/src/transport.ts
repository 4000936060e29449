import dgram from 'dgram';
import net from 'net';
import { decodeMessage, encodeMessage, type DNSMessage } from './dns-message.js';
import { ExchangeError } from './errors.js';
import { toError } from './logger.js';
import { splitHostPort } from './nameservers.js';

export type ExchangeNet = 'udp' | 'tcp';

export interface ExchangeResult {
  response: DNSMessage;
  /** Round trip, milliseconds. */
  rtt: number;
}

/**
 * One query/response exchange against one upstream. Rejects on any transport failure;
 * a reply with an error rcode still resolves.
 */
export type Exchange = (
  query: DNSMessage,
  upstream: string,
  net: ExchangeNet,
  timeoutMs: number,
) => Promise<ExchangeResult>;

function decodeReply(upstream: string, data: Buffer): DNSMessage {
  try {
    return decodeMessage(data);
  } catch (error) {
    throw new ExchangeError(upstream, 'Malformed DNS response', { cause: error });
  }
}

/**
 * Send `query` to `upstream` (`host:port`) over UDP or TCP. The timeout covers the whole
 * exchange, connect and send included.
 */
export const exchange: Exchange = (query, upstream, protocol, timeoutMs) => {
  return new Promise<ExchangeResult>((resolve, reject) => {
    const { host, port } = splitHostPort(upstream);
    if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
      reject(new ExchangeError(upstream, `Invalid upstream address: ${upstream}`));
      return;
    }

    let msg: Buffer;
    try {
      msg = encodeMessage(query);
    } catch (error) {
      reject(new ExchangeError(upstream, 'Failed to encode DNS query', { cause: error }));
      return;
    }

    const startTime = Date.now();
    const family = net.isIPv6(host) ? 6 : 4;
    let settled = false;
    let cleanup = () => {};

    const timeout = setTimeout(() => {
      fail(new ExchangeError(upstream, 'DNS query timeout'));
    }, timeoutMs);

    function finish(response: DNSMessage) {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      cleanup();
      resolve({ response, rtt: Date.now() - startTime });
    }

    function fail(error: Error) {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      cleanup();
      reject(error instanceof ExchangeError ? error : new ExchangeError(upstream, error.message, { cause: error }));
    }

    if (protocol === 'tcp') {
      const socket = net.createConnection({ host, port, family });
      cleanup = () => socket.destroy();

      // TCP DNS messages have a 2-byte length prefix
      const lengthPrefix = Buffer.allocUnsafe(2);
      lengthPrefix.writeUInt16BE(msg.length, 0);
      const tcpMsg = Buffer.concat([lengthPrefix, msg]);

      let responseLength: number | null = null;
      let responseBuffer = Buffer.alloc(0);

      socket.on('data', (data: Buffer) => {
        responseBuffer = Buffer.concat([responseBuffer, data]);

        if (responseLength === null && responseBuffer.length >= 2) {
          responseLength = responseBuffer.readUInt16BE(0);
        }

        if (responseLength !== null && responseBuffer.length >= responseLength + 2) {
          let response: DNSMessage;
          try {
            response = decodeReply(upstream, responseBuffer.subarray(2, responseLength + 2));
          } catch (error) {
            fail(toError(error));
            return;
          }
          // A TCP reply must carry the query id
          if (response.id !== query.id) {
            fail(new ExchangeError(upstream, `DNS response id mismatch: expected ${query.id}, got ${response.id}`));
            return;
          }
          finish(response);
        }
      });

      socket.on('error', fail);

      socket.on('close', () => {
        fail(new ExchangeError(upstream, 'TCP connection closed before response received'));
      });

      socket.on('connect', () => {
        socket.write(tcpMsg);
      });
    } else {
      const client = dgram.createSocket(family === 6 ? 'udp6' : 'udp4');
      cleanup = () => client.close();

      client.on('message', (data) => {
        let response: DNSMessage;
        try {
          response = decodeReply(upstream, data);
        } catch (error) {
          fail(toError(error));
          return;
        }
        // Stale or stray datagrams are skipped; keep waiting until the timeout
        if (response.id !== query.id) return;
        finish(response);
      });

      client.on('error', fail);

      client.send(msg, port, host, (err) => {
        if (err) {
          fail(err);
        }
      });
    }
  });
};
