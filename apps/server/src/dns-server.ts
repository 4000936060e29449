import dgram from 'dgram';
import net from 'net';
import { createErrorResponse, decodeMessage, encodeMessage, firstQuestion, RCODE, type DNSMessage } from './dns-message.js';
import type { TransportMode } from './errors.js';
import { toError, type LogSink } from './logger.js';
import type { Resolver } from './resolver.js';
import type { ExchangeNet } from './transport.js';

export interface DNSServerOptions {
  resolver: Resolver;
  logger: LogSink;
  bindAddress: string;
  /** 0 picks a free port; see `address()`. */
  port: number;
  /** `http` sends every query through the relay; otherwise the listener's own protocol is used. */
  transport: TransportMode;
}

export class DNSServer {
  private server: dgram.Socket;
  private tcpServer: net.Server;
  private resolver: Resolver;
  private logger: LogSink;
  private bindAddress: string;
  private port: number;
  private transport: TransportMode;
  private sockets = new Set<net.Socket>();

  constructor(options: DNSServerOptions) {
    this.resolver = options.resolver;
    this.logger = options.logger;
    this.bindAddress = options.bindAddress;
    this.port = options.port;
    this.transport = options.transport;
    this.server = dgram.createSocket(net.isIPv6(this.bindAddress) ? 'udp6' : 'udp4');
    this.tcpServer = net.createServer();
  }

  /**
   * Answer one wire query. Never throws: anything that goes wrong becomes SERVFAIL.
   */
  async handleDNSQuery(query: DNSMessage, listener: ExchangeNet, clientIp: string): Promise<Buffer> {
    const question = firstQuestion(query);
    if (!question) {
      this.logger.warn('Query without a question', { clientIp, id: query.id });
      return encodeMessage(createErrorResponse(query, RCODE.SERVFAIL));
    }

    const mode: TransportMode = this.transport === 'http' ? 'http' : listener;
    try {
      const response = await this.resolver.resolve(mode, query);
      return encodeMessage(response);
    } catch (error) {
      this.logger.warn('Lookup failed, answering SERVFAIL', {
        qname: question.name,
        net: mode,
        clientIp,
        error: toError(error).message,
      });
      return encodeMessage(createErrorResponse(query, RCODE.SERVFAIL));
    }
  }

  private decode(msg: Buffer, clientIp: string, listener: ExchangeNet): DNSMessage | null {
    try {
      return decodeMessage(msg);
    } catch (error) {
      this.logger.warn('Dropping malformed DNS query', { clientIp, net: listener, error: toError(error).message });
      return null;
    }
  }

  private setupTCPSocket(socket: net.Socket) {
    const clientIp = socket.remoteAddress || 'unknown';
    let buffer = Buffer.alloc(0);
    let expectedLength: number | null = null;

    this.sockets.add(socket);

    socket.on('data', (data: Buffer) => {
      buffer = Buffer.concat([buffer, data]);

      // TCP DNS messages have a 2-byte length prefix
      while (buffer.length >= 2) {
        if (expectedLength === null) {
          expectedLength = buffer.readUInt16BE(0);
        }

        if (buffer.length < expectedLength + 2) {
          // Wait for more data
          break;
        }

        const dnsMsg = buffer.subarray(2, expectedLength + 2);
        buffer = buffer.subarray(expectedLength + 2);
        expectedLength = null;

        const query = this.decode(dnsMsg, clientIp, 'tcp');
        if (!query) {
          socket.destroy();
          return;
        }

        this.handleDNSQuery(query, 'tcp', clientIp)
          .then((response) => {
            const responseLength = Buffer.allocUnsafe(2);
            responseLength.writeUInt16BE(response.length, 0);
            socket.write(Buffer.concat([responseLength, response]));
          })
          .catch((error: unknown) => {
            this.logger.error('Error answering TCP query', toError(error), { clientIp });
          });
      }
    });

    socket.on('error', (err) => {
      this.logger.error('Connection error', err, { clientIp });
    });

    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }

  private startUDP(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let udpServerStarted = false;

      this.server.on('message', (msg, rinfo) => {
        const query = this.decode(msg, rinfo.address, 'udp');
        if (!query) return;

        this.handleDNSQuery(query, 'udp', rinfo.address)
          .then((response) => {
            this.server.send(response, rinfo.port, rinfo.address, (err) => {
              if (err) {
                this.logger.error('Error sending UDP response', err, { clientIp: rinfo.address });
              }
            });
          })
          .catch((error: unknown) => {
            this.logger.error('Error answering UDP query', toError(error), { clientIp: rinfo.address });
          });
      });

      this.server.on('error', (err) => {
        // After binding, errors are logged and the server keeps running
        if (udpServerStarted) {
          this.logger.error('UDP DNS server error', err);
        } else {
          reject(err);
        }
      });

      this.server.bind(this.port, this.bindAddress, () => {
        udpServerStarted = true;
        this.logger.info('DNS server (UDP) running', { port: this.server.address().port, address: this.bindAddress });
        resolve();
      });
    });
  }

  private startTCP(port: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let tcpServerStarted = false;

      this.tcpServer.on('connection', (socket) => {
        this.setupTCPSocket(socket);
      });

      this.tcpServer.on('error', (err) => {
        if (tcpServerStarted) {
          this.logger.error('TCP DNS server error', err);
        } else {
          reject(err);
        }
      });

      this.tcpServer.listen(port, this.bindAddress, () => {
        tcpServerStarted = true;
        this.logger.info('DNS server (TCP) running', { port, address: this.bindAddress });
        resolve();
      });
    });
  }

  /**
   * Bind UDP first, then TCP on the same port (the UDP one when `port` was 0).
   */
  async start(): Promise<void> {
    await this.startUDP();
    await this.startTCP(this.server.address().port);
  }

  address(): { address: string; port: number } {
    const { address, port } = this.server.address();
    return { address, port };
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await Promise.all([
      new Promise<void>((resolve) => this.server.close(() => resolve())),
      new Promise<void>((resolve, reject) => this.tcpServer.close((err) => (err ? reject(err) : resolve()))),
    ]);
  }
}
