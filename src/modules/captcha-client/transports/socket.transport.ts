import { Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import * as net from 'net';
import { SocketConfig, SOCKET_TERMINATOR } from '../config/constants';
import {
  ConnectionTransport,
  SocketMessage,
} from '../interfaces/transport.interface';
import {
  ClientClosedException,
  NetworkException,
  ProviderException,
} from '../exceptions';
import { isPlainObject } from '../utils/response-parser.util';

/**
 * Sends one message on a fresh connection and returns the reply, bypassing
 * the transport lock. Only valid inside a handshake.
 */
export type SocketExchange = (message: SocketMessage) => Promise<SocketMessage>;

/**
 * Runs once after every (re)connect, before the pending request.
 */
export type SocketHandshake = (exchange: SocketExchange) => Promise<void>;

interface PendingReply {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

const CONNECTION_LOST = 'Connection lost or timed out during API request';

/**
 * A TCP connection carrying `\r\n`-terminated JSON lines, one reply per
 * request.
 */
class FramedConnection {
  private buffer = '';
  private pending: PendingReply | null = null;
  private failure: NetworkException | null = null;

  private constructor(
    private readonly socket: net.Socket,
    readonly endpoint: string,
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (error: Error) =>
      this.fail(new NetworkException(CONNECTION_LOST, error, { endpoint })),
    );
    socket.on('close', () =>
      this.fail(new NetworkException(CONNECTION_LOST, undefined, { endpoint })),
    );
  }

  static open(
    host: string,
    port: number,
    timeoutMs: number,
  ): Promise<FramedConnection> {
    const endpoint = `${host}:${port}`;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      // onError stays attached so a late error after destroy() is absorbed
      const timer = setTimeout(() => {
        socket.destroy();
        reject(
          new NetworkException(`Connection to ${endpoint} timed out`, undefined, {
            endpoint,
            timeoutMs,
          }),
        );
      }, timeoutMs);

      const onError = (error: Error): void => {
        clearTimeout(timer);
        socket.destroy();
        reject(
          new NetworkException(`Cannot connect to ${endpoint}`, error, {
            endpoint,
          }),
        );
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        const connection = new FramedConnection(socket, endpoint);
        socket.removeListener('error', onError);
        resolve(connection);
      });
    });
  }

  get isUsable(): boolean {
    return this.failure === null && !this.socket.destroyed;
  }

  async exchange(
    message: SocketMessage,
    timeoutMs: number,
  ): Promise<SocketMessage> {
    if (this.failure) {
      throw this.failure;
    }

    const line = await new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(
          new NetworkException(CONNECTION_LOST, undefined, {
            endpoint: this.endpoint,
            timeoutMs,
          }),
        );
      }, timeoutMs);

      this.pending = {
        resolve: (reply) => {
          clearTimeout(timer);
          resolve(reply);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };

      this.socket.write(`${JSON.stringify(message)}${SOCKET_TERMINATOR}`);
    });

    return FramedConnection.parse(line);
  }

  destroy(): void {
    this.socket.destroy();
  }

  private static parse(line: string): SocketMessage {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error: unknown) {
      throw new ProviderException('Invalid API response', line, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    if (!isPlainObject(parsed)) {
      throw new ProviderException('Invalid API response', line);
    }
    return parsed;
  }

  private onData(chunk: string): void {
    this.buffer += chunk;

    let index = this.buffer.indexOf(SOCKET_TERMINATOR);
    while (index !== -1) {
      const line = this.buffer.slice(0, index);
      this.buffer = this.buffer.slice(index + SOCKET_TERMINATOR.length);

      const pending = this.pending;
      this.pending = null;
      pending?.resolve(line);

      index = this.buffer.indexOf(SOCKET_TERMINATOR);
    }
  }

  private fail(error: NetworkException): void {
    if (!this.failure) {
      this.failure = error;
    }
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }
}

/**
 * Persistent connection to the socket API.
 *
 * A single lock covers a whole request/response cycle, including connecting
 * and the handshake, so concurrent callers never read each other's replies.
 * A broken connection is replaced on the next attempt; after
 * `maxReconnectAttempts` failed attempts the last NetworkException surfaces.
 */
export class SocketTransport
  implements ConnectionTransport<SocketMessage, SocketMessage>
{
  private readonly logger = new Logger(SocketTransport.name);
  private readonly lock = new Mutex();
  private connection: FramedConnection | null = null;
  private closed = false;

  constructor(
    private readonly config: SocketConfig,
    private readonly handshake?: SocketHandshake,
  ) {}

  async send(message: SocketMessage): Promise<SocketMessage> {
    this.assertOpen();

    return this.lock.runExclusive(async () => {
      const attempts = Math.max(1, this.config.maxReconnectAttempts);
      let lastError: NetworkException | null = null;

      for (let attempt = 1; attempt <= attempts; attempt++) {
        this.assertOpen();
        try {
          const connection = await this.connect();
          return await connection.exchange(
            message,
            this.config.requestTimeoutMs,
          );
        } catch (error: unknown) {
          this.disconnect();
          if (!(error instanceof NetworkException)) {
            throw error;
          }
          lastError = error;
          this.logger.warn(
            `Socket request failed (attempt ${attempt}/${attempts}): ${error.message}`,
          );
        }
      }

      throw lastError ?? new NetworkException(CONNECTION_LOST);
    });
  }

  async reset(): Promise<void> {
    await this.lock.runExclusive(() => this.disconnect());
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.disconnect();
  }

  private async connect(): Promise<FramedConnection> {
    if (this.connection?.isUsable) {
      return this.connection;
    }
    this.disconnect();

    const ports = this.config.ports;
    const port = ports[Math.floor(Math.random() * ports.length)];
    this.logger.debug(`Connecting to ${this.config.host}:${port}`);

    const connection = await FramedConnection.open(
      this.config.host,
      port,
      this.config.connectTimeoutMs,
    );
    this.connection = connection;

    if (this.handshake) {
      await this.handshake((message) =>
        connection.exchange(message, this.config.requestTimeoutMs),
      );
    }

    return connection;
  }

  private disconnect(): void {
    if (this.connection) {
      this.connection.destroy();
      this.connection = null;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClientClosedException('socket', 'send');
    }
  }
}
