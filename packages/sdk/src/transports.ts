/**
 * Socket transports
 *
 * The channels only see these interfaces, so tests swap in the in-process
 * fakes from __fixtures__/fake-transports.ts. The Node implementations wrap
 * node:dgram (multicast discovery) and node:net (command connection).
 */

import dgram from 'node:dgram';
import net from 'node:net';
import type { Endpoint, RemoteExecutionConfig } from '@remote-exec/config';
import { ConnectionError } from '@remote-exec/utils/errors';
import { commandLog, discoveryLog, type Logger } from '@remote-exec/utils/logger';
import { ChunkInbox } from './inbox.js';

export interface DatagramEndpoint {
  readonly inbox: ChunkInbox;
  send(data: Buffer, target: Endpoint): Promise<void>;
  close(): Promise<void>;
}

export interface CommandStream {
  readonly inbox: ChunkInbox;
  write(data: Buffer): Promise<void>;
  close(): Promise<void>;
}

export interface CommandListener {
  /** Address actually bound, which differs from the requested one for port 0 */
  readonly address: Endpoint;
  /** Resolve with the next inbound connection; rejects with ConnectionError on timeout */
  accept(timeoutMs: number): Promise<CommandStream>;
  close(): Promise<void>;
}

export interface SessionTransports {
  openMulticast(config: RemoteExecutionConfig): Promise<DatagramEndpoint>;
  listen(address: Endpoint): Promise<CommandListener>;
}

// =============================================================================
// UDP multicast
// =============================================================================

/**
 * Datagrams kept unread on the multicast socket. The group carries traffic of
 * other controllers for as long as a session stays open.
 */
export const MULTICAST_QUEUE_LIMIT = 256;

export class UdpMulticastSocket implements DatagramEndpoint {
  readonly inbox = new ChunkInbox(MULTICAST_QUEUE_LIMIT);
  private readonly socket: dgram.Socket;
  private closed = false;

  private constructor(socket: dgram.Socket, log: Logger) {
    this.socket = socket;
    socket.on('message', (msg) => this.inbox.push(msg));
    socket.on('error', (err) => {
      log.warn('Multicast socket error', { error: err.message });
    });
  }

  /**
   * Bind to the group port on the bind address, join the group and enable
   * loopback so that peers on the same host see our messages.
   */
  static open(config: RemoteExecutionConfig, log: Logger = discoveryLog): Promise<UdpMulticastSocket> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
      const fail = (err: unknown): void => {
        try {
          socket.close();
        } catch (closeErr) {
          log.debug('Multicast socket close after failed setup', { error: closeErr });
        }
        const detail = err instanceof Error ? err.message : String(err);
        reject(
          new ConnectionError(
            `Multicast setup failed on ${config.multicastBindAddress}:${config.multicastGroup.port}: ${detail}`
          )
        );
      };
      const onError = (err: Error): void => fail(err);
      socket.once('error', onError);

      socket.bind(config.multicastGroup.port, config.multicastBindAddress, () => {
        socket.off('error', onError);
        try {
          socket.setMulticastLoopback(true);
          socket.setMulticastTTL(config.multicastTtl);
          socket.addMembership(config.multicastGroup.host, config.multicastBindAddress);
          socket.setRecvBufferSize(config.bufferSize);
        } catch (err) {
          fail(err);
          return;
        }
        log.debug('Multicast socket bound', {
          group: `${config.multicastGroup.host}:${config.multicastGroup.port}`,
          bind: config.multicastBindAddress,
        });
        resolve(new UdpMulticastSocket(socket, log));
      });
    });
  }

  send(data: Buffer, target: Endpoint): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionError('Multicast socket is closed'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, target.port, target.host, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    this.inbox.close();
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}

// =============================================================================
// TCP command connection
// =============================================================================

export class TcpCommandStream implements CommandStream {
  readonly inbox = new ChunkInbox();
  private readonly socket: net.Socket;
  private closed = false;

  constructor(socket: net.Socket, log: Logger = commandLog) {
    this.socket = socket;
    socket.on('data', (chunk: Buffer) => this.inbox.push(chunk));
    socket.on('end', () => this.inbox.close());
    socket.on('close', () => this.inbox.close());
    socket.on('error', (err) => {
      log.warn('Command socket error', { error: err.message });
      this.inbox.close();
    });
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  write(data: Buffer): Promise<void> {
    if (this.closed || this.socket.destroyed) {
      return Promise.reject(new ConnectionError('Command connection is closed'));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new ConnectionError(err.message));
          return;
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.inbox.close();
    this.socket.destroy();
  }
}

export class TcpCommandListener implements CommandListener {
  readonly address: Endpoint;
  private readonly server: net.Server;
  private readonly log: Logger;
  private pending: net.Socket[] = [];
  private waiter?: { resolve: (socket: net.Socket) => void; reject: (err: Error) => void };
  private closed = false;

  private constructor(server: net.Server, address: Endpoint, log: Logger) {
    this.server = server;
    this.address = address;
    this.log = log;

    server.on('connection', (socket) => {
      if (this.waiter) {
        this.waiter.resolve(socket);
        return;
      }
      this.pending.push(socket);
    });
    server.on('error', (err) => {
      log.warn('Command listener error', { error: err.message });
    });
  }

  static listen(address: Endpoint, log: Logger = commandLog): Promise<TcpCommandListener> {
    return new Promise((resolve, reject) => {
      const server = net.createServer();
      const onError = (err: Error): void => {
        reject(new ConnectionError(`Cannot listen on ${address.host}:${address.port}: ${err.message}`));
      };
      server.once('error', onError);
      server.listen(address.port, address.host, () => {
        server.off('error', onError);
        const bound = server.address();
        const port = bound !== null && typeof bound === 'object' ? bound.port : address.port;
        log.debug('Command listener bound', { host: address.host, port });
        resolve(new TcpCommandListener(server, { host: address.host, port }, log));
      });
    });
  }

  accept(timeoutMs: number): Promise<CommandStream> {
    if (this.closed) {
      return Promise.reject(new ConnectionError('Command listener is closed'));
    }
    const queued = this.pending.shift();
    if (queued) {
      return Promise.resolve(new TcpCommandStream(queued, this.log));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        reject(
          new ConnectionError(
            `No connection on ${this.address.host}:${this.address.port} within ${timeoutMs}ms`
          )
        );
      }, timeoutMs);

      this.waiter = {
        resolve: (socket) => {
          clearTimeout(timer);
          this.waiter = undefined;
          resolve(new TcpCommandStream(socket, this.log));
        },
        reject: (err) => {
          clearTimeout(timer);
          this.waiter = undefined;
          reject(err);
        },
      };
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    this.waiter?.reject(new ConnectionError('Command listener is closed'));
    for (const socket of this.pending) {
      socket.destroy();
    }
    this.pending = [];
    return new Promise((resolve) => {
      this.server.close((err) => {
        if (err) {
          this.log.debug('Command listener close', { error: err.message });
        }
        resolve();
      });
    });
  }
}

export const nodeTransports: SessionTransports = {
  openMulticast: (config) => UdpMulticastSocket.open(config),
  listen: (address) => TcpCommandListener.listen(address),
};
