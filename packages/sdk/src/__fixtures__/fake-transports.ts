/**
 * In-process transports for session and channel tests.
 *
 * FakeTransports plays the network and any number of peers: pings sent to
 * the group are reflected back (multicast loopback) and answered by every
 * peer, open_connection makes the addressed peer connect, and commands are
 * answered by the peer's `respond` hook.
 */

import type { Endpoint, RemoteExecutionConfig } from '@remote-exec/config';
import {
  decodeEnvelope,
  encodeEnvelope,
  type CommandEnvelope,
  type CommandResultData,
  type Envelope,
} from '@remote-exec/protocol';
import { ConnectionError } from '@remote-exec/utils/errors';
import { ChunkInbox } from '../inbox.js';
import {
  MULTICAST_QUEUE_LIMIT,
  type CommandListener,
  type CommandStream,
  type DatagramEndpoint,
  type SessionTransports,
} from '../transports.js';

export const PEER_ID = '5d0c3d4e-0000-4000-8000-000000000001';

/** Counts every socket operation so tests can assert there were none. */
export class SocketOps {
  count = 0;
  readonly log: string[] = [];

  record(op: string): void {
    this.count += 1;
    this.log.push(op);
  }
}

export function resultEnvelope(data: CommandResultData, dest?: string, source = PEER_ID): Envelope {
  return { type: 'command_result', version: 1, magic: 'ue_py', source, dest, data };
}

export function resultBytes(data: CommandResultData, dest?: string): Buffer {
  return encodeEnvelope(resultEnvelope(data, dest));
}

/** Split bytes into two chunks at `at`. */
export function splitAt(bytes: Buffer, at: number): Buffer[] {
  return [bytes.subarray(0, at), bytes.subarray(at)];
}

export class FakeDatagramEndpoint implements DatagramEndpoint {
  readonly inbox = new ChunkInbox(MULTICAST_QUEUE_LIMIT);
  readonly sent: Envelope[] = [];
  closed = false;
  onSend?: (envelope: Envelope) => void;
  private readonly ops: SocketOps;
  private readonly loopback: boolean;

  constructor(ops: SocketOps, loopback = true) {
    this.ops = ops;
    this.loopback = loopback;
  }

  async send(data: Buffer, _target: Endpoint): Promise<void> {
    this.ops.record('udp.send');
    if (this.closed) throw new ConnectionError('Multicast socket is closed');
    const decoded = decodeEnvelope(data);
    if (decoded.status !== 'ok') throw new Error(`Sent an undecodable datagram: ${decoded.status}`);
    this.sent.push(decoded.envelope);
    if (this.loopback) this.inbox.push(Buffer.from(data));
    this.onSend?.(decoded.envelope);
  }

  deliver(envelope: Envelope): void {
    this.inbox.push(encodeEnvelope(envelope));
  }

  async close(): Promise<void> {
    this.ops.record('udp.close');
    this.closed = true;
    this.inbox.close();
  }
}

export class FakeCommandStream implements CommandStream {
  readonly inbox = new ChunkInbox();
  readonly written: Envelope[] = [];
  closed = false;
  onWrite?: (envelope: Envelope) => void;
  private readonly ops: SocketOps;

  constructor(ops: SocketOps) {
    this.ops = ops;
  }

  async write(data: Buffer): Promise<void> {
    this.ops.record('tcp.write');
    if (this.closed) throw new ConnectionError('Command connection is closed');
    const decoded = decodeEnvelope(data);
    if (decoded.status !== 'ok') throw new Error(`Wrote an undecodable envelope: ${decoded.status}`);
    this.written.push(decoded.envelope);
    this.onWrite?.(decoded.envelope);
  }

  /** Deliver chunks one macrotask apart so each lands in its own receive. */
  deliver(chunks: Buffer[]): void {
    chunks.forEach((chunk, index) => {
      setTimeout(() => this.inbox.push(chunk), index * 5);
    });
  }

  /** The peer hangs up. */
  hangUp(): void {
    this.inbox.close();
  }

  async close(): Promise<void> {
    this.ops.record('tcp.close');
    this.closed = true;
    this.inbox.close();
  }
}

export class FakeCommandListener implements CommandListener {
  readonly address: Endpoint;
  incoming?: FakeCommandStream;
  closed = false;
  private readonly ops: SocketOps;

  constructor(address: Endpoint, ops: SocketOps) {
    this.address = address;
    this.ops = ops;
  }

  accept(timeoutMs: number): Promise<CommandStream> {
    this.ops.record('tcp.accept');
    const stream = this.incoming;
    if (stream) return Promise.resolve(stream);
    return new Promise((_resolve, reject) => {
      setTimeout(() => {
        reject(new ConnectionError(`No connection on ${this.address.host}:${this.address.port} within ${timeoutMs}ms`));
      }, timeoutMs);
    });
  }

  async close(): Promise<void> {
    this.ops.record('tcp.listener.close');
    this.closed = true;
  }
}

export interface FakePeerOptions {
  nodeId?: string;
  projectName: string;
  engineVersion?: string;
  /** Tag used for discovery replies */
  replyTag?: 'pong' | 'ping';
  /** Connect back on open_connection (default true) */
  connect?: boolean;
  /** Chunks to send in answer to a command; none means the peer stays silent */
  respond?: (command: CommandEnvelope) => Buffer[];
  /** Reflect each command back before answering */
  echoCommands?: boolean;
}

export class FakePeer {
  readonly nodeId: string;
  readonly options: FakePeerOptions;
  readonly commands: CommandEnvelope[] = [];
  closeRequests = 0;
  stream?: FakeCommandStream;

  constructor(options: FakePeerOptions) {
    this.options = options;
    this.nodeId = options.nodeId ?? PEER_ID;
  }

  reply(localId: string): Envelope {
    const data = {
      project_name: this.options.projectName,
      engine_version: this.options.engineVersion ?? '5.3',
      command_ip: '127.0.0.1',
      command_port: 9000,
    };
    const base = { version: 1, magic: 'ue_py', source: this.nodeId, dest: localId } as const;
    return this.options.replyTag === 'ping' ? { ...base, type: 'ping', data } : { ...base, type: 'pong', data };
  }

  handleCommand(stream: FakeCommandStream, envelope: CommandEnvelope): void {
    this.commands.push(envelope);
    const chunks: Buffer[] = [];
    if (this.options.echoCommands) chunks.push(encodeEnvelope(envelope));
    chunks.push(...(this.options.respond?.(envelope) ?? []));
    stream.deliver(chunks);
  }
}

export class FakeTransports implements SessionTransports {
  readonly ops = new SocketOps();
  readonly peers: FakePeer[] = [];
  readonly datagrams: FakeDatagramEndpoint[] = [];
  readonly listeners: FakeCommandListener[] = [];
  loopback = true;
  /** Port handed out when the requested one is 0 */
  nextPort = 40000;

  constructor(peers: FakePeerOptions[] = []) {
    for (const options of peers) this.addPeer(options);
  }

  addPeer(options: FakePeerOptions): FakePeer {
    const peer = new FakePeer(options);
    this.peers.push(peer);
    return peer;
  }

  async openMulticast(config: RemoteExecutionConfig): Promise<DatagramEndpoint> {
    this.ops.record('udp.open');
    const endpoint = new FakeDatagramEndpoint(this.ops, this.loopback);
    endpoint.onSend = (envelope) => this.route(config, endpoint, envelope);
    this.datagrams.push(endpoint);
    return endpoint;
  }

  async listen(address: Endpoint): Promise<CommandListener> {
    this.ops.record('tcp.listen');
    const port = address.port === 0 ? this.nextPort++ : address.port;
    const listener = new FakeCommandListener({ host: address.host, port }, this.ops);
    this.listeners.push(listener);
    return listener;
  }

  private route(config: RemoteExecutionConfig, endpoint: FakeDatagramEndpoint, envelope: Envelope): void {
    for (const peer of this.peers) {
      switch (envelope.type) {
        case 'ping':
          endpoint.deliver(peer.reply(config.localId));
          break;
        case 'open_connection':
          if (envelope.dest === peer.nodeId && peer.options.connect !== false) {
            this.connect(peer, envelope.data.command_port);
          }
          break;
        case 'close_connection':
          if (envelope.dest === peer.nodeId) peer.closeRequests += 1;
          break;
        default:
          break;
      }
    }
  }

  private connect(peer: FakePeer, port: number): void {
    const listener = this.listeners.find((candidate) => candidate.address.port === port);
    if (!listener) return;
    const stream = new FakeCommandStream(this.ops);
    stream.onWrite = (envelope) => {
      if (envelope.type === 'command') peer.handleCommand(stream, envelope);
    };
    peer.stream = stream;
    listener.incoming = stream;
  }
}

export function testConfig(overrides: Partial<RemoteExecutionConfig> = {}): RemoteExecutionConfig {
  return {
    bufferSize: 2_097_152,
    multicastGroup: { host: '239.0.0.1', port: 6766 },
    multicastBindAddress: '0.0.0.0',
    multicastTtl: 0,
    localId: '5d0c3d4e-0000-4000-8000-00000000a11c',
    commandAddress: { host: '127.0.0.1', port: 0 },
    ...overrides,
  };
}
