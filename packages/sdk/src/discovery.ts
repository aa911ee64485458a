/**
 * Multicast discovery: find a peer by ping/pong and announce the command
 * address to it.
 */

import { performance } from 'node:perf_hooks';
import { DEFAULT_TIMEOUTS, type Endpoint, type RemoteExecutionConfig } from '@remote-exec/config';
import {
  PongDataSchema,
  createCloseConnection,
  createOpenConnection,
  createPing,
  encodeEnvelope,
  type Envelope,
  type MessageType,
} from '@remote-exec/protocol';
import { ConnectionError, DiscoveryTimeoutError } from '@remote-exec/utils/errors';
import { discoveryLog, type Logger } from '@remote-exec/utils/logger';
import { receiveEnvelope } from './receive-loop.js';
import { nodeTransports, type DatagramEndpoint, type SessionTransports } from './transports.js';

export interface PeerDescriptor {
  /** The peer's node id, taken from the reply's source */
  nodeId: string;
  projectName: string;
  engineVersion: string;
  commandIp?: string;
  commandPort?: number;
  /** Everything the peer sent in its reply */
  metadata: Readonly<Record<string, unknown>>;
}

/**
 * Read peer metadata out of a reply. Peers answer with either a pong or a
 * ping-tagged envelope carrying the same data.
 */
export function parsePeer(envelope: Envelope): PeerDescriptor | null {
  if (envelope.type !== 'pong' && envelope.type !== 'ping') return null;
  const parsed = PongDataSchema.safeParse(envelope.data);
  if (!parsed.success) return null;

  const data = parsed.data;
  return {
    nodeId: envelope.source,
    projectName: data.project_name,
    engineVersion: data.engine_version,
    commandIp: data.command_ip,
    commandPort: data.command_port,
    metadata: Object.freeze({ ...data }),
  };
}

export class DiscoveryChannel {
  private readonly config: RemoteExecutionConfig;
  private readonly endpoint: DatagramEndpoint;
  private readonly log: Logger;
  private lastSentType: MessageType = 'ping';
  private closed = false;

  constructor(config: RemoteExecutionConfig, endpoint: DatagramEndpoint, log: Logger = discoveryLog) {
    this.config = config;
    this.endpoint = endpoint;
    this.log = log;
  }

  static async open(
    config: RemoteExecutionConfig,
    transports: SessionTransports = nodeTransports
  ): Promise<DiscoveryChannel> {
    const endpoint = await transports.openMulticast(config);
    return new DiscoveryChannel(config, endpoint);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async broadcast(envelope: Envelope): Promise<void> {
    if (this.closed) {
      throw new ConnectionError('Discovery channel is closed');
    }
    this.lastSentType = envelope.type;
    await this.endpoint.send(encodeEnvelope(envelope), this.config.multicastGroup);
    this.log.debug('Sent', { type: envelope.type, dest: envelope.dest });
  }

  /** Replies addressed to another controller, or from the wrong project, are skipped */
  private isWanted(envelope: Envelope, peer: PeerDescriptor | null): peer is PeerDescriptor {
    if (peer === null) return false;
    if (envelope.dest !== undefined && envelope.dest !== this.config.localId) return false;
    const { targetName } = this.config;
    return targetName === undefined || peer.projectName === targetName;
  }

  sendPing(): Promise<void> {
    return this.broadcast(createPing(this.config.localId));
  }

  /**
   * Wait for the first acceptable reply. Throws DiscoveryTimeoutError when
   * none arrives before the deadline.
   */
  async receivePong(timeoutMs: number = DEFAULT_TIMEOUTS.discoveryMs): Promise<PeerDescriptor> {
    const envelope = await receiveEnvelope({
      inbox: this.endpoint.inbox,
      timeoutMs,
      ownType: this.lastSentType,
      localId: this.config.localId,
      accept: (candidate) => this.isWanted(candidate, parsePeer(candidate)),
      log: this.log,
    });

    const peer = envelope ? parsePeer(envelope) : null;
    if (peer === null) {
      throw new DiscoveryTimeoutError(timeoutMs, this.config.targetName);
    }
    this.log.info('Found peer', { nodeId: peer.nodeId, project: peer.projectName, engine: peer.engineVersion });
    return peer;
  }

  async ping(timeoutMs: number = DEFAULT_TIMEOUTS.discoveryMs): Promise<PeerDescriptor> {
    await this.sendPing();
    return this.receivePong(timeoutMs);
  }

  /**
   * Send one ping and gather every distinct peer that answers before the
   * deadline. An empty list is not an error.
   */
  async collectPongs(timeoutMs: number = DEFAULT_TIMEOUTS.discoveryMs): Promise<PeerDescriptor[]> {
    await this.sendPing();

    const peers = new Map<string, PeerDescriptor>();
    const deadline = performance.now() + timeoutMs;
    for (;;) {
      const remaining = deadline - performance.now();
      if (remaining <= 0) break;

      const envelope = await receiveEnvelope({
        inbox: this.endpoint.inbox,
        timeoutMs: remaining,
        ownType: this.lastSentType,
        localId: this.config.localId,
        accept: (candidate) => {
          const peer = parsePeer(candidate);
          return this.isWanted(candidate, peer) && !peers.has(peer.nodeId);
        },
        log: this.log,
      });
      const peer = envelope ? parsePeer(envelope) : null;
      if (peer === null) break;
      peers.set(peer.nodeId, peer);
    }

    this.log.debug('Collected replies', { count: peers.size });
    return [...peers.values()];
  }

  /** Tell the peer where to connect for commands. */
  sendOpenConnection(peerId: string, commandAddress: Endpoint = this.config.commandAddress): Promise<void> {
    return this.broadcast(createOpenConnection(this.config.localId, peerId, commandAddress));
  }

  async sendCloseConnection(peerId?: string): Promise<void> {
    if (!peerId) return;
    await this.broadcast(createCloseConnection(this.config.localId, peerId));
  }

  /** Discard unread datagrams; returns how many were dropped. */
  drain(): number {
    return this.endpoint.inbox.drain();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.endpoint.close();
  }
}
