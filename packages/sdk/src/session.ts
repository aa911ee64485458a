/**
 * RemoteSession - discovery plus command channel behind one lifecycle.
 *
 *   CLOSED --open()--> DISCOVERING --peer connected--> OPEN
 *      ^                    |                            |
 *      +------ failure -----+---------- close() ---------+
 */

import { DEFAULT_TIMEOUTS, describeConfig, type RemoteExecutionConfig } from '@remote-exec/config';
import type { ExecMode } from '@remote-exec/protocol';
import { ConnectionError, NotConnectedError } from '@remote-exec/utils/errors';
import { sessionLog, type Logger } from '@remote-exec/utils/logger';
import { CommandChannel, type SendOptions } from './command-channel.js';
import type { CommandResult } from './command-result.js';
import { DiscoveryChannel, type PeerDescriptor } from './discovery.js';
import type { JsonOutputPipe } from './output-pipe.js';
import { nodeTransports, type SessionTransports } from './transports.js';

export type SessionState = 'CLOSED' | 'DISCOVERING' | 'OPEN';

export interface SessionOptions {
  config: RemoteExecutionConfig;
  /** Socket factories (default: node:dgram and node:net) */
  transports?: SessionTransports;
  /** Flushed before every command when set */
  outputPipe?: JsonOutputPipe;
  discoveryTimeoutMs?: number;
  acceptTimeoutMs?: number;
  /** Default reply budget for execute() */
  commandTimeoutMs?: number;
  log?: Logger;
}

export interface ExecuteOptions extends SendOptions {
  execMode?: ExecMode;
  unattended?: boolean;
}

export class RemoteSession {
  private readonly options: SessionOptions;
  private readonly transports: SessionTransports;
  private readonly log: Logger;

  private _state: SessionState = 'CLOSED';
  private _peer?: PeerDescriptor;
  private discovery?: DiscoveryChannel;
  private command?: CommandChannel;

  onStateChange?: (state: SessionState) => void;

  constructor(options: SessionOptions) {
    this.options = options;
    this.transports = options.transports ?? nodeTransports;
    this.log = options.log ?? sessionLog;
  }

  /**
   * Open a session, run `fn` against it and close it whatever happens.
   */
  static async run<T>(options: SessionOptions, fn: (session: RemoteSession) => Promise<T>): Promise<T> {
    const session = new RemoteSession(options);
    await session.open();
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  get state(): SessionState {
    return this._state;
  }

  get peer(): PeerDescriptor | undefined {
    return this._peer;
  }

  get config(): RemoteExecutionConfig {
    return this.options.config;
  }

  get outputPipe(): JsonOutputPipe | undefined {
    return this.options.outputPipe;
  }

  private setState(state: SessionState): void {
    if (this._state === state) return;
    this._state = state;
    this.onStateChange?.(state);
  }

  /**
   * Discover a peer and connect its command channel. Any failure releases
   * every socket and leaves the session CLOSED before rethrowing.
   */
  async open(): Promise<PeerDescriptor> {
    if (this._state === 'OPEN' && this._peer) {
      return this._peer;
    }
    if (this._state === 'DISCOVERING') {
      throw new ConnectionError('Session is already opening');
    }

    const { config } = this.options;
    this.setState('DISCOVERING');
    this.log.debug('Opening session', describeConfig(config));

    let openSentTo: string | undefined;
    try {
      const discovery = await DiscoveryChannel.open(config, this.transports);
      this.discovery = discovery;
      const peer = await discovery.ping(this.options.discoveryTimeoutMs ?? DEFAULT_TIMEOUTS.discoveryMs);

      const command = new CommandChannel(config, peer.nodeId, this.transports);
      this.command = command;
      const address = await command.listen();
      await discovery.sendOpenConnection(peer.nodeId, address);
      openSentTo = peer.nodeId;
      await command.accept(this.options.acceptTimeoutMs ?? DEFAULT_TIMEOUTS.acceptMs);

      // Nothing reads the group while open; the inbox limit bounds what piles up after this
      discovery.drain();
      this._peer = peer;
      this.setState('OPEN');
      this.log.info('Session open', { peer: peer.nodeId, project: peer.projectName });
      return peer;
    } catch (err) {
      this.log.warn('Open failed', { error: err });
      await this.release(openSentTo);
      throw err;
    }
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    if (this._state !== 'OPEN' || !this.command) {
      throw new NotConnectedError();
    }
    if (this.options.outputPipe) {
      await this.options.outputPipe.flush();
    }
    return this.command.send(
      { command, execMode: options.execMode, unattended: options.unattended },
      {
        timeoutMs: options.timeoutMs ?? this.options.commandTimeoutMs,
        raiseOnFailure: options.raiseOnFailure,
      }
    );
  }

  /**
   * Tell the peer we are leaving and release every socket. Does nothing when
   * already closed.
   */
  async close(): Promise<void> {
    if (this._state === 'CLOSED' && !this.discovery && !this.command) return;
    await this.release(this._peer?.nodeId);
    this.log.info('Session closed');
  }

  private async release(peerId: string | undefined): Promise<void> {
    const { discovery, command } = this;
    this.discovery = undefined;
    this.command = undefined;
    this._peer = undefined;

    if (discovery && peerId) {
      try {
        await discovery.sendCloseConnection(peerId);
      } catch (err) {
        this.log.warn('Could not send close_connection', { error: err });
      }
    }
    try {
      await command?.close();
    } catch (err) {
      this.log.warn('Could not close command channel', { error: err });
    }
    try {
      await discovery?.close();
    } catch (err) {
      this.log.warn('Could not close discovery channel', { error: err });
    }
    this.setState('CLOSED');
  }
}
