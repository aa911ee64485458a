/**
 * Point-to-point command connection. The controller listens, the peer
 * connects after receiving open_connection, and then each command is
 * answered by exactly one command_result.
 */

import { DEFAULT_TIMEOUTS, type Endpoint, type RemoteExecutionConfig } from '@remote-exec/config';
import { createCommand, encodeEnvelope, type CommandRequest } from '@remote-exec/protocol';
import { CommandFailedError, ConnectionError } from '@remote-exec/utils/errors';
import { bindLogger, commandLog, type Logger } from '@remote-exec/utils/logger';
import { CommandResult } from './command-result.js';
import { receiveEnvelope } from './receive-loop.js';
import {
  nodeTransports,
  type CommandListener,
  type CommandStream,
  type SessionTransports,
} from './transports.js';

export interface SendOptions {
  /** Budget for the whole reply (default 5000ms) */
  timeoutMs?: number;
  /** Throw CommandFailedError instead of returning an unsuccessful result */
  raiseOnFailure?: boolean;
}

export class CommandChannel {
  private readonly config: RemoteExecutionConfig;
  private readonly peerId: string;
  private readonly transports: SessionTransports;
  private readonly log: Logger;
  private listener?: CommandListener;
  private stream?: CommandStream;
  private inFlight = false;
  private closed = false;

  constructor(
    config: RemoteExecutionConfig,
    peerId: string,
    transports: SessionTransports = nodeTransports,
    log: Logger = commandLog
  ) {
    this.config = config;
    this.peerId = peerId;
    this.transports = transports;
    this.log = bindLogger(log, { peer: peerId });
  }

  get isListening(): boolean {
    return this.listener !== undefined;
  }

  get isConnected(): boolean {
    return this.stream !== undefined && !this.stream.inbox.closed;
  }

  /**
   * Bind the listener. Must run before open_connection goes out so the peer
   * never connects to a closed port.
   */
  async listen(): Promise<Endpoint> {
    if (this.closed) {
      throw new ConnectionError('Command channel is closed');
    }
    if (!this.listener) {
      this.listener = await this.transports.listen(this.config.commandAddress);
    }
    return this.listener.address;
  }

  async accept(timeoutMs: number = DEFAULT_TIMEOUTS.acceptMs): Promise<void> {
    if (!this.listener) {
      throw new ConnectionError('Command channel is not listening');
    }
    if (this.stream) return;
    this.stream = await this.listener.accept(timeoutMs);
    this.log.info('Peer connected');
  }

  /**
   * Send one command and wait for its result. A reply that does not arrive
   * in time yields an unsuccessful result with `timedOut` set.
   */
  async send(request: CommandRequest, options: SendOptions = {}): Promise<CommandResult> {
    const stream = this.stream;
    if (this.closed || !stream) {
      throw new ConnectionError('Command channel is not connected');
    }
    if (this.inFlight) {
      throw new ConnectionError('A command is already waiting for its result');
    }
    if (stream.inbox.closed) {
      throw new ConnectionError('Peer closed the command connection');
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUTS.commandMs;
    this.inFlight = true;
    try {
      // Anything still queued belongs to an earlier command that timed out
      const dropped = stream.inbox.drain();
      if (dropped > 0) {
        this.log.debug('Dropped late output', { chunks: dropped });
      }

      await stream.write(encodeEnvelope(createCommand(this.config.localId, this.peerId, request)));
      this.log.debug('Command sent', { execMode: request.execMode, timeoutMs });

      const envelope = await receiveEnvelope({
        inbox: stream.inbox,
        timeoutMs,
        ownType: 'command',
        localId: this.config.localId,
        accept: (candidate) => candidate.type === 'command_result',
        log: this.log,
      });

      let result: CommandResult;
      if (envelope?.type === 'command_result') {
        result = CommandResult.fromEnvelope(envelope);
      } else if (stream.inbox.closed) {
        throw new ConnectionError('Peer closed the command connection');
      } else {
        this.log.warn('No result before timeout', { timeoutMs });
        result = CommandResult.timeout();
      }

      if (options.raiseOnFailure && !result.success) {
        throw new CommandFailedError(result.result, result.timedOut);
      }
      return result;
    } finally {
      this.inFlight = false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const { stream, listener } = this;
    this.stream = undefined;
    this.listener = undefined;
    await stream?.close();
    await listener?.close();
  }
}
