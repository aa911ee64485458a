/**
 * Deadline-bounded receive loop shared by the discovery and command channels.
 */

import { performance } from 'node:perf_hooks';
import {
  EnvelopeAccumulator,
  MAX_ENVELOPE_BYTES,
  isEcho,
  type Envelope,
  type MessageType,
} from '@remote-exec/protocol';
import type { Logger } from '@remote-exec/utils/logger';
import type { ChunkInbox } from './inbox.js';

export interface ReceiveOptions {
  inbox: ChunkInbox;
  timeoutMs: number;
  /** Type of the message this side last sent on the socket */
  ownType: MessageType;
  localId: string;
  /** Envelopes for which this returns false are skipped */
  accept?: (envelope: Envelope) => boolean;
  log: Logger;
  maxBytes?: number;
}

/**
 * Wait for the next acceptable envelope. The deadline is fixed on entry and
 * never extended by partial input. Returns null on timeout or when the
 * inbox closes.
 */
export async function receiveEnvelope(options: ReceiveOptions): Promise<Envelope | null> {
  const { inbox, ownType, localId, accept, log } = options;
  const accumulator = new EnvelopeAccumulator(options.maxBytes ?? MAX_ENVELOPE_BYTES);
  const deadline = performance.now() + options.timeoutMs;

  for (;;) {
    const remaining = deadline - performance.now();
    if (remaining <= 0) break;

    const chunk = await inbox.receive(remaining);
    if (chunk === null) {
      if (inbox.closed) {
        log.debug('Inbox closed while receiving', { ownType });
      }
      break;
    }

    const result = accumulator.push(chunk);
    switch (result.status) {
      case 'incomplete':
        continue;
      case 'invalid':
        log.debug('Discarding invalid envelope', { reason: result.reason });
        continue;
      case 'ok': {
        const { envelope } = result;
        if (isEcho(envelope, { ownType, localId })) {
          log.debug('Discarding echo', { type: envelope.type, source: envelope.source });
          continue;
        }
        if (accept && !accept(envelope)) {
          log.debug('Skipping envelope', { type: envelope.type, source: envelope.source });
          continue;
        }
        return envelope;
      }
    }
  }

  if (accumulator.pendingBytes > 0) {
    log.debug('Receive timed out with a partial envelope', { pendingBytes: accumulator.pendingBytes });
  }
  return null;
}
