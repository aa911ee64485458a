/**
 * Envelope encoding/decoding.
 * @remote-exec/protocol
 *
 * There is no length prefix on the wire: a message is complete when the bytes
 * received so far parse as one JSON document. Until then the decoder reports
 * `incomplete` and the caller keeps appending.
 */

import type { ZodError } from 'zod';
import { EnvelopeSchema } from './schemas.js';
import {
  DEFAULT_EXEC_MODE,
  PROTOCOL_MAGIC,
  PROTOCOL_VERSION,
  type CloseConnectionEnvelope,
  type CommandEnvelope,
  type CommandRequest,
  type Envelope,
  type MessageType,
  type OpenConnectionEnvelope,
  type PingEnvelope,
} from './types.js';

export const MAX_ENVELOPE_BYTES = 64 * 1024 * 1024; // 64 MiB

export type DecodeResult =
  | { status: 'ok'; envelope: Envelope }
  | { status: 'incomplete' }
  | { status: 'invalid'; reason: string };

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function encodeEnvelope(envelope: Envelope): Buffer {
  return Buffer.from(JSON.stringify(envelope), 'utf-8');
}

/**
 * Decode one envelope. Bytes that are not (yet) a JSON document are
 * `incomplete`; a JSON document that is not a valid envelope is `invalid`.
 */
export function decodeEnvelope(bytes: Buffer | string): DecodeResult {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { status: 'incomplete' };
  }

  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: 'invalid', reason: formatIssues(parsed.error) };
  }
  return { status: 'ok', envelope: parsed.data };
}

/**
 * Collects received chunks until they decode. The buffer is cleared after a
 * complete document, whether it was a valid envelope or not.
 */
export class EnvelopeAccumulator {
  private chunks: Buffer[] = [];
  private size = 0;
  private readonly maxBytes: number;

  constructor(maxBytes: number = MAX_ENVELOPE_BYTES) {
    this.maxBytes = maxBytes;
  }

  get pendingBytes(): number {
    return this.size;
  }

  push(chunk: Buffer): DecodeResult {
    this.chunks.push(chunk);
    this.size += chunk.length;

    if (this.size > this.maxBytes) {
      const size = this.size;
      this.reset();
      return { status: 'invalid', reason: `Envelope too large: ${size} > ${this.maxBytes}` };
    }

    const result = decodeEnvelope(this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.size));
    if (result.status !== 'incomplete') {
      this.reset();
    }
    return result;
  }

  reset(): void {
    this.chunks = [];
    this.size = 0;
  }
}

export interface EchoContext {
  /** Type of the message this side most recently sent on the socket */
  ownType: MessageType;
  localId: string;
}

/**
 * Whether a received envelope is our own message reflected back (multicast
 * loopback) rather than a peer's reply.
 */
export function isEcho(envelope: Envelope, context: EchoContext): boolean {
  if (envelope.source === context.localId) return true;
  // A ping-tagged envelope from another source is a peer's pong
  return envelope.type === context.ownType && context.ownType !== 'ping';
}

// =============================================================================
// Builders
// =============================================================================

export function createPing(localId: string): PingEnvelope {
  return {
    type: 'ping',
    version: PROTOCOL_VERSION,
    magic: PROTOCOL_MAGIC,
    source: localId,
  };
}

export function createOpenConnection(
  localId: string,
  peerId: string,
  commandAddress: { host: string; port: number }
): OpenConnectionEnvelope {
  return {
    type: 'open_connection',
    version: PROTOCOL_VERSION,
    magic: PROTOCOL_MAGIC,
    source: localId,
    dest: peerId,
    data: {
      command_ip: commandAddress.host,
      command_port: commandAddress.port,
    },
  };
}

export function createCloseConnection(localId: string, peerId: string): CloseConnectionEnvelope {
  return {
    type: 'close_connection',
    version: PROTOCOL_VERSION,
    magic: PROTOCOL_MAGIC,
    source: localId,
    dest: peerId,
  };
}

export function createCommand(localId: string, peerId: string, request: CommandRequest): CommandEnvelope {
  return {
    type: 'command',
    version: PROTOCOL_VERSION,
    magic: PROTOCOL_MAGIC,
    source: localId,
    dest: peerId,
    data: {
      command: request.command,
      unattended: request.unattended ?? true,
      exec_mode: request.execMode ?? DEFAULT_EXEC_MODE,
    },
  };
}
