/**
 * Remote Execution Protocol Types
 * @remote-exec/protocol
 *
 * Every message, on the multicast group and on the command socket alike, is a
 * single JSON document:
 *
 * ```json
 * { "type": "open_connection", "version": 1, "magic": "ue_py",
 *   "source": "<uuid>", "dest": "<uuid>",
 *   "data": { "command_ip": "127.0.0.1", "command_port": 45123 } }
 * ```
 */

import type { z } from 'zod';
import type {
  CommandDataSchema,
  CommandOutputEntrySchema,
  CommandResultDataSchema,
  EnvelopeSchema,
  OpenConnectionDataSchema,
  PongDataSchema,
} from './schemas.js';

export const PROTOCOL_VERSION = 1;
export const PROTOCOL_MAGIC = 'ue_py';

export const MESSAGE_TYPES = [
  'ping',
  'pong',
  'open_connection',
  'close_connection',
  'command',
  'command_result',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/**
 * How the peer runs a command.
 * - EXECUTE_FILE: a literal script of several statements, or a file path with optional arguments
 * - EXECUTE_STATEMENT: a single statement, its result printed
 * - EVALUATE_STATEMENT: a single expression, its value returned as the result
 */
export const ExecMode = {
  EXECUTE_FILE: 'ExecuteFile',
  EXECUTE_STATEMENT: 'ExecuteStatement',
  EVALUATE_STATEMENT: 'EvaluateStatement',
} as const;

export type ExecMode = (typeof ExecMode)[keyof typeof ExecMode];

export const DEFAULT_EXEC_MODE: ExecMode = ExecMode.EVALUATE_STATEMENT;

export interface CommandRequest {
  command: string;
  /** Suppress interactive UI on the peer (default: true) */
  unattended?: boolean;
  execMode?: ExecMode;
}

// =============================================================================
// Payloads
// =============================================================================

export type PongData = z.infer<typeof PongDataSchema>;
export type OpenConnectionData = z.infer<typeof OpenConnectionDataSchema>;
export type CommandData = z.infer<typeof CommandDataSchema>;
export type CommandOutputEntry = z.infer<typeof CommandOutputEntrySchema>;
export type CommandResultData = z.infer<typeof CommandResultDataSchema>;

// =============================================================================
// Envelopes
// =============================================================================

export type Envelope = z.infer<typeof EnvelopeSchema>;
export type EnvelopeOf<T extends MessageType> = Extract<Envelope, { type: T }>;

export type PingEnvelope = EnvelopeOf<'ping'>;
export type PongEnvelope = EnvelopeOf<'pong'>;
export type OpenConnectionEnvelope = EnvelopeOf<'open_connection'>;
export type CloseConnectionEnvelope = EnvelopeOf<'close_connection'>;
export type CommandEnvelope = EnvelopeOf<'command'>;
export type CommandResultEnvelope = EnvelopeOf<'command_result'>;
