/**
 * Payload schemas, one per envelope tag. Decoding validates the whole
 * envelope against the tag's schema, so consumers never touch raw JSON.
 */

import { z } from 'zod';
import { PROTOCOL_MAGIC, PROTOCOL_VERSION } from './types.js';

export const ExecModeSchema = z.enum(['ExecuteFile', 'ExecuteStatement', 'EvaluateStatement']);

const PortSchema = z.number().int().min(0).max(65535);

/** Anything a peer chooses to attach */
const OpenDataSchema = z.record(z.unknown());

/**
 * Peer metadata sent in reply to a ping. Unknown fields are kept for callers
 * that want more than the project name.
 */
export const PongDataSchema = z
  .object({
    project_name: z.string(),
    engine_version: z.string(),
    command_ip: z.string().optional(),
    command_port: PortSchema.optional(),
  })
  .passthrough();

export const OpenConnectionDataSchema = z.object({
  command_ip: z.string(),
  command_port: PortSchema,
});

export const CommandDataSchema = z.object({
  command: z.string(),
  unattended: z.boolean(),
  exec_mode: ExecModeSchema,
});

export const CommandOutputEntrySchema = z.object({
  type: z.string(),
  output: z.string(),
});

export const CommandResultDataSchema = z
  .object({
    success: z.boolean().optional(),
    result: z.string().optional(),
    output: z.array(CommandOutputEntrySchema).optional(),
  })
  .passthrough();

const envelopeBase = {
  version: z.literal(PROTOCOL_VERSION),
  magic: z.literal(PROTOCOL_MAGIC),
  source: z.string().min(1),
  dest: z.string().optional(),
};

export const EnvelopeSchema = z.discriminatedUnion('type', [
  // Peers may answer a ping with a ping-tagged pong, so ping data stays open
  z.object({ ...envelopeBase, type: z.literal('ping'), data: OpenDataSchema.optional() }),
  z.object({ ...envelopeBase, type: z.literal('pong'), data: PongDataSchema }),
  z.object({ ...envelopeBase, type: z.literal('open_connection'), dest: z.string(), data: OpenConnectionDataSchema }),
  z.object({ ...envelopeBase, type: z.literal('close_connection'), dest: z.string(), data: OpenDataSchema.optional() }),
  z.object({ ...envelopeBase, type: z.literal('command'), dest: z.string(), data: CommandDataSchema }),
  z.object({ ...envelopeBase, type: z.literal('command_result'), data: CommandResultDataSchema }),
]);
