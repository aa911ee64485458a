/**
 * @remote-exec/protocol
 *
 * Wire envelope types, per-type payload schemas and the JSON codec shared by
 * the discovery and command channels.
 */

export {
  PROTOCOL_VERSION,
  PROTOCOL_MAGIC,
  MESSAGE_TYPES,
  ExecMode,
  DEFAULT_EXEC_MODE,
  type MessageType,
  type CommandRequest,
  type PongData,
  type OpenConnectionData,
  type CommandData,
  type CommandOutputEntry,
  type CommandResultData,
  type Envelope,
  type EnvelopeOf,
  type PingEnvelope,
  type PongEnvelope,
  type OpenConnectionEnvelope,
  type CloseConnectionEnvelope,
  type CommandEnvelope,
  type CommandResultEnvelope,
} from './types.js';

export {
  EnvelopeSchema,
  ExecModeSchema,
  PongDataSchema,
  OpenConnectionDataSchema,
  CommandDataSchema,
  CommandOutputEntrySchema,
  CommandResultDataSchema,
} from './schemas.js';

export {
  MAX_ENVELOPE_BYTES,
  encodeEnvelope,
  decodeEnvelope,
  EnvelopeAccumulator,
  isEcho,
  createPing,
  createOpenConnection,
  createCloseConnection,
  createCommand,
  type DecodeResult,
  type EchoContext,
} from './codec.js';
