/**
 * @remote-exec/sdk
 *
 * Find a peer over multicast, open a command connection to it and run
 * commands there.
 */

export { RemoteSession, type SessionState, type SessionOptions, type ExecuteOptions } from './session.js';
export { DiscoveryChannel, parsePeer, type PeerDescriptor } from './discovery.js';
export { CommandChannel, type SendOptions } from './command-channel.js';
export { CommandResult, NO_RESULT, type CommandOutput, type CommandResultInit } from './command-result.js';
export {
  JsonOutputPipe,
  JSON_PIPE_ENV,
  DEFAULT_PIPE_FILE_NAME,
  defaultPipePath,
  type PipeDocument,
} from './output-pipe.js';
export { receiveEnvelope, type ReceiveOptions } from './receive-loop.js';
export { ChunkInbox } from './inbox.js';
export {
  UdpMulticastSocket,
  TcpCommandListener,
  TcpCommandStream,
  nodeTransports,
  MULTICAST_QUEUE_LIMIT,
  type DatagramEndpoint,
  type CommandListener,
  type CommandStream,
  type SessionTransports,
} from './transports.js';
export * from './errors.js';
