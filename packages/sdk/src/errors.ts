/**
 * Error types, re-exported from @remote-exec/utils so SDK users can import
 * them from '@remote-exec/sdk' or '@remote-exec/sdk/errors'.
 */

export {
  RemoteExecError,
  TimeoutError,
  DiscoveryTimeoutError,
  ConnectionError,
  NotConnectedError,
  CommandFailedError,
} from '@remote-exec/utils/errors';
