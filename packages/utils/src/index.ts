export {
  createLogger,
  bindLogger,
  describeError,
  formatMessage,
  isLogLevel,
  discoveryLog,
  commandLog,
  sessionLog,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';

export {
  RemoteExecError,
  TimeoutError,
  DiscoveryTimeoutError,
  ConnectionError,
  NotConnectedError,
  CommandFailedError,
  InvalidConfigError,
  InvalidProjectPathError,
} from './errors.js';
