/**
 * Error types for remote-exec
 *
 * Every failure surfaced by the session controller is one of these, so callers
 * can tell a discovery timeout from a refused command socket with instanceof.
 */

export class RemoteExecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RemoteExecError';
  }
}

export class TimeoutError extends RemoteExecError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** No peer answered the ping (or none with the wanted project name). */
export class DiscoveryTimeoutError extends TimeoutError {
  readonly targetName?: string;

  constructor(timeoutMs: number, targetName?: string) {
    super(targetName ? `discovery of project "${targetName}"` : 'discovery', timeoutMs);
    this.name = 'DiscoveryTimeoutError';
    this.targetName = targetName;
  }
}

export class ConnectionError extends RemoteExecError {
  constructor(message: string) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
  }
}

export class NotConnectedError extends RemoteExecError {
  constructor(message?: string) {
    super(message || 'Session is not open. Call open() first.');
    this.name = 'NotConnectedError';
  }
}

/** Raised for `success: false` results when the caller asked for exceptions. */
export class CommandFailedError extends RemoteExecError {
  readonly result: string;
  readonly timedOut: boolean;

  constructor(result: string, timedOut = false) {
    super(result);
    this.name = 'CommandFailedError';
    this.result = result;
    this.timedOut = timedOut;
  }
}

export class InvalidConfigError extends RemoteExecError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export class InvalidProjectPathError extends RemoteExecError {
  constructor(projectPath: string) {
    super(`Invalid project path: ${projectPath}`);
    this.name = 'InvalidProjectPathError';
  }
}
