/**
 * Component logger for remote-exec
 *
 * - Plain text lines by default, JSON lines for jq when REMOTE_EXEC_LOG_JSON=1
 * - Level from REMOTE_EXEC_LOG_LEVEL (DEBUG, INFO, WARN, ERROR)
 * - REMOTE_EXEC_LOG_FILE redirects everything to a file
 *
 * Socket failures are usually passed in as `{ error: err }`; Error values are
 * written as their message (with the errno code when there is one) in both
 * formats.
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

// Env is read at call time so the CLI can set it after imports complete
function getLogFile(): string | undefined {
  return process.env.REMOTE_EXEC_LOG_FILE;
}

function getLogLevel(): LogLevel {
  const raw = (process.env.REMOTE_EXEC_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(raw) ? raw : 'INFO';
}

function isLogJson(): boolean {
  return process.env.REMOTE_EXEC_LOG_JSON === '1';
}

/**
 * One-line description of an error: `EADDRINUSE: listen EADDRINUSE ...` for
 * errno errors, the bare message otherwise.
 */
export function describeError(err: Error): string {
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  return code && !err.message.startsWith(code) ? `${code}: ${err.message}` : err.message;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? describeError(value) : value;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return describeError(value);
  return JSON.stringify(value, jsonReplacer) ?? String(value);
}

export function formatMessage(entry: LogEntry): string {
  if (isLogJson()) {
    return JSON.stringify(entry, jsonReplacer);
  }
  const { ts, level, component, msg, ...extra } = entry;
  const fields = Object.entries(extra).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${ts} [${level}] [${component}] ${msg}${fields.length > 0 ? ' ' + fields.join(' ') : ''}`;
}

const createdLogDirs = new Set<string>();

function write(line: string): void {
  const logFile = getLogFile();
  if (!logFile) {
    // stdout stays clean for command output
    console.error(line);
    return;
  }
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
  fs.appendFileSync(logFile, line + '\n');
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) return;
  write(formatMessage({ ts: new Date().toISOString(), level, component, msg, ...extra }));
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'discovery', 'command', 'session')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

/**
 * Wrap a logger so every line carries `fields`, e.g. the peer a channel talks
 * to. Fields given at the call site win.
 */
export function bindLogger(logger: Logger, fields: Record<string, unknown>): Logger {
  return {
    debug: (msg, extra) => logger.debug(msg, { ...fields, ...extra }),
    info: (msg, extra) => logger.info(msg, { ...fields, ...extra }),
    warn: (msg, extra) => logger.warn(msg, { ...fields, ...extra }),
    error: (msg, extra) => logger.error(msg, { ...fields, ...extra }),
  };
}

export const discoveryLog = createLogger('discovery');
export const commandLog = createLogger('command');
export const sessionLog = createLogger('session');

export default createLogger;
