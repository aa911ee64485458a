/**
 * Construction of the immutable RemoteExecutionConfig.
 */

import net from 'node:net';
import { randomUUID } from 'node:crypto';
import type { ZodError } from 'zod';
import { InvalidConfigError } from '@remote-exec/utils/errors';
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_COMMAND_HOST,
  DEFAULT_MULTICAST_BIND_ADDRESS,
  DEFAULT_MULTICAST_GROUP,
  DEFAULT_MULTICAST_TTL,
} from './defaults.js';
import { RemoteExecutionConfigSchema, type Endpoint, type RemoteExecutionConfig } from './schemas.js';

export interface RemoteExecutionConfigOptions {
  bufferSize?: number;
  multicastGroup?: Endpoint;
  multicastBindAddress?: string;
  multicastTtl?: number;
  /** Defaults to a fresh random UUID */
  localId?: string;
  /** Defaults to an ephemeral port on 127.0.0.1, resolved once */
  commandAddress?: Endpoint;
  /** Empty string means "first peer wins" */
  targetName?: string;
}

/**
 * Pick a free TCP port by binding port 0 and releasing it straight away.
 */
export function resolveCommandAddress(host: string = DEFAULT_COMMAND_HOST): Promise<Endpoint> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new InvalidConfigError(`Could not resolve a command port on ${host}`));
        return;
      }
      const { port } = address;
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve({ host, port });
      });
    });
  });
}

/**
 * Parse an `ip:port` endpoint string as found in engine settings.
 */
export function parseEndpoint(value: string): Endpoint {
  const match = /^\s*([^:\s]+):(\d+)\s*$/.exec(value);
  if (!match) {
    throw new InvalidConfigError(`Invalid endpoint "${value}", expected ip:port`);
  }
  return { host: match[1], port: Number(match[2]) };
}

export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function freezeConfig(config: RemoteExecutionConfig): RemoteExecutionConfig {
  return Object.freeze({
    ...config,
    multicastGroup: Object.freeze({ ...config.multicastGroup }),
    commandAddress: Object.freeze({ ...config.commandAddress }),
  });
}

/**
 * Validate an already complete config object and freeze it.
 */
export function validateRemoteExecutionConfig(input: unknown): RemoteExecutionConfig {
  const parsed = RemoteExecutionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid remote execution config: ${formatIssues(parsed.error)}`);
  }
  return freezeConfig(parsed.data);
}

/**
 * Build a config from explicit values, falling back to the built-in defaults.
 * The command address is resolved here, before any socket that uses it exists.
 */
export async function createRemoteExecutionConfig(
  options: RemoteExecutionConfigOptions = {}
): Promise<RemoteExecutionConfig> {
  const commandAddress = options.commandAddress ?? (await resolveCommandAddress());

  return validateRemoteExecutionConfig({
    bufferSize: options.bufferSize ?? DEFAULT_BUFFER_SIZE,
    multicastGroup: options.multicastGroup ?? { ...DEFAULT_MULTICAST_GROUP },
    multicastBindAddress: options.multicastBindAddress ?? DEFAULT_MULTICAST_BIND_ADDRESS,
    multicastTtl: options.multicastTtl ?? DEFAULT_MULTICAST_TTL,
    localId: options.localId ?? randomUUID(),
    commandAddress,
    targetName: options.targetName || undefined,
  });
}

/** Flat view of a config for log lines. */
export function describeConfig(config: RemoteExecutionConfig): Record<string, unknown> {
  return {
    bufferSize: config.bufferSize,
    multicastGroup: formatEndpoint(config.multicastGroup),
    multicastBindAddress: config.multicastBindAddress,
    multicastTtl: config.multicastTtl,
    commandAddress: formatEndpoint(config.commandAddress),
    targetName: config.targetName ?? '(any)',
  };
}
