import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '@remote-exec/utils/errors';
import {
  createRemoteExecutionConfig,
  describeConfig,
  formatEndpoint,
  parseEndpoint,
  resolveCommandAddress,
  validateRemoteExecutionConfig,
} from './remote-config.js';

const LOCAL_ID = '2f6c3e1a-8b4d-4c2e-9f1a-3b5d7e9c1a2b';
const COMMAND_ADDRESS = { host: '127.0.0.1', port: 45123 };

describe('createRemoteExecutionConfig', () => {
  it('fills in the defaults', async () => {
    const config = await createRemoteExecutionConfig({ localId: LOCAL_ID, commandAddress: COMMAND_ADDRESS });

    expect(config).toEqual({
      bufferSize: 2_097_152,
      multicastGroup: { host: '239.0.0.1', port: 6766 },
      multicastBindAddress: '0.0.0.0',
      multicastTtl: 0,
      localId: LOCAL_ID,
      commandAddress: COMMAND_ADDRESS,
      targetName: undefined,
    });
  });

  it('returns a frozen config', async () => {
    const config = await createRemoteExecutionConfig({ commandAddress: COMMAND_ADDRESS });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.multicastGroup)).toBe(true);
    expect(Object.isFrozen(config.commandAddress)).toBe(true);
  });

  it('generates a distinct local id per config', async () => {
    const a = await createRemoteExecutionConfig({ commandAddress: COMMAND_ADDRESS });
    const b = await createRemoteExecutionConfig({ commandAddress: COMMAND_ADDRESS });
    expect(a.localId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(a.localId).not.toBe(b.localId);
  });

  it('treats an empty target name as unset', async () => {
    const config = await createRemoteExecutionConfig({ commandAddress: COMMAND_ADDRESS, targetName: '' });
    expect(config.targetName).toBeUndefined();
  });

  it('resolves a command address when none is given', async () => {
    const config = await createRemoteExecutionConfig();
    expect(config.commandAddress.host).toBe('127.0.0.1');
    expect(config.commandAddress.port).toBeGreaterThan(0);
  });

  it('rejects a non-multicast group', async () => {
    await expect(
      createRemoteExecutionConfig({ commandAddress: COMMAND_ADDRESS, multicastGroup: { host: '10.0.0.1', port: 6766 } })
    ).rejects.toThrow(/multicastGroup\.host: Multicast group must be an address in 224\.0\.0\.0\/4/);
  });
});

describe('validateRemoteExecutionConfig', () => {
  it('throws InvalidConfigError listing the bad fields', () => {
    expect(() => validateRemoteExecutionConfig({ bufferSize: -1 })).toThrow(InvalidConfigError);
  });
});

describe('resolveCommandAddress', () => {
  it('returns a released ephemeral port on loopback', async () => {
    const address = await resolveCommandAddress();
    expect(address.host).toBe('127.0.0.1');
    expect(address.port).toBeGreaterThan(0);
    expect(address.port).toBeLessThanOrEqual(65535);
  });
});

describe('endpoints', () => {
  it('parses ip:port strings', () => {
    expect(parseEndpoint('239.0.0.2:6767')).toEqual({ host: '239.0.0.2', port: 6767 });
    expect(parseEndpoint(' 239.0.0.2:6767 ')).toEqual({ host: '239.0.0.2', port: 6767 });
  });

  it('rejects strings without a port', () => {
    expect(() => parseEndpoint('239.0.0.2')).toThrow(InvalidConfigError);
    expect(() => parseEndpoint('239.0.0.2:abc')).toThrow('Invalid endpoint "239.0.0.2:abc", expected ip:port');
  });

  it('formats endpoints', () => {
    expect(formatEndpoint({ host: '127.0.0.1', port: 9000 })).toBe('127.0.0.1:9000');
  });
});

describe('describeConfig', () => {
  it('flattens the config for logging', async () => {
    const config = await createRemoteExecutionConfig({
      localId: LOCAL_ID,
      commandAddress: COMMAND_ADDRESS,
      targetName: 'Foo',
    });
    expect(describeConfig(config)).toEqual({
      bufferSize: 2_097_152,
      multicastGroup: '239.0.0.1:6766',
      multicastBindAddress: '0.0.0.0',
      multicastTtl: 0,
      commandAddress: '127.0.0.1:45123',
      targetName: 'Foo',
    });
  });
});
