import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { ConnectionError, DiscoveryTimeoutError, NotConnectedError } from '@remote-exec/utils/errors';
import type { Logger } from '@remote-exec/utils/logger';
import { JsonOutputPipe } from './output-pipe.js';
import { MULTICAST_QUEUE_LIMIT } from './transports.js';
import { RemoteSession, type SessionOptions, type SessionState } from './session.js';
import {
  FakeTransports,
  PEER_ID,
  resultBytes,
  testConfig,
  type FakePeerOptions,
} from './__fixtures__/fake-transports.js';

const silentLog: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function makeSession(peers: FakePeerOptions[], options: Partial<SessionOptions> = {}) {
  const transports = new FakeTransports(peers);
  const session = new RemoteSession({
    config: testConfig({ targetName: 'Foo' }),
    transports,
    discoveryTimeoutMs: 50,
    acceptTimeoutMs: 50,
    log: silentLog,
    ...options,
  });
  return { transports, session };
}

const evaluating: FakePeerOptions = {
  projectName: 'Foo',
  respond: (command) =>
    command.data.command === '1+2'
      ? [resultBytes({ success: true, result: '3', output: [] }, command.source)]
      : [resultBytes({ success: true, result: 'None', output: [{ type: 'Log', output: 'hello' }] }, command.source)],
};

describe('RemoteSession', () => {
  it('opens against the matching peer and runs commands', async () => {
    const { session } = makeSession([evaluating]);

    const peer = await session.open();
    expect(peer.projectName).toBe('Foo');
    expect(session.state).toBe('OPEN');

    const sum = await session.execute('1+2');
    expect(sum.result).toBe('3');
    expect(sum.toString()).toBe('');

    const printed = await session.execute('print("hello")', { execMode: 'ExecuteStatement' });
    expect(printed.toString()).toBe('Log: hello');

    await session.close();
  });

  it('walks through its states', async () => {
    const { session } = makeSession([evaluating]);
    const states: SessionState[] = [];
    session.onStateChange = (state) => states.push(state);

    await session.open();
    await session.close();

    expect(states).toEqual(['DISCOVERING', 'OPEN', 'CLOSED']);
  });

  it('fails discovery for another project and releases its socket', async () => {
    const { session, transports } = makeSession([{ projectName: 'Foo' }], { config: testConfig({ targetName: 'Bar' }) });

    await expect(session.open()).rejects.toBeInstanceOf(DiscoveryTimeoutError);
    expect(session.state).toBe('CLOSED');
    expect(transports.datagrams[0].closed).toBe(true);
    expect(transports.listeners).toHaveLength(0);
  });

  it('fails with a connection error when the peer never connects back', async () => {
    const { session, transports } = makeSession([{ projectName: 'Foo', connect: false }]);

    await expect(session.open()).rejects.toBeInstanceOf(ConnectionError);
    expect(session.state).toBe('CLOSED');
    expect(transports.listeners[0].closed).toBe(true);
    expect(transports.datagrams[0].closed).toBe(true);
    // The peer was told about us, so it is told we left
    expect(transports.peers[0].closeRequests).toBe(1);
  });

  it('binds the command listener before announcing it', async () => {
    const { session, transports } = makeSession([evaluating]);
    await session.open();

    const listenAt = transports.ops.log.indexOf('tcp.listen');
    const announceAt = transports.ops.log.lastIndexOf('udp.send');
    expect(listenAt).toBeGreaterThan(-1);
    expect(listenAt).toBeLessThan(announceAt);
    expect(transports.datagrams[0].sent[1]).toMatchObject({
      type: 'open_connection',
      dest: PEER_ID,
      data: { command_ip: '127.0.0.1', command_port: 40000 },
    });
    await session.close();
  });

  it('is a no-op to open twice', async () => {
    const { session, transports } = makeSession([evaluating]);
    const first = await session.open();
    const ops = transports.ops.count;

    expect(await session.open()).toBe(first);
    expect(transports.ops.count).toBe(ops);
    await session.close();
  });

  it('refuses to execute unless open', async () => {
    const { session } = makeSession([evaluating]);
    await expect(session.execute('1+2')).rejects.toBeInstanceOf(NotConnectedError);

    await session.open();
    await session.close();
    await expect(session.execute('1+2')).rejects.toThrow('Session is not open. Call open() first.');
  });

  it('returns an unsuccessful result when the peer stays silent', async () => {
    const { session } = makeSession([{ projectName: 'Foo' }], { commandTimeoutMs: 100 });
    await session.open();

    const started = performance.now();
    const result = await session.execute('import time; time.sleep(10)');
    expect(result.success).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(performance.now() - started).toBeLessThan(400);
    await session.close();
  });

  it('sends close_connection and releases every socket on close', async () => {
    const { session, transports } = makeSession([evaluating]);
    await session.open();
    await session.close();

    expect(transports.peers[0].closeRequests).toBe(1);
    expect(transports.listeners[0].closed).toBe(true);
    expect(transports.datagrams[0].closed).toBe(true);
    expect(session.peer).toBeUndefined();
  });

  it('keeps unread multicast traffic bounded while open', async () => {
    const { session, transports } = makeSession([evaluating]);
    await session.open();
    const multicast = transports.datagrams[0];
    expect(multicast.inbox.size).toBe(0);

    for (let i = 0; i < 10_000; i++) {
      multicast.deliver({ type: 'ping', version: 1, magic: 'ue_py', source: `controller-${i}` });
    }
    expect((await session.execute('1+2')).result).toBe('3');

    expect(multicast.inbox.size).toBe(MULTICAST_QUEUE_LIMIT);
    expect(multicast.inbox.dropped).toBe(10_000 - MULTICAST_QUEUE_LIMIT);
    await session.close();
  });

  it('performs no socket operations when closed twice', async () => {
    const { session, transports } = makeSession([evaluating]);
    await session.open();
    await session.close();
    const ops = transports.ops.count;

    await session.close();
    expect(transports.ops.count).toBe(ops);
  });

  it('performs no socket operations when closed without opening', async () => {
    const { session, transports } = makeSession([evaluating]);
    await session.close();
    expect(transports.ops.count).toBe(0);
  });

  it('performs no socket operations when closed after a failed open', async () => {
    const { session, transports } = makeSession([{ projectName: 'Other' }]);
    await expect(session.open()).rejects.toBeInstanceOf(DiscoveryTimeoutError);
    const ops = transports.ops.count;

    await session.close();
    expect(transports.ops.count).toBe(ops);
  });

  it('closes after run() even when the callback throws', async () => {
    const transports = new FakeTransports([evaluating]);
    const options: SessionOptions = {
      config: testConfig({ targetName: 'Foo' }),
      transports,
      discoveryTimeoutMs: 50,
      log: silentLog,
    };

    await expect(
      RemoteSession.run(options, async () => {
        throw new Error('callback failed');
      })
    ).rejects.toThrow('callback failed');
    expect(transports.datagrams[0].closed).toBe(true);

    const sum = await RemoteSession.run(options, async (session) => (await session.execute('1+2')).result);
    expect(sum).toBe('3');
  });

  describe('with an output pipe', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remote-exec-session-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('flushes the pipe before each command', async () => {
      const outputPipe = new JsonOutputPipe(path.join(tempDir, 'pipe.json'));
      await outputPipe.write('stale', 1);
      const { session } = makeSession([evaluating], { outputPipe });

      await session.open();
      await session.execute('1+2');

      expect(await outputPipe.readAll()).toEqual({});
      await session.close();
    });
  });
});
