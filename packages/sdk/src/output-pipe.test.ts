import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_PIPE_FILE_NAME, JSON_PIPE_ENV, JsonOutputPipe, defaultPipePath } from './output-pipe.js';

describe('JsonOutputPipe', () => {
  let tempDir: string;
  let pipePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remote-exec-pipe-'));
    pipePath = path.join(tempDir, 'nested', 'pipe.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    delete process.env[JSON_PIPE_ENV];
  });

  it('writes and reads entries', async () => {
    const pipe = new JsonOutputPipe(pipePath);
    await pipe.write('assets', ['/Game/A', '/Game/B']);
    await pipe.write('count', 2);

    expect(await pipe.read('assets')).toEqual(['/Game/A', '/Game/B']);
    expect(JSON.parse(fs.readFileSync(pipePath, 'utf-8'))).toEqual({ assets: ['/Game/A', '/Game/B'], count: 2 });
  });

  it('returns the default for missing keys', async () => {
    const pipe = new JsonOutputPipe(pipePath);
    expect(await pipe.read('missing', 'fallback')).toBe('fallback');
    expect(await pipe.read('missing')).toBeUndefined();
  });

  it('stores values JSON cannot hold as strings', async () => {
    const pipe = new JsonOutputPipe(pipePath);
    await pipe.write('when', new Date(0));
    await pipe.write('big', 10n);

    expect(await pipe.read('when')).toBe(String(new Date(0)));
    expect(await pipe.read('big')).toBe('10');
  });

  it('flushes to an empty document', async () => {
    const pipe = new JsonOutputPipe(pipePath);
    await pipe.write('x', 1);
    await pipe.flush();

    expect(await pipe.readAll()).toEqual({});
  });

  it('reads a corrupt file as empty', async () => {
    fs.mkdirSync(path.dirname(pipePath), { recursive: true });
    fs.writeFileSync(pipePath, '{"x": ');
    expect(await new JsonOutputPipe(pipePath).readAll()).toEqual({});

    fs.writeFileSync(pipePath, '[1, 2]');
    expect(await new JsonOutputPipe(pipePath).readAll()).toEqual({});
  });

  it('takes its path from the environment, then the temp dir', () => {
    expect(defaultPipePath()).toBe(path.join(os.tmpdir(), DEFAULT_PIPE_FILE_NAME));

    process.env[JSON_PIPE_ENV] = pipePath;
    expect(new JsonOutputPipe().path).toBe(pipePath);
  });
});
