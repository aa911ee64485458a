import { describe, it, expect } from 'vitest';
import { ChunkInbox } from './inbox.js';

describe('ChunkInbox', () => {
  it('hands out queued chunks in order', async () => {
    const inbox = new ChunkInbox();
    inbox.push(Buffer.from('a'));
    inbox.push(Buffer.from('b'));

    expect((await inbox.receive(10))?.toString()).toBe('a');
    expect((await inbox.receive(10))?.toString()).toBe('b');
  });

  it('wakes a waiting receive', async () => {
    const inbox = new ChunkInbox();
    const pending = inbox.receive(1000);
    inbox.push(Buffer.from('late'));
    expect((await pending)?.toString()).toBe('late');
  });

  it('returns null when nothing arrives in time', async () => {
    const inbox = new ChunkInbox();
    expect(await inbox.receive(10)).toBeNull();
    expect(await inbox.receive(0)).toBeNull();
  });

  it('releases a waiting receive on close', async () => {
    const inbox = new ChunkInbox();
    const pending = inbox.receive(1000);
    inbox.close();
    expect(await pending).toBeNull();
    expect(inbox.closed).toBe(true);
  });

  it('still hands out chunks queued before close', async () => {
    const inbox = new ChunkInbox();
    inbox.push(Buffer.from('last'));
    inbox.close();
    inbox.push(Buffer.from('ignored'));

    expect((await inbox.receive(10))?.toString()).toBe('last');
    expect(await inbox.receive(10)).toBeNull();
  });

  it('rejects a second concurrent receive', async () => {
    const inbox = new ChunkInbox();
    const first = inbox.receive(20);
    await expect(inbox.receive(20)).rejects.toThrow('A receive is already waiting on this inbox');
    expect(await first).toBeNull();
  });

  it('drains queued chunks', () => {
    const inbox = new ChunkInbox();
    inbox.push(Buffer.from('x'));
    inbox.push(Buffer.from('y'));
    expect(inbox.drain()).toBe(2);
    expect(inbox.size).toBe(0);
  });

  it('drops the oldest chunks beyond its limit', async () => {
    const inbox = new ChunkInbox(2);
    for (const text of ['a', 'b', 'c', 'd']) inbox.push(Buffer.from(text));

    expect(inbox.size).toBe(2);
    expect(inbox.dropped).toBe(2);
    expect((await inbox.receive(10))?.toString()).toBe('c');
    expect((await inbox.receive(10))?.toString()).toBe('d');
  });
});
