/**
 * Tests for AsyncChannel and Sequencer
 */

import { describe, it, expect } from 'vitest';
import { AsyncChannel, Sequencer } from '../channel';

interface Message {
  n: number;
}

describe('AsyncChannel', () => {
  it('should hand buffered values out in push order', async () => {
    const channel = new AsyncChannel<Message>();
    channel.push({ n: 1 });
    channel.push({ n: 2 });

    await expect(channel.next()).resolves.toEqual({ n: 1 });
    expect(channel.drain()).toEqual([{ n: 2 }]);
    expect(channel.size).toBe(0);
  });

  it('should wake a waiting consumer', async () => {
    const channel = new AsyncChannel<Message>();
    const pending = channel.next();

    channel.push({ n: 7 });

    await expect(pending).resolves.toEqual({ n: 7 });
    expect(channel.size).toBe(0);
  });

  it('should resolve waiters with null when closed', async () => {
    const channel = new AsyncChannel<Message>();
    const pending = channel.next();

    channel.close();

    await expect(pending).resolves.toBeNull();
    expect(channel.isClosed).toBe(true);
  });

  it('should refuse pushes after close but keep what was buffered', async () => {
    const channel = new AsyncChannel<Message>();
    channel.push({ n: 1 });
    channel.close();

    expect(channel.push({ n: 2 })).toBe(false);
    await expect(channel.next()).resolves.toEqual({ n: 1 });
    await expect(channel.next()).resolves.toBeNull();
  });
});

describe('Sequencer', () => {
  it('should issue increasing numbers', () => {
    const sequencer = new Sequencer();
    expect(sequencer.current).toBe(0);
    expect([sequencer.next(), sequencer.next(), sequencer.next()]).toEqual([1, 2, 3]);
    expect(sequencer.current).toBe(3);
  });
});
