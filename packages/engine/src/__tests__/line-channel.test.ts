import { describe, it, expect } from 'vitest';

import { LineChannel } from '../process/line-channel.js';

describe('LineChannel', () => {
  it('should deliver buffered lines in FIFO order', async () => {
    const channel = new LineChannel();
    channel.push('bestmove e2e4');
    channel.push('bestmove d2d4');

    expect(channel.size).toBe(2);
    expect(await channel.receive()).toBe('bestmove e2e4');
    expect(await channel.receive()).toBe('bestmove d2d4');
  });

  it('should resolve a waiting receiver when a line arrives', async () => {
    const channel = new LineChannel();
    const pending = channel.receive();

    channel.push('bestmove c2c4');

    expect(await pending).toBe('bestmove c2c4');
    expect(channel.size).toBe(0);
  });

  it('should reject waiting receivers on close', async () => {
    const channel = new LineChannel();
    const reason = new Error('engine gone');
    const pending = channel.receive();

    channel.close(reason);

    await expect(pending).rejects.toBe(reason);
    expect(channel.isClosed).toBe(true);
  });

  it('should still deliver lines buffered before close', async () => {
    const channel = new LineChannel();
    channel.push('bestmove g1f3');
    channel.close(new Error('closed'));

    expect(await channel.receive()).toBe('bestmove g1f3');
    await expect(channel.receive()).rejects.toThrow('closed');
  });

  it('should keep the first close reason', async () => {
    const channel = new LineChannel();
    channel.close(new Error('first'));
    channel.close(new Error('second'));

    await expect(channel.receive()).rejects.toThrow('first');
  });

  it('should drop lines pushed after close', () => {
    const channel = new LineChannel();
    channel.close(new Error('closed'));

    expect(channel.push('bestmove e2e4')).toBe(false);
    expect(channel.size).toBe(0);
  });

  it('should drain buffered lines', () => {
    const channel = new LineChannel();
    channel.push('bestmove a2a3');
    channel.push('bestmove h2h3');

    expect(channel.drain()).toEqual(['bestmove a2a3', 'bestmove h2h3']);
    expect(channel.size).toBe(0);
  });
});
