/**
 * Tests for ChannelLock
 */

import { ChannelLock } from '../ChannelLock';

describe('ChannelLock', () => {
  let lock: ChannelLock;

  beforeEach(() => {
    lock = new ChannelLock(1000);
  });

  it('should acquire immediately when free', async () => {
    const lease = await lock.acquire('general', 'a');
    expect(lease.holder).toBe('a');
    expect(lock.isLocked('general')).toBe(true);

    lease.release();
    expect(lock.isLocked('general')).toBe(false);
  });

  it('should serve waiters in arrival order', async () => {
    const order: string[] = [];
    const first = await lock.acquire('general', 'a');

    const second = lock.acquire('general', 'b').then(lease => {
      order.push('b');
      lease.release();
    });
    const third = lock.acquire('general', 'c').then(lease => {
      order.push('c');
      lease.release();
    });

    expect(lock.pending('general')).toBe(2);
    order.push('a');
    first.release();
    await Promise.all([second, third]);

    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('should not block other channels', async () => {
    await lock.acquire('general', 'a');
    const other = await lock.acquire('random', 'b');
    expect(other.channelId).toBe('random');
  });

  it('should ignore release from a non-holder', async () => {
    await lock.acquire('general', 'a');
    lock.release('general', 'b');
    expect(lock.isLocked('general')).toBe(true);
  });

  it('should time out waiting callers', async () => {
    const short = new ChannelLock(20);
    await short.acquire('general', 'a');
    await expect(short.acquire('general', 'b')).rejects.toThrow('Lock acquisition timeout');
    expect(short.pending('general')).toBe(0);
  });

  it('should release after a failing task', async () => {
    await expect(lock.run('general', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(lock.isLocked('general')).toBe(false);
  });

  it('should serialize interleaved tasks on one channel', async () => {
    const events: string[] = [];
    const task = (name: string) => lock.run('general', async () => {
      events.push(`${name}:start`);
      await new Promise(resolve => setTimeout(resolve, 5));
      events.push(`${name}:end`);
    });

    await Promise.all([task('x'), task('y')]);
    expect(events).toEqual(['x:start', 'x:end', 'y:start', 'y:end']);
  });
});
