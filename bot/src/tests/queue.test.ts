import { describe, expect, it } from 'vitest';
import { CandidateQueue } from '../core/candidateQueue';
import { QueueClosedError } from '../core/errors';
import { flush } from './fakes';

describe('CandidateQueue', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new CandidateQueue<number>(0)).toThrow(RangeError);
  });

  it('holds at most its capacity and blocks the next producer', async () => {
    const queue = new CandidateQueue<number>(500);
    for (let i = 0; i < 500; i++) await queue.put(i);

    let admitted = false;
    const blocked = queue.put(500).then(() => {
      admitted = true;
    });
    await flush();

    expect(queue.size).toBe(500);
    expect(queue.blockedProducers).toBe(1);
    expect(admitted).toBe(false);

    expect(await queue.take()).toBe(0);
    await blocked;
    expect(admitted).toBe(true);
    expect(queue.size).toBe(500);
  });

  it('delivers in FIFO order, including items that waited for room', async () => {
    const queue = new CandidateQueue<string>(2);
    await queue.put('a');
    await queue.put('b');
    const waiting = queue.put('c');

    const taken = [await queue.take(), await queue.take(), await queue.take()];
    await waiting;

    expect(taken).toEqual(['a', 'b', 'c']);
  });

  it('hands an item straight to a waiting consumer', async () => {
    const queue = new CandidateQueue<string>(1);
    const pending = queue.take();
    await queue.put('x');

    expect(await pending).toBe('x');
    expect(queue.size).toBe(0);
  });

  it('drains remaining items after close, then yields undefined', async () => {
    const queue = new CandidateQueue<number>(3);
    await queue.put(1);
    await queue.put(2);
    queue.close();

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBe(2);
    expect(await queue.take()).toBeUndefined();
  });

  it('rejects producers after close, including ones already blocked', async () => {
    const queue = new CandidateQueue<number>(1);
    await queue.put(1);
    const blocked = queue.put(2);

    queue.close();

    await expect(blocked).rejects.toBeInstanceOf(QueueClosedError);
    await expect(queue.put(3)).rejects.toBeInstanceOf(QueueClosedError);
    expect(await queue.take()).toBe(1);
  });

  it('wakes a waiting consumer on close', async () => {
    const queue = new CandidateQueue<number>(1);
    const pending = queue.take();
    queue.close();

    expect(await pending).toBeUndefined();
  });
});
