import { describe, it, expect } from 'vitest';
import { KeyedSerializer } from '../src/serial.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('KeyedSerializer', () => {
  it('runs tasks for the same key one after another', async () => {
    const serializer = new KeyedSerializer();
    const order: string[] = [];
    const gate = deferred();

    const first = serializer.run('u1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = serializer.run('u1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const serializer = new KeyedSerializer();
    const gate = deferred();
    const blocked = serializer.run('u1', () => gate.promise);
    await expect(serializer.run('u2', async () => 'done')).resolves.toBe('done');
    gate.resolve();
    await blocked;
  });

  it('a failed task rejects its caller but not the next task', async () => {
    const serializer = new KeyedSerializer();
    const failed = serializer.run('u1', async () => {
      throw new Error('boom');
    });
    const next = serializer.run('u1', async () => 42);
    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('forgets keys once their queue drains', async () => {
    const serializer = new KeyedSerializer();
    await serializer.run('u1', async () => undefined);
    await new Promise((r) => setTimeout(r, 0));
    expect(serializer.pending).toBe(0);
  });
});
