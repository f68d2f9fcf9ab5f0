import { Mutex } from './mutex';

describe('Mutex', () => {
  it('should run tasks one at a time in call order', async () => {
    const mutex = new Mutex();
    const trace: string[] = [];
    const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

    await Promise.all([
      mutex.runExclusive(async () => {
        trace.push('a:start');
        await delay(20);
        trace.push('a:end');
      }),
      mutex.runExclusive(async () => {
        trace.push('b:start');
        trace.push('b:end');
      }),
    ]);

    expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should release the lock when a task throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive(async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked).toBe(false);
  });
});

describe('Mutex.acquire', () => {
  it('should hold the lock until released', async () => {
    const mutex = new Mutex();
    const trace: string[] = [];

    const release = await mutex.acquire();
    const waiting = mutex.runExclusive(async () => {
      trace.push('second');
    });
    await Promise.resolve();
    trace.push('first');
    release();
    release();
    await waiting;

    expect(trace).toEqual(['first', 'second']);
    expect(mutex.isLocked).toBe(false);
  });
});
