import { SerialQueue } from './serial-queue';

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = queue.run(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = queue.run(() => {
      events.push('second');
      return 2;
    });

    expect(queue.size).toBe(2);
    releaseFirst();

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a task fails', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'still running');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('still running');
  });

  it('drain resolves once queued tasks settle', async () => {
    const queue = new SerialQueue();
    const done: number[] = [];
    void queue.run(async () => {
      done.push(1);
    });
    void queue.run(async () => {
      done.push(2);
    });

    await queue.drain();

    expect(done).toEqual([1, 2]);
  });

  it('rejects new tasks after close but finishes queued ones', async () => {
    const queue = new SerialQueue();
    const queued = queue.run(async () => 'queued');

    queue.close();

    await expect(queued).resolves.toBe('queued');
    await expect(queue.run(() => 'late')).rejects.toThrow('Queue is closed');
  });
});
