import { SerialQueue } from '../src/common/serial-queue';

describe('SerialQueue', () => {
  it('should run tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const trace: string[] = [];

    const task = (name: string, ticks: number) => async () => {
      trace.push(`start ${name}`);
      for (let i = 0; i < ticks; i += 1) {
        await Promise.resolve();
      }
      trace.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.run(task('a', 3)),
      queue.run(task('b', 0)),
      queue.run(task('c', 1)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(trace).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('should continue after a rejected task', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => Promise.reject(new Error('boom')));
    const next = queue.run(() => Promise.resolve(42));

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('should count pending tasks', async () => {
    const queue = new SerialQueue();

    const first = queue.run(() => Promise.resolve(1));
    const second = queue.run(() => Promise.resolve(2));
    expect(queue.size).toBe(2);

    await Promise.all([first, second]);
    await new Promise((resolve) => setImmediate(resolve));
    expect(queue.size).toBe(0);
  });
});
