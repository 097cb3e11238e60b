import { SerialLock } from '../src/infra/concurrency/serial-lock';

describe('SerialLock', () => {
  it('runs tasks one at a time in call order', async () => {
    const lock = new SerialLock();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await new Promise((r) => setTimeout(r, 5));
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([lock.runExclusive(task('a')), lock.runExclusive(task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('rejects only the failing caller and keeps the chain going', async () => {
    const lock = new SerialLock();
    const failing = lock.runExclusive(() => {
      throw new Error('boom');
    });
    const next = lock.runExclusive(() => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });
});
