import { describe, expect, it } from 'vitest';
import { SessionStore } from './session-store';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SessionStore', () => {
  describe('history', () => {
    it('should keep turns per thread in order', () => {
      const store = new SessionStore();
      store.append('1', { role: 'user', content: 'Hi' });
      store.append('2', { role: 'user', content: 'Other thread' });
      store.append('1', { role: 'assistant', content: 'Hello' });

      expect(store.history('1')).toEqual([
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
      ]);
      expect(store.history('2')).toEqual([{ role: 'user', content: 'Other thread' }]);
    });

    it('should hand out copies', () => {
      const store = new SessionStore();
      store.append('1', { role: 'user', content: 'Hi' });

      const history = store.history('1');
      history[0].content = 'changed';
      history.push({ role: 'assistant', content: 'extra' });

      expect(store.history('1')).toEqual([{ role: 'user', content: 'Hi' }]);
    });

    it('should forget a cleared thread only', () => {
      const store = new SessionStore();
      store.append('1', { role: 'user', content: 'Hi' });
      store.append('2', { role: 'user', content: 'Hey' });

      store.clear('1');

      expect(store.history('1')).toEqual([]);
      expect(store.history('2')).toHaveLength(1);
    });
  });

  describe('runExclusive', () => {
    it('should run tasks on one thread one at a time', async () => {
      const store = new SessionStore();
      const gate = deferred();
      const events: string[] = [];

      const first = store.runExclusive('1', async () => {
        events.push('first:start');
        await gate.promise;
        events.push('first:end');
        return 'first';
      });
      const second = store.runExclusive('1', async () => {
        events.push('second:start');
        return 'second';
      });

      await Promise.resolve();
      await Promise.resolve();
      expect(events).toEqual(['first:start']);

      gate.resolve();
      expect(await Promise.all([first, second])).toEqual(['first', 'second']);
      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('should not hold other threads back', async () => {
      const store = new SessionStore();
      const gate = deferred();

      const slow = store.runExclusive('1', async () => {
        await gate.promise;
        return 'slow';
      });
      const fast = await store.runExclusive('2', async () => 'fast');

      expect(fast).toBe('fast');
      gate.resolve();
      expect(await slow).toBe('slow');
    });

    it('should release the thread after a failing task', async () => {
      const store = new SessionStore();

      const failing = store.runExclusive('1', async () => {
        throw new Error('boom');
      });
      const next = store.runExclusive('1', async () => 'next');

      await expect(failing).rejects.toThrow('boom');
      expect(await next).toBe('next');
    });
  });
});
