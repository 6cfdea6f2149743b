import { describe, it, expect } from 'vitest';
import { Mutex } from '../src/utils/Mutex';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('Mutex', () => {
    it('runs tasks one at a time in call order', async () => {
        const mutex = new Mutex();
        const events: string[] = [];

        const slow = mutex.lock(async () => {
            events.push('slow:start');
            await tick();
            events.push('slow:end');
            return 'slow';
        });
        const fast = mutex.lock(() => {
            events.push('fast');
            return 'fast';
        });

        expect(await Promise.all([slow, fast])).toEqual(['slow', 'fast']);
        expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
    });

    it('keeps going after a task rejects', async () => {
        const mutex = new Mutex();

        const failing = mutex.lock(async () => {
            throw new Error('boom');
        });
        const next = mutex.lock(() => 42);

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe(42);
    });

    it('reports whether work is queued', async () => {
        const mutex = new Mutex();
        expect(mutex.isLocked).toBe(false);

        const pending = mutex.lock(() => tick());
        expect(mutex.isLocked).toBe(true);

        await pending;
        await tick();
        expect(mutex.isLocked).toBe(false);
    });
});
