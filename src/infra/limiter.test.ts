import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from './limiter.js';

function deferred<T = void>() {
    let resolve!: (value: T) => void;
    let reject!: (reason: unknown) => void;
    const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
    return { promise, resolve, reject };
}

describe('ConcurrencyLimiter', () => {
    it('rejects a non-positive limit', () => {
        expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
        expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
    });

    it('never runs more than the limit at once', async () => {
        const limiter = new ConcurrencyLimiter(2);
        const gates = [deferred(), deferred(), deferred()];
        const started: number[] = [];

        const runs = gates.map((gate, i) => limiter.run(async () => {
            started.push(i);
            await gate.promise;
            return i;
        }));

        await Promise.resolve();
        expect(started).toEqual([0, 1]);
        expect(limiter.running).toBe(2);
        expect(limiter.pending).toBe(1);

        gates[0].resolve();
        await runs[0];
        await Promise.resolve();
        expect(started).toEqual([0, 1, 2]);
        expect(limiter.running).toBe(2);

        gates[1].resolve();
        gates[2].resolve();
        expect(await Promise.all(runs)).toEqual([0, 1, 2]);
        expect(limiter.running).toBe(0);
        expect(limiter.pending).toBe(0);
    });

    it('releases the slot when a task throws', async () => {
        const limiter = new ConcurrencyLimiter(1);
        await expect(limiter.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        expect(limiter.running).toBe(0);
        await expect(limiter.run(async () => 'ok')).resolves.toBe('ok');
    });
});
