import {describe, expect, it} from 'vitest';
import {KeyedQueue, ListenerCleaner, PromiseQueue} from "../index.js";

function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return {promise, resolve};
}

describe('PromiseQueue', () => {
    it('runs tasks in insertion order', async () => {
        const queue = new PromiseQueue<number>();
        const order: number[] = [];
        const gate = deferred();
        const first = queue.add(async () => {
            await gate.promise;
            order.push(1);
            return 1;
        });
        const second = queue.add(async () => {
            order.push(2);
            return 2;
        });
        expect(queue.getQueueSize()).toBe(2);
        gate.resolve();
        expect(await first).toBe(1);
        expect(await second).toBe(2);
        expect(order).toEqual([1, 2]);
        expect(queue.getQueueSize()).toBe(0);
    });

    it('keeps going after a failing task', async () => {
        const queue = new PromiseQueue<string>();
        const failing = queue.add(async () => {
            throw new Error('boom');
        });
        const next = queue.add(async () => 'ok');
        await expect(failing).rejects.toThrow('boom');
        expect(await next).toBe('ok');
    });
});

describe('KeyedQueue', () => {
    it('serializes tasks sharing a key', async () => {
        const queue = new KeyedQueue();
        const events: string[] = [];
        const gate = deferred();
        const a1 = queue.run('a', async () => {
            events.push('a1:start');
            await gate.promise;
            events.push('a1:end');
        });
        const a2 = queue.run('a', async () => {
            events.push('a2');
        });
        const b1 = queue.run('b', async () => {
            events.push('b1');
        });
        await b1;
        expect(events).toEqual(['a1:start', 'b1']);
        gate.resolve();
        await Promise.all([a1, a2]);
        expect(events).toEqual(['a1:start', 'b1', 'a1:end', 'a2']);
    });

    it('forgets keys once their queue drains', async () => {
        const queue = new KeyedQueue();
        const result = await queue.run('session-1', async () => 42);
        expect(result).toBe(42);
        await new Promise((resolve) => setTimeout(resolve, 0));
        expect(queue.activeKeys()).toBe(0);
        expect(queue.getQueueSize()).toBe(0);
    });
});

describe('ListenerCleaner', () => {
    it('runs every cleaner in reverse order and rethrows the first error', async () => {
        const cleaner = new ListenerCleaner();
        const calls: string[] = [];
        cleaner.add(() => {
            calls.push('first');
        });
        cleaner.add(() => {
            calls.push('second');
            throw new Error('second failed');
        });
        cleaner.add(async () => {
            calls.push('third');
        });
        await expect(cleaner.cleanUp()).rejects.toThrow('second failed');
        expect(calls).toEqual(['third', 'second', 'first']);
        await cleaner.cleanUp();
        expect(calls).toHaveLength(3);
    });
});
