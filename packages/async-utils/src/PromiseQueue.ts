/**
 * Runs tasks one after the other, in the order they were added.
 * A failing task does not stop the tasks queued behind it.
 */
export class PromiseQueue<T> {
    private tail: Promise<unknown> = Promise.resolve();
    private queueSize = 0;

    getQueueSize(): number {
        return this.queueSize;
    }

    add(task: () => Promise<T>): Promise<T> {
        const previous = this.tail;
        this.queueSize++;
        const promise = (async () => {
            try {
                await previous.catch(() => undefined);
                return await task();
            } finally {
                this.queueSize--;
            }
        })();
        this.tail = promise;
        return promise;
    }
}
