import {PromiseQueue} from "./PromiseQueue.js";

/**
 * One PromiseQueue per key: tasks sharing a key run one at a time,
 * tasks with different keys run concurrently.
 */
export class KeyedQueue {
    private readonly queues = new Map<string, PromiseQueue<void>>();

    public run<T>(key: string, task: () => Promise<T>): Promise<T> {
        let queue = this.queues.get(key);
        if (!queue) {
            queue = new PromiseQueue<void>();
            this.queues.set(key, queue);
        }
        const owner = queue;
        return new Promise<T>((resolve, reject) => {
            const promise = owner.add(() => task().then(resolve, reject));
            const release = () => {
                if (owner.getQueueSize() === 0 && this.queues.get(key) === owner) {
                    this.queues.delete(key);
                }
            };
            promise.then(release, release);
        });
    }

    /** Number of keys with queued or running work */
    public activeKeys(): number {
        return this.queues.size;
    }

    public getQueueSize(): number {
        let ret = 0;
        for (const queue of this.queues.values()) {
            ret += queue.getQueueSize();
        }
        return ret;
    }
}
