import { debug } from './log';

/**
 * Per-key mutual exclusion inside one process. Work on different keys runs
 * freely; work on the same key queues in arrival order.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key);
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous ? previous.then(() => current) : current;
        this.tails.set(key, tail);

        if (previous) {
            debug('lock.wait', { key });
            await previous;
        }
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) this.tails.delete(key);
        }
    }
}
