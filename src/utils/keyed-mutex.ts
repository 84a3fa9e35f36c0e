/**
 * Serializes async work per key. Work queued under one key never waits on another key.
 *
 * Each key keeps the tail of a promise chain; a new job runs once the previous
 * job for the same key has settled, whatever its outcome.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(fn);
        const tail = result.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);

        void tail.then(() => {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        });

        return result;
    }

    /**
     * Number of keys with work in flight
     */
    get activeKeys(): number {
        return this.tails.size;
    }
}
