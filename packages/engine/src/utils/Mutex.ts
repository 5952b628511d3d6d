/**
 * @fileoverview Async mutex
 *
 * Serializes asynchronous critical sections (load, mutate, save) that would
 * otherwise interleave at their await points. Waiters are served in FIFO order.
 *
 * @module @morphotax/engine/utils/Mutex
 */

export class Mutex {
    private locked = false;
    private waiters: Array<() => void> = [];

    /**
     * Acquire the mutex, waiting if it is currently held.
     */
    async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        return new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    /**
     * Release the mutex, handing it to the next waiter if any.
     */
    release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
        }
        else {
            this.locked = false;
        }
    }

    /**
     * Run a function while holding the mutex, releasing on completion or failure.
     */
    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        }
        finally {
            this.release();
        }
    }

    get isLocked(): boolean {
        return this.locked;
    }
}
