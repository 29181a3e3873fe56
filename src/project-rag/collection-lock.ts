/**
 * Collection Lock Manager
 *
 * Serialises knowledge base writes per collection. Waiters are served in
 * arrival order.
 */

// =============================================================================
// Types
// =============================================================================

export interface CollectionLock {
    collection: string;
    owner: string;
    acquiredAt: number;
    release: () => void;
}

interface Waiter {
    owner: string;
    resolve: () => void;
    reject: (err: Error) => void;
}

// =============================================================================
// Lock Manager
// =============================================================================

export class CollectionLockManager {
    private locks: Map<string, string> = new Map(); // collection -> owner
    private waiters: Map<string, Waiter[]> = new Map();

    /**
     * Acquire the write lock for a collection
     */
    async acquire(collection: string, owner: string, timeout: number = 60_000): Promise<CollectionLock> {
        if (!this.isLocked(collection)) {
            this.locks.set(collection, owner);
            return this.createLock(collection, owner);
        }

        return new Promise((resolve, reject) => {
            const timeoutId = setTimeout(() => {
                this.removeWaiter(collection, owner);
                reject(new Error(`Lock acquisition timeout for collection ${collection}`));
            }, timeout);

            const waiter: Waiter = {
                owner,
                resolve: () => {
                    clearTimeout(timeoutId);
                    this.locks.set(collection, owner);
                    resolve(this.createLock(collection, owner));
                },
                reject,
            };

            const queue = this.waiters.get(collection) ?? [];
            queue.push(waiter);
            this.waiters.set(collection, queue);
        });
    }

    /**
     * Run a task while holding the collection's lock
     */
    async runExclusive<T>(collection: string, owner: string, task: () => Promise<T>): Promise<T> {
        const lock = await this.acquire(collection, owner);
        try {
            return await task();
        } finally {
            lock.release();
        }
    }

    release(collection: string, owner: string): void {
        if (this.locks.get(collection) !== owner) {
            return;
        }

        this.locks.delete(collection);

        const queue = this.waiters.get(collection);
        const next = queue?.shift();
        if (queue && queue.length === 0) {
            this.waiters.delete(collection);
        }
        next?.resolve();
    }

    isLocked(collection: string): boolean {
        return this.locks.has(collection);
    }

    getHolder(collection: string): string | null {
        return this.locks.get(collection) ?? null;
    }

    getWaiters(collection: string): string[] {
        return (this.waiters.get(collection) ?? []).map(w => w.owner);
    }

    private createLock(collection: string, owner: string): CollectionLock {
        return {
            collection,
            owner,
            acquiredAt: Date.now(),
            release: () => this.release(collection, owner),
        };
    }

    private removeWaiter(collection: string, owner: string): void {
        const queue = this.waiters.get(collection);
        if (!queue) return;

        const index = queue.findIndex(w => w.owner === owner);
        if (index !== -1) {
            queue.splice(index, 1);
        }
        if (queue.length === 0) {
            this.waiters.delete(collection);
        }
    }
}
