import { Semaphore } from '@booktrans/core';

interface Entry {
    lock: Semaphore;
    refs: number;
}

/**
 * One mutex per key, created on first use and dropped once nobody holds or
 * waits for it.
 */
export class KeyedMutex {
    private readonly entries = new Map<string, Entry>();

    async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
        const entry = this.entries.get(key) ?? { lock: new Semaphore(1), refs: 0 };
        entry.refs++;
        this.entries.set(key, entry);
        try {
            return await entry.lock.runExclusive(fn);
        } finally {
            entry.refs--;
            if (entry.refs === 0) {
                this.entries.delete(key);
            }
        }
    }

    get size(): number {
        return this.entries.size;
    }
}
