/**
 * Per-path mutual exclusion around an edit's read-modify-write cycle.
 */
export interface PathLock {
    withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

/** Default: no exclusion, concurrent edits race and the last rename wins. */
export class NoopPathLock implements PathLock {
    public withLock<T>(_key: string, fn: () => Promise<T>): Promise<T> {
        return fn();
    }
}

/**
 * In-process keyed mutex. Callers on the same key run one at a time in
 * arrival order; other keys are unaffected. Does not guard against other
 * processes.
 */
export class KeyedMutex implements PathLock {
    private readonly tails = new Map<string, Promise<void>>();

    public async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    public get heldKeys(): number {
        return this.tails.size;
    }
}

export function createPathLock(enabled: boolean): PathLock {
    return enabled ? new KeyedMutex() : new NoopPathLock();
}
