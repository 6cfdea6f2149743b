/**
 * Exclusive async lock. Callers run strictly one at a time in the order
 * they called lock(); a rejected task does not poison the chain.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private pending: number = 0;

    public lock<T>(fn: () => Promise<T> | T): Promise<T> {
        this.pending++;
        const run = this.tail.then(fn);
        this.tail = run.then(
            () => { this.pending--; },
            () => { this.pending--; }
        );
        return run;
    }

    public get isLocked(): boolean {
        return this.pending > 0;
    }
}
