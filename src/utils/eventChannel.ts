/**
 * Unbounded FIFO channel with a single async consumer.
 *
 * Producers push synchronously from socket handlers or engine callbacks; the
 * consumer awaits `next()`, which resolves `undefined` once the channel is
 * closed and empty.
 */
export class EventChannel<T> {
    private buffer: T[] = [];
    private waiter: ((value: T | undefined) => void) | null = null;
    private closed = false;
    private admit: ((item: T) => boolean) | null = null;

    push(item: T): boolean {
        if (this.closed) return false;
        if (this.admit && !this.admit(item)) return false;
        if (this.waiter) {
            const wake = this.waiter;
            this.waiter = null;
            wake(item);
            return true;
        }
        this.buffer.push(item);
        return true;
    }

    next(): Promise<T | undefined> {
        if (this.buffer.length > 0) {
            return Promise.resolve(this.buffer.shift());
        }
        if (this.admit) this.close();
        if (this.closed) return Promise.resolve(undefined);
        if (this.waiter) {
            return Promise.reject(new Error('EventChannel supports a single consumer'));
        }
        return new Promise<T | undefined>((resolve) => {
            this.waiter = resolve;
        });
    }

    /**
     * Stop accepting items. Buffered items are still delivered.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.waiter && this.buffer.length === 0) {
            const wake = this.waiter;
            this.waiter = null;
            wake(undefined);
        }
    }

    /**
     * Drain mode: from now on only items `admit` accepts get in, and the
     * channel closes as soon as the buffer runs empty.
     */
    seal(admit: (item: T) => boolean): void {
        if (this.closed) return;
        this.admit = admit;
        if (this.buffer.length === 0) this.close();
    }

    /** Drop everything buffered; returns how many items were discarded. */
    clear(): number {
        const dropped = this.buffer.length;
        this.buffer = [];
        return dropped;
    }

    get size(): number {
        return this.buffer.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }
}
