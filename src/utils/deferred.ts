/**
 * One-shot signalling primitives used between callers and the stack runner
 */

/**
 * Single-assignment future: exactly one write, any number of awaits.
 * Reading before the write suspends until it happens.
 */
export class ResultSlot<T> {
    private readonly promise: Promise<T>;
    private resolveFn:        ((value: T) => void) | undefined;
    private written = false;

    constructor() {
        this.promise = new Promise<T>((resolve) => {
            this.resolveFn = resolve;
        });
    }

    get isSet(): boolean {
        return this.written;
    }

    /**
     * @throws Error if the slot was already written
     */
    set(value: T): void {
        if(this.written) {
            throw new Error('Result slot already written');
        }
        this.written = true;
        this.resolveFn?.(value);
    }

    read(): Promise<T> {
        return this.promise;
    }
}

/**
 * Latch that opens once and stays open; waiting on an open latch returns at once
 */
export class Signal {
    private readonly slot = new ResultSlot<void>();

    get isSet(): boolean {
        return this.slot.isSet;
    }

    /** Opening an already open signal is a no-op */
    set(): void {
        if(!this.slot.isSet) {
            this.slot.set();
        }
    }

    wait(): Promise<void> {
        return this.slot.read();
    }
}

/**
 * Unbounded FIFO queue with an awaitable take()
 */
export class AsyncQueue<T> {
    private readonly items: T[] = [];
    private readonly takers: ((item: T) => void)[] = [];

    get size(): number {
        return this.items.length;
    }

    push(item: T): void {
        const taker = this.takers.shift();
        if(taker) {
            taker(item);
        } else {
            this.items.push(item);
        }
    }

    take(): Promise<T> {
        if(this.items.length > 0) {
            const [item] = this.items.splice(0, 1);
            return Promise.resolve(item);
        }
        return new Promise<T>((resolve) => {
            this.takers.push(resolve);
        });
    }

    /** Remove and return everything still queued */
    drain(): T[] {
        return this.items.splice(0, this.items.length);
    }
}
