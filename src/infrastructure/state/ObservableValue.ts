export type Listener<T> = (value: T) => void;

/**
 * Read side of an ObservableValue. Readers may see a value that is about to be replaced.
 */
export interface ReadonlyObservable<T> {
    get(): T;
    subscribe(listener: Listener<T>): () => void;
    /** Resolves with the first value (current or future) matching `predicate`. */
    waitFor(predicate: (value: T) => boolean): Promise<T>;
}

/**
 * Single-writer, many-reader value. Only the owner keeps the ObservableValue itself;
 * everybody else gets `asReadonly()`.
 */
export class ObservableValue<T> implements ReadonlyObservable<T> {
    private value: T;
    private readonly listeners = new Set<Listener<T>>();

    constructor(initial: T) {
        this.value = initial;
    }

    get(): T {
        return this.value;
    }

    set(value: T): void {
        this.value = value;
        for (const listener of [...this.listeners]) {
            try {
                listener(value);
            } catch (error) {
                console.error('[State] Listener threw:', error);
            }
        }
    }

    update(fn: (current: T) => T): void {
        this.set(fn(this.value));
    }

    subscribe(listener: Listener<T>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    waitFor(predicate: (value: T) => boolean): Promise<T> {
        if (predicate(this.value)) {
            return Promise.resolve(this.value);
        }
        return new Promise<T>((resolve) => {
            const unsubscribe = this.subscribe((value) => {
                if (predicate(value)) {
                    unsubscribe();
                    resolve(value);
                }
            });
        });
    }

    asReadonly(): ReadonlyObservable<T> {
        return {
            get: () => this.get(),
            subscribe: (listener) => this.subscribe(listener),
            waitFor: (predicate) => this.waitFor(predicate),
        };
    }
}
