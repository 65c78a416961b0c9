export type Listener<T> = (data: T) => void;
export type Unsubscribe = () => void;

export interface EventSource<T> {
    subscribe(listener: Listener<T>): Unsubscribe;
}

// Single-event stream; listeners run synchronously in subscription order.
export class EventStream<T = void> implements EventSource<T> {
    private listeners = new Set<Listener<T>>();

    subscribe(listener: Listener<T>): Unsubscribe {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    fire(data: T): void {
        for (const listener of [...this.listeners]) {
            listener(data);
        }
    }

    listenerCount(): number {
        return this.listeners.size;
    }
}

export class EventEmitter<M extends Record<string, unknown>> {
    private streams: { [K in keyof M]?: EventStream<M[K]> } = {};

    private stream<K extends keyof M>(event: K): EventStream<M[K]> {
        let stream = this.streams[event];
        if (!stream) {
            stream = new EventStream<M[K]>();
            this.streams[event] = stream;
        }
        return stream;
    }

    on<K extends keyof M>(event: K, listener: Listener<M[K]>): Unsubscribe {
        return this.stream(event).subscribe(listener);
    }

    emit<K extends keyof M>(event: K, data: M[K]): void {
        this.streams[event]?.fire(data);
    }

    source<K extends keyof M>(event: K): EventSource<M[K]> {
        return this.stream(event);
    }
}

// Subscribes for the first event only.
export function once<T>(source: EventSource<T>, listener: Listener<T>): Unsubscribe {
    let fired = false;
    const unsubscribe = source.subscribe(data => {
        if (fired) return;
        fired = true;
        unsubscribe();
        listener(data);
    });
    return unsubscribe;
}

// Owns teardown callbacks; destroying it ends every subscription it holds.
export class Lifetime {
    private disposers: (() => void)[] = [];
    private destroyed: boolean = false;

    add(dispose: () => void): void {
        if (this.destroyed) {
            dispose();
            return;
        }
        this.disposers.push(dispose);
    }

    isDestroyed(): boolean {
        return this.destroyed;
    }

    destroy(): void {
        if (this.destroyed) return;
        this.destroyed = true;
        const disposers = this.disposers;
        this.disposers = [];
        for (const dispose of disposers.reverse()) {
            dispose();
        }
    }
}
