/**
 * Ordered, unbounded hand-off from producers to the engine worker.
 *
 * Producers call `push()` and never wait.  The single consumer pulls with
 * `next(timeoutMs)`, which resolves with the next command or with
 * `undefined` once the wait elapses, so the consumer regularly gets a
 * chance to notice cancellation.
 *
 * Commands come out in exactly the order they went in.  Nothing is
 * merged or dropped while the channel is open.
 */

import { log } from "../utils/log";

interface Waiter<T> {
    resolve: (item: T | undefined) => void;
    timer: ReturnType<typeof setTimeout> | null;
}

export class CommandChannel<T> {
    private items: T[] = [];
    private waiters: Waiter<T>[] = [];
    private _closed = false;

    get closed() {
        return this._closed;
    }

    /** Number of commands waiting to be pulled. */
    get size() {
        return this.items.length;
    }

    /** Enqueue a command. Returns false (and drops it) once closed. */
    push(item: T): boolean {
        if (this._closed) {
            log.warn("[Engine] Command channel closed, dropping command");
            return false;
        }

        const waiter = this.waiters.shift();
        if (waiter) {
            if (waiter.timer !== null) clearTimeout(waiter.timer);
            waiter.resolve(item);
            return true;
        }

        this.items.push(item);
        return true;
    }

    /**
     * Resolve with the next command, or `undefined` after `timeoutMs`
     * (or immediately when the channel is closed and empty).
     */
    next(timeoutMs: number): Promise<T | undefined> {
        if (this.items.length > 0) {
            return Promise.resolve(this.items.shift());
        }
        if (this._closed) return Promise.resolve(undefined);

        return new Promise((resolve) => {
            const waiter: Waiter<T> = { resolve, timer: null };
            waiter.timer = setTimeout(() => {
                this.waiters = this.waiters.filter((w) => w !== waiter);
                resolve(undefined);
            }, timeoutMs);
            this.waiters.push(waiter);
        });
    }

    /** Stop accepting commands and wake every waiting consumer. */
    close() {
        this._closed = true;
        for (const waiter of this.waiters) {
            if (waiter.timer !== null) clearTimeout(waiter.timer);
            waiter.resolve(undefined);
        }
        this.waiters = [];
    }

    /** Remove and return everything still queued. */
    drain(): T[] {
        const items = this.items;
        this.items = [];
        return items;
    }
}
