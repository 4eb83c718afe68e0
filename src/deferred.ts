/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * A promise together with the functions that settle it.
 */
export interface Deferred<T> {
    readonly promise: Promise<T>;
    readonly resolve: (value: T) => void;
    readonly reject: (reason?: unknown) => void;
}

// Deferred<T> RI/SRE:
//  - RI: `resolve`/`reject` settle exactly `promise`.
//  - SRE: deferreds are created by their owner and kept in private fields;
//    clients only ever see `promise`.

/**
 * @returns a fresh unsettled deferred
 */
export function makeDeferred<T>(): Deferred<T> {
    let resolve!: (value: T) => void;
    let reject!: (reason?: unknown) => void;
    const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
    return { promise, resolve, reject };
}
