/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';

/**
 * Periodic tick source for a game loop.
 *
 * Calls `onTick` every `intervalMs` milliseconds between start() and stop().
 * Ticks run on the event loop like any other callback, so they never
 * overlap with each other or with input handlers.
 */
export class ClockDriver {

    private timer: NodeJS.Timeout | undefined;
    private ticks = 0;

    // Abstraction function:
    //   AF(intervalMs, onTick, timer, ticks) = a clock that is running iff
    //     timer is set, and has delivered `ticks` ticks so far
    // Representation invariant:
    //   intervalMs is a positive finite number; ticks is a non-negative integer

    /**
     * @param intervalMs time between ticks, a positive number of milliseconds
     * @param onTick called on every tick; an exception it throws is logged and the clock keeps running
     */
    public constructor(
        public readonly intervalMs: number,
        private readonly onTick: () => void,
    ) {
        assert(Number.isFinite(intervalMs) && intervalMs > 0, `invalid tick interval ${intervalMs}`);
    }

    public get running(): boolean {
        return this.timer !== undefined;
    }

    /** number of ticks delivered so far */
    public get tickCount(): number {
        return this.ticks;
    }

    /**
     * Start ticking. Does nothing if the clock is already running.
     */
    public start(): void {
        if (this.timer !== undefined) {
            return;
        }
        this.timer = setInterval(() => this.deliver(), this.intervalMs);
    }

    /**
     * Stop ticking. Does nothing if the clock is not running.
     */
    public stop(): void {
        if (this.timer === undefined) {
            return;
        }
        clearInterval(this.timer);
        this.timer = undefined;
    }

    private deliver(): void {
        this.ticks += 1;
        try {
            this.onTick();
        } catch (err) {
            console.error('clock tick handler failed:', err);
        }
    }
}
