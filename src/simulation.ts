/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { ClockDriver } from './clock.js';
import type { Game } from './game.js';

export interface SimulationOptions {
    /** delay range between clicks (ms) */
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
    /** give up after this many clicks */
    readonly maxClicks: number;
    /** print one line per click */
    readonly verbose?: boolean;
    /** uniform numbers in [0,1) for choosing tiles and delays; Math.random by default */
    readonly random?: () => number;
}

export interface SimulationResult {
    readonly clicks: number;
    readonly accepted: number;
    readonly matches: number;
    readonly rollbacks: number;
    readonly elapsedMs: number;
    readonly finished: boolean;
}

/**
 * Play a game with a random player until it is over.
 *
 * The game is ticked by its own clock at game.config.tickIntervalMs while the
 * player repeatedly waits a random delay and then clicks a random face-down
 * tile. Clicks that arrive while a pair is still showing are ignored by the
 * game, just as for a human player.
 *
 * @param game game to play; should be freshly created
 * @param options player pacing and limits
 * @returns statistics of the run; the clock is stopped when this settles
 */
export async function simulate(game: Game, options: SimulationOptions): Promise<SimulationResult> {
    const random = options.random ?? Math.random;
    let matches = 0;
    let rollbacks = 0;
    const clock = new ClockDriver(game.config.tickIntervalMs, () => {
        const phase = game.phase;
        if (game.tick()) {
            if (phase === 'pair-matched') matches++;
            if (phase === 'pair-mismatched') rollbacks++;
        }
    });

    const start = Date.now();
    let clicks = 0;
    let accepted = 0;
    clock.start();
    try {
        while (!game.isGameOver() && clicks < options.maxClicks) {
            await timeout(randomDelay(options.minDelayMs, options.maxDelayMs, random));
            const hidden = hiddenPositions(game);
            const target = hidden[Math.floor(random() * hidden.length)];
            if (target === undefined) {
                break;
            }
            const [ row, column ] = target;
            const hiddenBefore = game.status().hiddenCount;
            game.click(row, column);
            clicks++;
            const wasAccepted = game.status().hiddenCount !== hiddenBefore;
            if (wasAccepted) accepted++;
            if (options.verbose) {
                console.log(`click=(${row},${column}) ${wasAccepted ? 'accepted' : 'ignored'} phase=${game.phase}`);
            }
        }
    } finally {
        clock.stop();
    }
    // a final matched pair is released by a tick that never came
    if (game.phase === 'pair-matched') matches++;

    const result: SimulationResult = {
        clicks, accepted, matches, rollbacks,
        elapsedMs: Date.now() - start,
        finished: game.isGameOver(),
    };
    console.log(`simulation ${result.finished ? 'finished' : 'gave up'}: clicks=${clicks} accepted=${accepted} matches=${matches} rollbacks=${rollbacks} elapsed=${result.elapsedMs}ms`);
    return result;
}

function hiddenPositions(game: Game): Array<[number, number]> {
    const positions: Array<[number, number]> = [];
    game.board.views().forEach((row, r) => row.forEach((tile, c) => {
        if (!tile.revealed) positions.push([r, c]);
    }));
    return positions;
}

/**
 * Return a random floating-point delay between min (inclusive) and max (inclusive).
 *
 * @param min lower bound (inclusive). Precondition: min is a finite number and min <= max.
 * @param max upper bound (inclusive). Precondition: max is a finite number and max >= min.
 * @param random source of uniform numbers in [0,1)
 * @returns a number x such that min <= x <= max. Distribution is uniform on [min,max).
 */
function randomDelay(min: number, max: number, random: () => number): number {
    return min + random() * (max - min);
}

/**
 * @param milliseconds duration to wait
 * @returns a promise that fulfills no less than `milliseconds` after timeout() was called
 */
async function timeout(milliseconds: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, milliseconds));
}
