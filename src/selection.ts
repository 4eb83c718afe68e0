/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import type { Board } from './board.js';
import { type Tile, type TileView, identityEquals } from './tile.js';

/**
 * Where the current turn stands.
 *
 * - `idle`: nothing selected
 * - `one-selected`: first tile of the turn revealed
 * - `pair-matched`: two equal tiles revealed, waiting for the next tick to free the turn
 * - `pair-mismatched`: two different tiles revealed, waiting for the rollback deadline
 */
export type SelectionPhase = 'idle' | 'one-selected' | 'pair-matched' | 'pair-mismatched';

/**
 * A click already resolved against the board grid.
 * When `onBoard` is false, `row` and `column` carry no meaning.
 */
export interface ResolvedClick {
    readonly onBoard: boolean;
    readonly row: number;
    readonly column: number;
}

/** A click that missed the board. */
export const OFF_BOARD: ResolvedClick = Object.freeze({ onBoard: false, row: -1, column: -1 });

/**
 * @returns a click on (row, column)
 */
export function cell(row: number, column: number): ResolvedClick {
    return { onBoard: true, row, column };
}

export interface SelectionOptions {
    /** how long a mismatched pair stays visible, in milliseconds */
    readonly rollbackDelayMs: number;
    /** current time in milliseconds; Date.now by default */
    readonly now?: () => number;
}

/**
 * Turn/selection state machine of a single game.
 *
 * Reacts to two kinds of events, clicks and clock ticks, both delivered
 * synchronously one at a time by the host loop. Every event whose guard
 * fails is absorbed as a no-op; no handler ever throws for bad player input
 * or blocks waiting for time to pass.
 *
 * A mismatched pair is rolled back by the first tick at or after its
 * deadline, `rollbackDelayMs` after the second tile was revealed.
 */
export class SelectionMachine {

    private pendingFirst: Tile | undefined;
    private pendingSecond: Tile | undefined;
    private needsRollback = false;
    private revealDeadline: number | undefined;
    private hiddenCount: number;

    private readonly rollbackDelayMs: number;
    private readonly now: () => number;

    // Abstraction function:
    //   AF(board, pendingFirst, pendingSecond, needsRollback, revealDeadline, hiddenCount)
    //     = the turn in progress on `board`: phase idle if nothing is pending,
    //       one-selected if only pendingFirst is, pair-matched or
    //       pair-mismatched (per needsRollback) if both are; a mismatched pair
    //       is hidden again once the clock reaches revealDeadline
    // Representation invariant:
    //   - pendingSecond !== undefined implies pendingFirst !== undefined
    //   - pendingFirst, pendingSecond are distinct tiles of board and revealed
    //   - needsRollback iff both pending and their identities differ
    //   - revealDeadline !== undefined iff needsRollback
    //   - hiddenCount === number of hidden tiles of board
    // Safety from rep exposure:
    //   - all fields are private; pending tiles are exposed only as fresh
    //     TileView records

    /**
     * @param board board to play on; the machine takes over all reveal/hide mutation of its tiles
     * @param options rollback delay and clock
     */
    public constructor(
        public readonly board: Board,
        options: SelectionOptions,
    ) {
        assert(Number.isFinite(options.rollbackDelayMs) && options.rollbackDelayMs >= 0,
            `invalid rollback delay ${options.rollbackDelayMs}`);
        this.rollbackDelayMs = options.rollbackDelayMs;
        this.now = options.now ?? Date.now;
        this.hiddenCount = board.hiddenTiles();
        this.checkRep();
    }

    private checkRep(): void {
        const first = this.pendingFirst;
        const second = this.pendingSecond;
        if (second !== undefined) {
            assert(first !== undefined);
            assert(first !== second);
            assert(second.revealed);
            assert.strictEqual(this.needsRollback, !identityEquals(first.identity, second.identity));
        } else {
            assert(!this.needsRollback);
        }
        if (first !== undefined) {
            assert(first.revealed);
        }
        assert.strictEqual(this.revealDeadline !== undefined, this.needsRollback);
        assert(Number.isInteger(this.hiddenCount) && this.hiddenCount >= 0);
        assert.strictEqual(this.hiddenCount, this.board.hiddenTiles());
    }

    public get phase(): SelectionPhase {
        if (this.pendingFirst === undefined) {
            return 'idle';
        }
        if (this.pendingSecond === undefined) {
            return 'one-selected';
        }
        return this.needsRollback ? 'pair-mismatched' : 'pair-matched';
    }

    /** number of tiles currently face down */
    public get hidden(): number {
        return this.hiddenCount;
    }

    /** first tile of the current turn, if any */
    public get first(): TileView | undefined {
        return view(this.pendingFirst);
    }

    /** second tile of the current turn, if any */
    public get second(): TileView | undefined {
        return view(this.pendingSecond);
    }

    /** true iff the pending pair is a mismatch waiting to be hidden again */
    public get rollbackPending(): boolean {
        return this.needsRollback;
    }

    /** time at which a pending mismatch will be rolled back, if one is pending */
    public get deadline(): number | undefined {
        return this.revealDeadline;
    }

    /**
     * Handle a click.
     *
     * Accepted only in phases idle and one-selected, on the board, on a hidden
     * tile; every other click is ignored. An accepted click reveals the tile.
     *
     * @param target resolved click; if `onBoard`, requires the position to be on the board
     * @returns true iff the click changed the state
     */
    public click(target: ResolvedClick): boolean {
        if (!target.onBoard) {
            return false;
        }
        const phase = this.phase;
        if (phase !== 'idle' && phase !== 'one-selected') {
            return false;
        }
        const tile = this.board.tileAt(target.row, target.column);
        if (tile.revealed) {
            return false;
        }

        tile.reveal();
        this.hiddenCount -= 1;
        const first = this.pendingFirst;
        if (first === undefined) {
            this.pendingFirst = tile;
        } else {
            this.pendingSecond = tile;
            if (!identityEquals(first.identity, tile.identity)) {
                this.needsRollback = true;
                this.revealDeadline = this.now() + this.rollbackDelayMs;
            }
        }
        this.checkRep();
        return true;
    }

    /**
     * Handle a clock tick.
     *
     * A matched pair is released immediately; a mismatched pair is hidden
     * again once the deadline has passed. Ticks in other phases do nothing.
     *
     * @returns true iff the tick changed the state
     */
    public tick(): boolean {
        switch (this.phase) {
            case 'pair-matched':
                this.endTurn();
                return true;
            case 'pair-mismatched': {
                const deadline = this.revealDeadline;
                assert(deadline !== undefined);
                if (this.now() < deadline) {
                    return false;
                }
                this.pendingFirst?.hide();
                this.pendingSecond?.hide();
                this.hiddenCount += 2;
                this.endTurn();
                return true;
            }
            case 'idle':
            case 'one-selected':
                return false;
        }
    }

    private endTurn(): void {
        this.pendingFirst = undefined;
        this.pendingSecond = undefined;
        this.needsRollback = false;
        this.revealDeadline = undefined;
        this.checkRep();
    }

    /**
     * @returns true iff every tile is face up
     */
    public isGameOver(): boolean {
        return this.hiddenCount === 0;
    }
}

/**
 * @returns true iff every tile of the machine's board is face up
 */
export function isGameOver(state: SelectionMachine): boolean {
    return state.isGameOver();
}

function view(tile: Tile | undefined): TileView | undefined {
    return tile === undefined ? undefined : { identity: tile.identity, revealed: tile.revealed };
}
