/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { Board } from './board.js';
import { DEFAULT_CONFIG, type GameConfig, defaultIdentities, validateConfig } from './config.js';
import { type Deferred, makeDeferred } from './deferred.js';
import { resolveClick } from './input.js';
import { OFF_BOARD, type ResolvedClick, SelectionMachine, type SelectionPhase, cell } from './selection.js';

/**
 * Summary of a game for renderers and status endpoints.
 */
export interface GameStatus {
    readonly rows: number;
    readonly columns: number;
    readonly phase: SelectionPhase;
    readonly hiddenCount: number;
    readonly gameOver: boolean;
}

export interface GameOptions {
    /** uniform numbers in [0,1) for shuffling; Math.random by default */
    readonly random?: () => number;
    /** current time in milliseconds; Date.now by default */
    readonly now?: () => number;
}

/**
 * A single game owned by a host loop: the board, the selection state
 * machine driving it, and the clients watching for changes.
 *
 * All event methods are synchronous, so clicks and ticks are applied in
 * the order the host delivers them.
 */
export class Game {

    private readonly watchers: Array<Deferred<string>> = [];

    // Abstraction function:
    //   AF(config, machine, watchers) = the game played on machine.board
    //     under config, with `watchers` waiting for its next visible change
    // Representation invariant:
    //   machine.board has the dimensions given by config, or by config.boardFile
    // Safety from rep exposure:
    //   machine and watchers are private; observers return strings, fresh
    //   records, or the board, whose tiles cannot be mutated except through
    //   the machine

    private constructor(
        public readonly config: GameConfig,
        private machine: SelectionMachine,
        private readonly options: GameOptions,
    ) {
    }

    /**
     * Set up a new game.
     *
     * @param config game configuration; DEFAULT_CONFIG when omitted
     * @param options randomness and clock overrides
     * @returns a game in phase idle with every tile hidden
     * @throws ConfigurationError if the configuration or board file is invalid
     * @throws Error if the board file cannot be read
     */
    public static async create(config: GameConfig = DEFAULT_CONFIG, options: GameOptions = {}): Promise<Game> {
        validateConfig(config);
        const machine = await Game.deal(config, options);
        return new Game(config, machine, options);
    }

    private static async deal(config: GameConfig, options: GameOptions): Promise<SelectionMachine> {
        const board = config.boardFile !== undefined
            ? await Board.parseFromFile(config.boardFile)
            : Board.create(config.rows, config.columns, config.identities ?? defaultIdentities(), options.random);
        return new SelectionMachine(board, {
            rollbackDelayMs: config.rollbackDelayMs,
            ...(options.now !== undefined ? { now: options.now } : {}),
        });
    }

    public get board(): Board {
        return this.machine.board;
    }

    public get phase(): SelectionPhase {
        return this.machine.phase;
    }

    /**
     * @returns text snapshot of the board; see Board.look
     */
    public look(): string {
        return this.board.look();
    }

    /**
     * @returns current status
     */
    public status(): GameStatus {
        return {
            rows: this.board.rows,
            columns: this.board.columns,
            phase: this.machine.phase,
            hiddenCount: this.machine.hidden,
            gameOver: this.machine.isGameOver(),
        };
    }

    /**
     * @returns true iff every tile is face up
     */
    public isGameOver(): boolean {
        return this.machine.isGameOver();
    }

    /**
     * Click the tile at (row, column). A position off the board is a missed click.
     *
     * @returns snapshot after the click
     */
    public click(row: number, column: number): string {
        const target = this.board.contains(row, column) ? cell(row, column) : OFF_BOARD;
        this.apply(target);
        return this.look();
    }

    /**
     * Click at a pointer position, with tiles of the configured pixel size.
     *
     * @returns snapshot after the click
     */
    public point(pixelX: number, pixelY: number): string {
        this.apply(resolveClick(pixelX, pixelY, this.config.tileWidth, this.config.tileHeight, this.board));
        return this.look();
    }

    /**
     * Deliver a clock tick.
     *
     * @returns true iff the tick changed the turn state
     */
    public tick(): boolean {
        const hiddenBefore = this.machine.hidden;
        const changed = this.machine.tick();
        if (changed && process.env['DEBUG_GAME']) {
            console.log(`tick -> ${this.machine.phase} hidden=${this.machine.hidden}`);
        }
        if (this.machine.hidden !== hiddenBefore) {
            this.notifyWatchers();
        }
        return changed;
    }

    private apply(target: ResolvedClick): void {
        const accepted = this.machine.click(target);
        if (process.env['DEBUG_GAME']) {
            const where = target.onBoard ? `(${target.row},${target.column})` : 'off-board';
            console.log(`click ${where} ${accepted ? 'accepted' : 'ignored'} -> ${this.machine.phase} hidden=${this.machine.hidden}`);
        }
        if (accepted) {
            this.notifyWatchers();
        }
    }

    /**
     * Wait for the next visible change: a tile turning face up or face down,
     * or a restart.
     *
     * @returns (a promise for) the snapshot right after that change
     */
    public watch(): Promise<string> {
        const deferred = makeDeferred<string>();
        this.watchers.push(deferred);
        return deferred.promise;
    }

    /**
     * Replace the board with a freshly dealt one from the same configuration.
     * Events delivered while the new board is being prepared still apply to
     * the old one.
     *
     * @throws Error if the board file cannot be read again
     */
    public async restart(): Promise<void> {
        this.machine = await Game.deal(this.config, this.options);
        if (process.env['DEBUG_GAME']) console.log(`restart ${this.board.rows}x${this.board.columns}`);
        this.notifyWatchers();
    }

    /**
     * Settle every outstanding watch with the current snapshot.
     */
    public close(): void {
        this.notifyWatchers();
    }

    private notifyWatchers(): void {
        const snapshot = this.look();
        for (const watcher of this.watchers.splice(0)) {
            watcher.resolve(snapshot);
        }
    }
}
