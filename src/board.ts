/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import fs from 'node:fs';
import { ConfigurationError } from './errors.js';
import { Tile, type TileIdentity, type TileView, identityLabel, parseIdentity } from './tile.js';

/**
 * Tile Match board ADT.
 *
 * Specification (high level):
 * - A Board is a fixed grid of `rows` x `columns` tiles in which every
 *   identity occurs on exactly two tiles. A board is created by shuffling
 *   (`Board.create`), from a fixed row-major layout (the constructor), or
 *   from a board file (`Board.parseFromFile`).
 *
 * - Mutability: the layout never changes after construction. Each tile's
 *   revealed flag is mutable, but only the selection state machine flips
 *   it; everything else observes the board through `views`, `look` and
 *   the other read-only methods.
 *
 * - Preconditions: coordinates passed to `tileAt` must be on the board.
 *   Violations are programming errors and fail an assertion; callers
 *   resolve raw input with `contains` or the input mapper first.
 */
export class Board {

    // tiles[r][c] is the tile at (r,c)
    private readonly tiles: Array<Array<Tile>>;

    // Abstraction function:
    //   AF(rows, columns, tiles) = a memory board with `rows` rows and
    //     `columns` columns where the tile at (r,c) is tiles[r][c], face up
    //     iff tiles[r][c].revealed
    // Representation invariant:
    //   - rows and columns are positive integers and rows*columns is even
    //   - tiles is a rows x columns matrix and tiles[r][c] sits at (r,c)
    //   - every identity label occurs on exactly two tiles
    // Safety from rep exposure:
    //   - tiles is private; views() and identities() return fresh arrays
    //   - tileAt() hands out a Tile, whose only mutators are reveal() and
    //     hide(); the layout itself cannot be changed through it

    /**
     * Make a board with a fixed layout.
     *
     * @param rows number of rows, a positive integer
     * @param columns number of columns, a positive integer
     * @param layout row-major tile identities; length must be rows*columns
     * @throws ConfigurationError if the dimensions are not positive integers
     *         with an even product, the layout has the wrong length, or
     *         some identity does not occur exactly twice
     */
    public constructor(
        public readonly rows: number,
        public readonly columns: number,
        layout: ReadonlyArray<TileIdentity>,
    ) {
        checkDimensions(rows, columns);
        if (layout.length !== rows * columns) {
            throw new ConfigurationError(
                `layout has ${layout.length} tiles, expected ${rows * columns} for ${rows}x${columns}`);
        }
        const counts = new Map<string, number>();
        for (const identity of layout) {
            const label = identityLabel(identity);
            counts.set(label, (counts.get(label) ?? 0) + 1);
        }
        for (const [label, count] of counts) {
            if (count !== 2) {
                throw new ConfigurationError(`identity ${label} occurs ${count} times, expected 2`);
            }
        }

        this.tiles = [];
        for (let r = 0; r < rows; ++r) {
            const row: Tile[] = [];
            for (let c = 0; c < columns; ++c) {
                const identity = layout[r * columns + c];
                assert(identity !== undefined);
                row.push(new Tile(identity, r, c));
            }
            this.tiles.push(row);
        }
        this.checkRep();
    }

    /**
     * Make a shuffled board.
     *
     * @param rows number of rows, a positive integer
     * @param columns number of columns, a positive integer; rows*columns must be even
     * @param identitySource supplies identities; it is consumed until
     *        rows*columns/2 distinct ones have been seen, later repeats are skipped
     * @param random source of uniform numbers in [0,1), Math.random by default
     * @returns a board holding each of the first rows*columns/2 distinct
     *          identities exactly twice, in uniformly random positions
     * @throws ConfigurationError if the dimensions are invalid or the source
     *         runs out before supplying enough distinct identities
     */
    public static create(
        rows: number,
        columns: number,
        identitySource: Iterable<TileIdentity>,
        random: () => number = Math.random,
    ): Board {
        checkDimensions(rows, columns);
        const pairs = rows * columns / 2;
        const distinct = new Map<string, TileIdentity>();
        for (const identity of identitySource) {
            if (distinct.size === pairs) {
                break;
            }
            const label = identityLabel(identity);
            if (!distinct.has(label)) {
                distinct.set(label, identity);
            }
        }
        if (distinct.size < pairs) {
            throw new ConfigurationError(
                `a ${rows}x${columns} board needs ${pairs} distinct identities, got ${distinct.size}`);
        }
        const layout = [...distinct.values()].flatMap(identity => [identity, identity]);
        shuffle(layout, random);
        return new Board(rows, columns, layout);
    }

    /**
     * Make a new board by parsing a file.
     *
     * The file starts with a `RxC` header line followed by R*C tile labels,
     * one per line, in row-major order. Blank lines are ignored.
     *
     * @param filename path to game board file
     * @returns a new board with the size and tiles from the file
     * @throws ConfigurationError if the file is not a valid game board
     * @throws Error if the file cannot be read
     */
    public static async parseFromFile(filename: string): Promise<Board> {
        const text = (await fs.promises.readFile(filename)).toString();
        return Board.parse(text);
    }

    /**
     * Parse the contents of a board file; see parseFromFile.
     *
     * @param text board file contents
     * @returns a new board with the size and tiles from the text
     * @throws ConfigurationError if the text is not a valid game board
     */
    public static parse(text: string): Board {
        const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
        const header = lines[0];
        if (header === undefined) {
            throw new ConfigurationError('empty board file');
        }
        const match = header.match(/^(\d+)x(\d+)$/);
        if (!match || match[1] === undefined || match[2] === undefined) {
            throw new ConfigurationError(`invalid board header: ${header}`);
        }
        const rows = parseInt(match[1], 10);
        const columns = parseInt(match[2], 10);
        const labels = lines.slice(1);
        if (labels.length !== rows * columns) {
            throw new ConfigurationError(
                `board file has ${labels.length} tiles, header says ${rows}x${columns}`);
        }
        const layout = labels.map(label => {
            try {
                return parseIdentity(label);
            } catch (err) {
                throw new ConfigurationError(`bad tile in board file: ${err instanceof Error ? err.message : err}`);
            }
        });
        return new Board(rows, columns, layout);
    }

    private checkRep(): void {
        assert(Number.isInteger(this.rows) && this.rows > 0);
        assert(Number.isInteger(this.columns) && this.columns > 0);
        assert((this.rows * this.columns) % 2 === 0);
        assert(this.tiles.length === this.rows);
        this.tiles.forEach((row, r) => {
            assert(row.length === this.columns);
            row.forEach((tile, c) => assert(tile.row === r && tile.column === c));
        });
    }

    /**
     * @returns true iff (row, column) is a position on this board
     */
    public contains(row: number, column: number): boolean {
        return Number.isInteger(row) && Number.isInteger(column)
            && row >= 0 && row < this.rows && column >= 0 && column < this.columns;
    }

    /**
     * @param row requires 0 <= row < rows
     * @param column requires 0 <= column < columns
     * @returns the tile at (row, column)
     */
    public tileAt(row: number, column: number): Tile {
        assert(this.contains(row, column), `no tile at (${row},${column}) on a ${this.rows}x${this.columns} board`);
        const tile = this.tiles[row]?.[column];
        assert(tile !== undefined);
        return tile;
    }

    /**
     * @returns a fresh row-major matrix of (identity, revealed) records,
     *          a read-only picture of the board for renderers
     */
    public views(): TileView[][] {
        return this.tiles.map(row => row.map(tile => ({ identity: tile.identity, revealed: tile.revealed })));
    }

    /**
     * @returns the identity of every tile, row-major
     */
    public identities(): TileIdentity[] {
        return this.tiles.flatMap(row => row.map(tile => tile.identity));
    }

    /**
     * @returns number of tiles currently face down
     */
    public hiddenTiles(): number {
        return this.tiles.reduce((sum, row) => sum + row.filter(tile => !tile.revealed).length, 0);
    }

    /**
     * Text snapshot of the board: a `RxC` header, then one line per tile in
     * row-major order, `down` for a hidden tile or `up LABEL` for a
     * revealed one. Every line ends with a newline.
     *
     * @returns the snapshot
     */
    public look(): string {
        const lines = [`${this.rows}x${this.columns}`];
        for (const row of this.tiles) {
            for (const tile of row) {
                lines.push(tile.revealed ? `up ${identityLabel(tile.identity)}` : 'down');
            }
        }
        return lines.join('\n') + '\n';
    }
}

/**
 * Make a shuffled board; see Board.create.
 */
export function createBoard(
    rows: number,
    columns: number,
    identitySource: Iterable<TileIdentity>,
    random: () => number = Math.random,
): Board {
    return Board.create(rows, columns, identitySource, random);
}

/**
 * @returns the tile at (row, column); requires the position to be on the board
 */
export function tileAt(board: Board, row: number, column: number): Tile {
    return board.tileAt(row, column);
}

function checkDimensions(rows: number, columns: number): void {
    if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(columns) || columns <= 0) {
        throw new ConfigurationError(`board dimensions must be positive integers, got ${rows}x${columns}`);
    }
    if ((rows * columns) % 2 !== 0) {
        throw new ConfigurationError(`a ${rows}x${columns} board has an odd number of tiles`);
    }
}

// Fisher-Yates, in place
function shuffle<T>(items: T[], random: () => number): void {
    for (let i = items.length - 1; i > 0; --i) {
        const j = Math.floor(random() * (i + 1));
        const a = items[i];
        const b = items[j];
        assert(a !== undefined && b !== undefined);
        items[i] = b;
        items[j] = a;
    }
}
