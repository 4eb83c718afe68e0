/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import fs from 'node:fs';
import { ConfigurationError } from './errors.js';
import { type TileIdentity, glyph, identityLabel, parseIdentity } from './tile.js';

/**
 * Everything needed to set up a game and the loop that hosts it.
 */
export interface GameConfig {
    readonly rows: number;
    readonly columns: number;
    /** distinct tile identities to deal from; the default glyph sequence when absent */
    readonly identities?: ReadonlyArray<TileIdentity>;
    /** how long a mismatched pair stays visible */
    readonly rollbackDelayMs: number;
    /** clock period of the host loop */
    readonly tickIntervalMs: number;
    /** pixel size of one tile, for resolving pointer positions */
    readonly tileWidth: number;
    readonly tileHeight: number;
    /** board file with a fixed layout; overrides rows, columns and identities */
    readonly boardFile?: string;
}

export const DEFAULT_CONFIG: GameConfig = Object.freeze({
    rows: 4,
    columns: 4,
    rollbackDelayMs: 1000,
    tickIntervalMs: 100,
    tileWidth: 100,
    tileHeight: 100,
});

/**
 * Default identity source: glyphs A-Z, then a-z, then #53, #54, ...
 */
export function* defaultIdentities(): IterableIterator<TileIdentity> {
    const letters = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
    for (const letter of letters) {
        yield glyph(letter);
    }
    for (let n = letters.length + 1; ; ++n) {
        yield glyph(`#${n}`);
    }
}

/**
 * Build a configuration from environment variables, falling back to
 * DEFAULT_CONFIG for anything unset:
 *   ROWS, COLUMNS, ROLLBACK_DELAY_MS, TICK_MS, TILE_WIDTH, TILE_HEIGHT,
 *   IDENTITIES (comma-separated labels), IDENTITIES_FILE (one label per line),
 *   BOARD_FILE.
 *
 * @param env environment to read, process.env by default
 * @returns a validated configuration
 * @throws ConfigurationError if a variable is malformed or the result is invalid
 * @throws Error if IDENTITIES_FILE cannot be read
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<GameConfig> {
    let identities: ReadonlyArray<TileIdentity> | undefined;
    const inline = env['IDENTITIES'];
    const identitiesFile = env['IDENTITIES_FILE'];
    if (inline !== undefined && inline.trim().length > 0) {
        identities = parseIdentityList(inline.split(','), 'IDENTITIES');
    } else if (identitiesFile !== undefined && identitiesFile.length > 0) {
        identities = await loadIdentities(identitiesFile);
    }
    const boardFile = env['BOARD_FILE'];

    const config: GameConfig = {
        rows: integerOption(env, 'ROWS', DEFAULT_CONFIG.rows),
        columns: integerOption(env, 'COLUMNS', DEFAULT_CONFIG.columns),
        rollbackDelayMs: integerOption(env, 'ROLLBACK_DELAY_MS', DEFAULT_CONFIG.rollbackDelayMs),
        tickIntervalMs: integerOption(env, 'TICK_MS', DEFAULT_CONFIG.tickIntervalMs),
        tileWidth: integerOption(env, 'TILE_WIDTH', DEFAULT_CONFIG.tileWidth),
        tileHeight: integerOption(env, 'TILE_HEIGHT', DEFAULT_CONFIG.tileHeight),
        ...(identities !== undefined ? { identities } : {}),
        ...(boardFile !== undefined && boardFile.length > 0 ? { boardFile } : {}),
    };
    validateConfig(config);
    return config;
}

/**
 * Read tile identities from a file, one label per line; blank lines are ignored.
 *
 * @param filename path to the identities file
 * @returns the identities in file order
 * @throws ConfigurationError if a label is malformed or repeated
 * @throws Error if the file cannot be read
 */
export async function loadIdentities(filename: string): Promise<TileIdentity[]> {
    const text = (await fs.promises.readFile(filename)).toString();
    return parseIdentityList(text.split(/\r?\n/), filename);
}

/**
 * @param config configuration to check
 * @throws ConfigurationError unless the board dimensions are positive
 *         integers with an even product, there are enough distinct
 *         identities for them, and all timing and tile-size values are valid;
 *         dimensions and identities are not checked when a board file is set
 */
export function validateConfig(config: GameConfig): void {
    // a board file brings its own size and tiles
    if (config.boardFile === undefined) {
        const { rows, columns } = config;
        if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(columns) || columns <= 0) {
            throw new ConfigurationError(`board dimensions must be positive integers, got ${rows}x${columns}`);
        }
        if ((rows * columns) % 2 !== 0) {
            throw new ConfigurationError(`a ${rows}x${columns} board has an odd number of tiles`);
        }
        if (config.identities !== undefined) {
            const distinct = new Set(config.identities.map(identityLabel)).size;
            if (distinct < rows * columns / 2) {
                throw new ConfigurationError(
                    `a ${rows}x${columns} board needs ${rows * columns / 2} distinct identities, got ${distinct}`);
            }
        }
    }
    if (!Number.isInteger(config.rollbackDelayMs) || config.rollbackDelayMs < 0) {
        throw new ConfigurationError(`invalid rollback delay ${config.rollbackDelayMs}`);
    }
    for (const [name, value] of [
        ['tick interval', config.tickIntervalMs],
        ['tile width', config.tileWidth],
        ['tile height', config.tileHeight],
    ] as const) {
        if (!Number.isInteger(value) || value <= 0) {
            throw new ConfigurationError(`invalid ${name} ${value}`);
        }
    }
}

function integerOption(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const text = env[name]?.trim();
    if (text === undefined || text.length === 0) {
        return fallback;
    }
    if (!/^\d+$/.test(text)) {
        throw new ConfigurationError(`${name} must be a non-negative integer, got ${JSON.stringify(text)}`);
    }
    return parseInt(text, 10);
}

function parseIdentityList(labels: ReadonlyArray<string>, source: string): TileIdentity[] {
    const seen = new Set<string>();
    const identities: TileIdentity[] = [];
    for (const raw of labels) {
        const label = raw.trim();
        if (label.length === 0) {
            continue;
        }
        if (seen.has(label)) {
            throw new ConfigurationError(`${source}: identity ${label} listed twice`);
        }
        seen.add(label);
        try {
            identities.push(parseIdentity(label));
        } catch (err) {
            throw new ConfigurationError(`${source}: ${err instanceof Error ? err.message : err}`);
        }
    }
    return identities;
}
