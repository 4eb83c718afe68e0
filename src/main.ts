#!/usr/bin/env node
/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import { type GameConfig, loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { Game } from './game.js';
import { WebServer } from './server.js';
import { simulate } from './simulation.js';

/**
 * Start a game server or run a simulated game.
 *
 * Command-line usage:
 *     npm start PORT [FILENAME]
 *     npm run simulation [FILENAME]
 * i.e.
 *     tile-match serve PORT [FILENAME]
 *     tile-match simulate [FILENAME]
 * where:
 *
 *   - PORT is an integer that specifies the server's listening port number,
 *     0 specifies that a random unused port will be automatically chosen.
 *   - FILENAME is the path to a valid board file, which will be used as the
 *     fixed layout of the game board instead of a shuffled one.
 *
 * Board size, timing and tile identities come from the environment; see loadConfig.
 * For example, to serve a shuffled 2x3 board on port 8080:
 *     ROWS=2 COLUMNS=3 npm start 8080
 *
 * @throws Error if an error occurs parsing a file or starting a server
 */
async function main(): Promise<void> {
    const [command, ...args]
        = process.argv.slice(2); // skip the first two arguments
                                 // (argv[0] is node executable file, argv[1] is this script)
    const config = await loadConfig();
    if (command === 'serve') {
        const [portString, filename] = args;
        if (portString === undefined) { throw new ConfigurationError('missing PORT'); }
        const port = parseInt(portString);
        if (isNaN(port) || port < 0) { throw new ConfigurationError('invalid PORT'); }

        const game = await Game.create(withBoardFile(config, filename));
        const server = new WebServer(game, port);
        await server.start();
        process.once('SIGINT', () => server.stop());
    } else if (command === 'simulate') {
        const [filename] = args;
        const game = await Game.create(withBoardFile(config, filename));
        const result = await simulate(game, {
            minDelayMs: process.env['MIN_DELAY'] ? Number(process.env['MIN_DELAY']) : 1,
            maxDelayMs: process.env['MAX_DELAY'] ? Number(process.env['MAX_DELAY']) : 20,
            maxClicks: process.env['MAX_CLICKS'] ? Number(process.env['MAX_CLICKS']) : 10_000,
            verbose: process.env['SIM_VERBOSE'] === '1',
        });
        if (!result.finished) {
            process.exitCode = 1;
        }
    } else {
        throw new ConfigurationError(`unknown command ${JSON.stringify(command ?? '')}, expected serve or simulate`);
    }
}

function withBoardFile(config: GameConfig, filename: string | undefined): GameConfig {
    return filename === undefined ? config : { ...config, boardFile: filename };
}

try {
    await main();
} catch (err) {
    if (err instanceof ConfigurationError) {
        console.error(`configuration error: ${err.message}`);
    } else {
        console.error(err);
    }
    process.exitCode = 1;
}
