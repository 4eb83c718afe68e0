/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { Server } from 'node:http';
import express, { type Application, type Request, type Response, type NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ClockDriver } from './clock.js';
import { makeDeferred } from './deferred.js';
import type { Game } from './game.js';

/**
 * HTTP web game server.
 *
 * Hosts one game: ticks it with a clock while listening, and lets a
 * browser-side renderer look at it, click it, and watch it for changes.
 */
export class WebServer {

    private readonly app: Application;
    private readonly clock: ClockDriver;
    private server: Server|undefined;

    /**
     * Make a new web game server for game that listens for connections on port.
     *
     * @param game hosted game; ticked every game.config.tickIntervalMs while the server runs
     * @param requestedPort server port number, 0 for any free port
     * @param host interface to listen on
     */
    public constructor(
        private readonly game: Game,
        private readonly requestedPort: number,
        private readonly host = '0.0.0.0',
    ) {
        this.clock = new ClockDriver(game.config.tickIntervalMs, () => { game.tick(); });
        this.app = express();
        this.app.use((request: Request, response: Response, next: NextFunction) => {
            // allow requests from web pages hosted anywhere
            response.set('Access-Control-Allow-Origin', '*');
            next();
        });

        /*
         * GET /look
         *
         * Response is the board snapshot: a RxC header, then `down` or `up LABEL` per tile.
         */
        this.app.get('/look', (request: Request, response: Response) => {
            response
            .status(StatusCodes.OK) // 200
            .type('text')
            .send(this.game.look());
        });

        /*
         * GET /click/<row>,<column>
         * row and column must be integers; a position off the board is a missed click.
         *
         * Response is the board snapshot after the click.
         */
        this.app.get('/click/:location', (request: Request, response: Response) => {
            const coordinates = parsePair(request.params['location'], /^-?\d+$/);
            if (coordinates === undefined) {
                response
                .status(StatusCodes.BAD_REQUEST) // 400
                .type('text')
                .send('expected /click/ROW,COLUMN with integer ROW and COLUMN');
                return;
            }
            const [ row, column ] = coordinates;
            response
            .status(StatusCodes.OK) // 200
            .type('text')
            .send(this.game.click(row, column));
        });

        /*
         * GET /point/<x>,<y>
         * x and y are pixel offsets from the top-left corner of the grid.
         *
         * Response is the board snapshot after clicking the tile under (x,y), if any.
         */
        this.app.get('/point/:location', (request: Request, response: Response) => {
            const coordinates = parsePair(request.params['location'], /^-?\d+(\.\d+)?$/);
            if (coordinates === undefined) {
                response
                .status(StatusCodes.BAD_REQUEST) // 400
                .type('text')
                .send('expected /point/X,Y with numeric X and Y');
                return;
            }
            const [ x, y ] = coordinates;
            response
            .status(StatusCodes.OK) // 200
            .type('text')
            .send(this.game.point(x, y));
        });

        /*
         * GET /watch
         *
         * Waits until the next time a tile turns face up or face down, or the game restarts.
         * Response is the board snapshot after that change.
         */
        this.app.get('/watch', async (request: Request, response: Response) => {
            const boardState = await this.game.watch();
            response
            .status(StatusCodes.OK) // 200
            .type('text')
            .send(boardState);
        });

        /*
         * GET /status
         *
         * Response is a JSON object {rows, columns, phase, hiddenCount, gameOver}.
         */
        this.app.get('/status', (request: Request, response: Response) => {
            response
            .status(StatusCodes.OK) // 200
            .json(this.game.status());
        });

        /*
         * GET /restart
         *
         * Deals a new board from the game's configuration.
         */
        this.app.get('/restart', async (request: Request, response: Response) => {
            try {
                await this.game.restart();
                response.status(StatusCodes.OK).type('text').send('board restarted');
            } catch (err) {
                response.status(StatusCodes.INTERNAL_SERVER_ERROR).type('text')
                    .send(`could not restart board: ${err}`);
            }
        });
    }

    /**
     * Start this server and the game clock. Errors after the server is
     * listening are logged.
     *
     * @returns (a promise that) resolves when the server is listening, or
     *          rejects if it cannot listen
     */
    public start(): Promise<void> {
        const { promise, resolve, reject } = makeDeferred<void>();
        const server = this.app.listen(this.requestedPort, this.host);
        this.server = server;
        server.once('error', reject);
        server.once('listening', () => {
            server.off('error', reject);
            server.on('error', err => console.error('server error:', err));
            this.clock.start();
            console.log(`server now listening at http://${this.host}:${this.port}`);
            resolve();
        });
        return promise;
    }

    /**
     * @returns the actual port that server is listening at. (May be different
     *          than the requestedPort used in the constructor, since if
     *          requestedPort = 0 then an arbitrary available port is chosen.)
     *          Requires that start() has already been called and completed.
     */
    public get port(): number {
        const address = this.server?.address() ?? 'not connected';
        if (typeof(address) === 'string') {
            throw new Error('server is not listening at a port');
        }
        return address.port;
    }

    /**
     * Stop this server and its clock, releasing any pending watch requests.
     * Once stopped, this server cannot be restarted.
     */
    public stop(): void {
        this.clock.stop();
        this.game.close();
        this.server?.close();
        console.log('server stopped');
    }
}

/**
 * @returns the two comma-separated numbers in text, if both match pattern
 */
function parsePair(text: string | undefined, pattern: RegExp): [number, number] | undefined {
    const parts = (text ?? '').split(',');
    const [ first, second ] = parts;
    if (parts.length !== 2 || first === undefined || second === undefined || !pattern.test(first) || !pattern.test(second)) {
        return undefined;
    }
    return [ Number(first), Number(second) ];
}
