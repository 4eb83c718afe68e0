import assert from 'node:assert';
import { Board } from '../src/board.js';
import { OFF_BOARD, SelectionMachine, cell, isGameOver } from '../src/selection.js';
import { glyph, identityLabel } from '../src/tile.js';

/**
 * Manually advanced clock.
 */
class FakeClock {
    public time = 1000;
    public readonly now = (): number => this.time;
}

const DELAY = 500;

// A B
// B A
function abba(clock: FakeClock): SelectionMachine {
    const board = new Board(2, 2, [glyph('A'), glyph('B'), glyph('B'), glyph('A')]);
    return new SelectionMachine(board, { rollbackDelayMs: DELAY, now: clock.now });
}

function revealedCount(machine: SelectionMachine): number {
    return machine.board.views().flat().filter(tile => tile.revealed).length;
}

/**
 * Tests for the turn/selection state machine.
 */
describe('SelectionMachine', function() {

    // Testing strategy
    //   click: phase idle, one-selected, pair-matched, pair-mismatched;
    //     target hidden, already revealed, off board
    //   tick: each phase; for pair-mismatched, before, at and after the deadline
    //   game over: before and after the last pair
    //   properties over a long random event sequence: identities unchanged,
    //     hidden count consistent with the board

    it('starts idle with every tile hidden', function() {
        const machine = abba(new FakeClock());
        assert.strictEqual(machine.phase, 'idle');
        assert.strictEqual(machine.hidden, 4);
        assert.strictEqual(machine.first, undefined);
        assert.strictEqual(machine.second, undefined);
        assert.strictEqual(machine.rollbackPending, false);
        assert.strictEqual(isGameOver(machine), false);
    });

    it('mismatch stays visible until the deadline, then rolls back', function() {
        const clock = new FakeClock();
        const machine = abba(clock);

        assert(machine.click(cell(0, 0)));
        assert.strictEqual(machine.phase, 'one-selected');
        assert.deepStrictEqual(machine.first, { identity: glyph('A'), revealed: true });
        assert.strictEqual(machine.hidden, 3);

        clock.time = 1200;
        assert(machine.click(cell(0, 1)));
        assert.strictEqual(machine.phase, 'pair-mismatched');
        assert.deepStrictEqual(machine.second, { identity: glyph('B'), revealed: true });
        assert.strictEqual(machine.rollbackPending, true);
        assert.strictEqual(machine.deadline, 1200 + DELAY);
        assert.strictEqual(machine.hidden, 2);

        clock.time = 1200 + DELAY - 1;
        assert.strictEqual(machine.tick(), false);
        assert.strictEqual(machine.phase, 'pair-mismatched');
        assert.strictEqual(machine.board.look(), '2x2\nup A\nup B\ndown\ndown\n');

        clock.time = 1200 + DELAY;
        assert.strictEqual(machine.tick(), true);
        assert.strictEqual(machine.phase, 'idle');
        assert.strictEqual(machine.hidden, 4);
        assert.strictEqual(machine.rollbackPending, false);
        assert.strictEqual(machine.deadline, undefined);
        assert.strictEqual(machine.board.look(), '2x2\ndown\ndown\ndown\ndown\n');
    });

    it('a late tick still rolls back once', function() {
        const clock = new FakeClock();
        const machine = abba(clock);
        machine.click(cell(1, 0));
        machine.click(cell(1, 1));
        clock.time += 10 * DELAY;
        assert.strictEqual(machine.tick(), true);
        assert.strictEqual(machine.hidden, 4);
        assert.strictEqual(machine.tick(), false);
        assert.strictEqual(machine.hidden, 4);
    });

    it('matching pairs stay revealed until the game is over', function() {
        const clock = new FakeClock();
        const machine = abba(clock);

        machine.click(cell(0, 0));
        assert(machine.click(cell(1, 1)));
        assert.strictEqual(machine.phase, 'pair-matched');
        assert.strictEqual(machine.rollbackPending, false);
        assert.strictEqual(machine.hidden, 2);

        assert.strictEqual(machine.tick(), true);
        assert.strictEqual(machine.phase, 'idle');
        assert.strictEqual(machine.hidden, 2);
        assert.strictEqual(machine.board.look(), '2x2\nup A\ndown\ndown\nup A\n');

        clock.time += 10 * DELAY;
        machine.tick();
        assert.strictEqual(machine.hidden, 2);

        machine.click(cell(0, 1));
        assert.strictEqual(isGameOver(machine), false);
        machine.click(cell(1, 0));
        assert.strictEqual(machine.hidden, 0);
        assert.strictEqual(isGameOver(machine), true);
        assert.strictEqual(machine.isGameOver(), true);
        assert.strictEqual(machine.board.look(), '2x2\nup A\nup B\nup B\nup A\n');
    });

    it('ignores clicks on revealed tiles', function() {
        const machine = abba(new FakeClock());
        machine.click(cell(0, 0));
        assert.strictEqual(machine.click(cell(0, 0)), false);
        assert.strictEqual(machine.phase, 'one-selected');
        assert.strictEqual(machine.hidden, 3);
        assert.strictEqual(machine.second, undefined);

        machine.click(cell(1, 1));
        machine.tick();
        assert.strictEqual(machine.click(cell(1, 1)), false);
        assert.strictEqual(machine.phase, 'idle');
    });

    it('ignores a third click while a pair is pending', function() {
        const clock = new FakeClock();
        const machine = abba(clock);
        machine.click(cell(0, 0));
        machine.click(cell(0, 1));
        assert.strictEqual(machine.click(cell(1, 0)), false);
        assert.strictEqual(machine.hidden, 2);
        assert.strictEqual(machine.board.tileAt(1, 0).revealed, false);

        const matched = abba(clock);
        matched.click(cell(0, 0));
        matched.click(cell(1, 1));
        assert.strictEqual(matched.click(cell(0, 1)), false);
        assert.strictEqual(matched.phase, 'pair-matched');
    });

    it('ignores off-board clicks in every phase', function() {
        const clock = new FakeClock();
        const machine = abba(clock);
        const snapshot = (): string => `${machine.phase} ${machine.hidden} ${machine.board.look()}`;

        let before = snapshot();
        assert.strictEqual(machine.click(OFF_BOARD), false);
        assert.strictEqual(snapshot(), before);

        machine.click(cell(0, 0));
        before = snapshot();
        assert.strictEqual(machine.click(OFF_BOARD), false);
        assert.strictEqual(snapshot(), before);

        machine.click(cell(0, 1));
        before = snapshot();
        assert.strictEqual(machine.click(OFF_BOARD), false);
        assert.strictEqual(snapshot(), before);
    });

    it('ticks never change idle or one-selected', function() {
        const clock = new FakeClock();
        const machine = abba(clock);
        assert.strictEqual(machine.tick(), false);
        assert.strictEqual(machine.phase, 'idle');
        machine.click(cell(0, 0));
        clock.time += 10 * DELAY;
        assert.strictEqual(machine.tick(), false);
        assert.strictEqual(machine.tick(), false);
        assert.strictEqual(machine.phase, 'one-selected');
        assert.strictEqual(machine.hidden, 3);
        assert.deepStrictEqual(machine.first, { identity: glyph('A'), revealed: true });
    });

    it('rolls back on the first tick with zero delay', function() {
        const clock = new FakeClock();
        const board = new Board(2, 2, [glyph('A'), glyph('B'), glyph('B'), glyph('A')]);
        const machine = new SelectionMachine(board, { rollbackDelayMs: 0, now: clock.now });
        machine.click(cell(0, 0));
        machine.click(cell(1, 0));
        assert.strictEqual(machine.tick(), true);
        assert.strictEqual(machine.phase, 'idle');
        assert.strictEqual(machine.hidden, 4);
    });

    it('requires on-board clicks to name a real position', function() {
        const machine = abba(new FakeClock());
        assert.throws(() => machine.click(cell(2, 0)), assert.AssertionError);
    });

    it('keeps identities and hidden count consistent over many events', function() {
        const clock = new FakeClock();
        const identities = 'ABCDEFGH'.split('').map(glyph);
        const board = Board.create(4, 4, identities);
        const initial = board.identities().map(identityLabel);
        const machine = new SelectionMachine(board, { rollbackDelayMs: DELAY, now: clock.now });

        // deterministic pseudo-random walk over clicks and ticks
        let seed = 7;
        const next = (max: number): number => {
            seed = (seed * 16807) % 2147483647;
            return seed % max;
        };
        for (let step = 0; step < 2000 && !machine.isGameOver(); ++step) {
            const hiddenBefore = machine.hidden;
            if (next(3) === 0) {
                clock.time += next(2 * DELAY);
                const phase = machine.phase;
                machine.tick();
                const delta = machine.hidden - hiddenBefore;
                assert(delta === 0 || (delta === 2 && phase === 'pair-mismatched'));
            } else {
                const row = next(4);
                const column = next(4);
                const wasRevealed = machine.board.tileAt(row, column).revealed;
                const accepted = machine.click(cell(row, column));
                assert.strictEqual(machine.hidden - hiddenBefore, accepted ? -1 : 0);
                // a revealed tile, in particular the pending first one, is never selected again
                assert(!(accepted && wasRevealed));
            }
            assert.strictEqual(machine.hidden, 16 - revealedCount(machine));
            assert.deepStrictEqual(machine.board.identities().map(identityLabel), initial);
            assert.strictEqual(machine.hidden % 2 === 0, machine.phase !== 'one-selected');
        }
    });

    it('clearing all pairs in order ends the game', function() {
        const clock = new FakeClock();
        const layout = 'ABCDEFABCDEF'.split('').map(glyph);
        const board = new Board(3, 4, layout);
        const machine = new SelectionMachine(board, { rollbackDelayMs: DELAY, now: clock.now });
        for (let k = 0; k < 6; ++k) {
            // identity k sits at flat positions k and k+6
            machine.click(cell(Math.floor(k / 4), k % 4));
            machine.click(cell(Math.floor((k + 6) / 4), (k + 6) % 4));
            assert.strictEqual(machine.phase, 'pair-matched');
            assert.strictEqual(machine.hidden, 12 - 2 * (k + 1));
            machine.tick();
        }
        assert.strictEqual(machine.hidden, 0);
        assert(isGameOver(machine));
    });
});
