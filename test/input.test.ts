import assert from 'node:assert';
import { resolveClick } from '../src/input.js';
import { OFF_BOARD } from '../src/selection.js';

describe('resolveClick', function() {

    // Testing strategy
    //   position: inside a tile, on a tile's left/top edge, just before the
    //     right/bottom edge of the grid, on it, negative, non-finite
    //   tile size: square, rectangular, invalid

    const grid = { rows: 2, columns: 3 };

    it('maps a position inside a tile to its row and column', function() {
        assert.deepStrictEqual(resolveClick(150, 30, 100, 50, grid), { onBoard: true, row: 0, column: 1 });
        assert.deepStrictEqual(resolveClick(299.5, 99.9, 100, 50, grid), { onBoard: true, row: 1, column: 2 });
    });

    it('assigns tile edges to the tile to their right and below', function() {
        assert.deepStrictEqual(resolveClick(0, 0, 100, 50, grid), { onBoard: true, row: 0, column: 0 });
        assert.deepStrictEqual(resolveClick(100, 50, 100, 50, grid), { onBoard: true, row: 1, column: 1 });
    });

    it('resolves positions past the grid as off-board', function() {
        assert.strictEqual(resolveClick(300, 10, 100, 50, grid), OFF_BOARD);
        assert.strictEqual(resolveClick(10, 100, 100, 50, grid), OFF_BOARD);
    });

    it('resolves negative and non-finite positions as off-board', function() {
        assert.strictEqual(resolveClick(-1, 10, 100, 50, grid), OFF_BOARD);
        assert.strictEqual(resolveClick(10, -0.5, 100, 50, grid), OFF_BOARD);
        assert.strictEqual(resolveClick(NaN, 10, 100, 50, grid), OFF_BOARD);
        assert.strictEqual(resolveClick(10, Infinity, 100, 50, grid), OFF_BOARD);
    });

    it('requires positive tile dimensions', function() {
        assert.throws(() => resolveClick(10, 10, 0, 50, grid), assert.AssertionError);
        assert.throws(() => resolveClick(10, 10, 100, -5, grid), assert.AssertionError);
    });
});
