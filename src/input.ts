/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { OFF_BOARD, type ResolvedClick, cell } from './selection.js';

/**
 * Translate a pointer position into the tile under it.
 *
 * Tiles are laid out edge to edge from the origin, `tileWidth` pixels wide
 * and `tileHeight` pixels tall, so the tile at (row, column) covers
 * x in [column*tileWidth, (column+1)*tileWidth) and
 * y in [row*tileHeight, (row+1)*tileHeight).
 *
 * @param pixelX horizontal pointer offset from the grid origin
 * @param pixelY vertical pointer offset from the grid origin
 * @param tileWidth requires a positive finite number
 * @param tileHeight requires a positive finite number
 * @param board grid dimensions
 * @returns the tile position under the pointer, or OFF_BOARD if the
 *          pointer lies outside the grid or is not a finite position
 */
export function resolveClick(
    pixelX: number,
    pixelY: number,
    tileWidth: number,
    tileHeight: number,
    board: { readonly rows: number; readonly columns: number },
): ResolvedClick {
    assert(Number.isFinite(tileWidth) && tileWidth > 0, `invalid tile width ${tileWidth}`);
    assert(Number.isFinite(tileHeight) && tileHeight > 0, `invalid tile height ${tileHeight}`);
    if (!Number.isFinite(pixelX) || !Number.isFinite(pixelY) || pixelX < 0 || pixelY < 0) {
        return OFF_BOARD;
    }
    const column = Math.floor(pixelX / tileWidth);
    const row = Math.floor(pixelY / tileHeight);
    if (row >= board.rows || column >= board.columns) {
        return OFF_BOARD;
    }
    return cell(row, column);
}
