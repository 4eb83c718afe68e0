/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';

/**
 * The face of a tile: either a text glyph or a reference to a picture.
 * Two identities are equal iff they have the same kind and the same payload.
 */
export type TileIdentity =
    | { readonly kind: 'glyph'; readonly value: string }
    | { readonly kind: 'picture'; readonly handle: string };

const PICTURE_PREFIX = 'picture:';

/**
 * @param value non-empty text without whitespace, not starting with `picture:`
 * @returns a glyph identity showing `value`
 */
export function glyph(value: string): TileIdentity {
    assert(isLabelText(value) && !value.startsWith(PICTURE_PREFIX), `invalid glyph: ${JSON.stringify(value)}`);
    return { kind: 'glyph', value };
}

/**
 * @param handle non-empty image reference without whitespace, e.g. a file name
 * @returns a picture identity referring to `handle`
 */
export function picture(handle: string): TileIdentity {
    assert(isLabelText(handle), `invalid picture handle: ${JSON.stringify(handle)}`);
    return { kind: 'picture', handle };
}

/**
 * @returns true iff `a` and `b` have the same kind and payload
 */
export function identityEquals(a: TileIdentity, b: TileIdentity): boolean {
    if (a.kind === 'glyph' && b.kind === 'glyph') {
        return a.value === b.value;
    }
    if (a.kind === 'picture' && b.kind === 'picture') {
        return a.handle === b.handle;
    }
    return false;
}

/**
 * Textual label of an identity, as used in board files and snapshots:
 * a glyph is its value, a picture is `picture:<handle>`.
 * Distinct identities have distinct labels, so labels double as map keys.
 */
export function identityLabel(identity: TileIdentity): string {
    switch (identity.kind) {
        case 'glyph':
            return identity.value;
        case 'picture':
            return PICTURE_PREFIX + identity.handle;
    }
}

/**
 * Inverse of identityLabel.
 *
 * @param label trimmed label text
 * @returns the identity the label denotes
 * @throws Error if the label is empty, contains whitespace, or names an empty picture
 */
export function parseIdentity(label: string): TileIdentity {
    if (!isLabelText(label)) {
        throw new Error(`invalid tile label: ${JSON.stringify(label)}`);
    }
    if (label.startsWith(PICTURE_PREFIX)) {
        const handle = label.slice(PICTURE_PREFIX.length);
        if (handle.length === 0) {
            throw new Error(`picture label without a handle: ${JSON.stringify(label)}`);
        }
        return { kind: 'picture', handle };
    }
    return { kind: 'glyph', value: label };
}

function isLabelText(text: string): boolean {
    return text.length > 0 && !/\s/.test(text);
}

/**
 * What a renderer may know about a tile.
 */
export interface TileView {
    readonly identity: TileIdentity;
    readonly revealed: boolean;
}

/**
 * A mutable tile at a fixed board position.
 *
 * Only the selection state machine reveals and hides tiles; everybody else
 * reads them through TileView.
 */
export class Tile implements TileView {

    private faceUp = false;

    // Abstraction function:
    //   AF(identity, row, column, faceUp) = the tile at (row, column) bearing
    //     `identity`, currently showing its face iff faceUp
    // Representation invariant:
    //   row and column are non-negative integers
    // Safety from rep exposure:
    //   identity is an immutable record; faceUp is private and only changed
    //   by reveal() and hide()

    /**
     * @param identity face of the tile
     * @param row row of the tile on its board
     * @param column column of the tile on its board
     */
    public constructor(
        public readonly identity: TileIdentity,
        public readonly row: number,
        public readonly column: number,
    ) {
        this.checkRep();
    }

    private checkRep(): void {
        assert(Number.isInteger(this.row) && this.row >= 0);
        assert(Number.isInteger(this.column) && this.column >= 0);
    }

    public get revealed(): boolean {
        return this.faceUp;
    }

    /** Turn this tile face up. */
    public reveal(): void {
        this.faceUp = true;
    }

    /** Turn this tile face down. */
    public hide(): void {
        this.faceUp = false;
    }
}
