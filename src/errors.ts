/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * A game cannot be set up as requested: bad board dimensions, too few
 * distinct tile identities, a malformed board file, or an invalid option.
 * Raised before any game loop starts.
 */
export class ConfigurationError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
