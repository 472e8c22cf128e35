// tests/helpers/errorHelpers.ts

import { PngError, type PngErrorKind } from '../../src/core/errors.ts';

/**
 * Runs `action` and returns the kind of the PngError it throws, or null when it
 * returns normally. Other errors propagate.
 */
export function kindOf(action: () => unknown): PngErrorKind | null {
    try {
        action();
        return null;
    } catch (error) {
        if (error instanceof PngError) return error.kind;
        throw error;
    }
}
