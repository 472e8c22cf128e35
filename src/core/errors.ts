// src/core/errors.ts

/**
 * Failure causes raised by the chunk codec and the container built on it.
 */
export enum PngErrorKind {
    TruncatedHeader = 'TruncatedHeader',
    SizeMismatch = 'SizeMismatch',
    InvalidChunkType = 'InvalidChunkType',
    InvalidLength = 'InvalidLength',
    InvalidCharacter = 'InvalidCharacter',
    ChecksumMismatch = 'ChecksumMismatch',
    InvalidUtf8 = 'InvalidUtf8',
    InvalidSignature = 'InvalidSignature',
    ChunkNotFound = 'ChunkNotFound',
    InvalidImageHeader = 'InvalidImageHeader',
}

export class PngError extends Error {
    constructor(
        readonly kind: PngErrorKind,
        message: string,
    ) {
        super(message);
        this.name = 'PngError';
    }
}

/**
 * Narrows a caught value to a PngError, optionally of a single kind.
 */
export function isPngError(value: unknown, kind?: PngErrorKind): value is PngError {
    return value instanceof PngError && (kind === undefined || value.kind === kind);
}
