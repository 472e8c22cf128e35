// src/core/chunk/chunkType.ts

import { PngError, PngErrorKind } from '../errors.ts';
import { compareUint8ArraysQuick } from '../../utils/misc/uint8arrayHelpers.ts';

const TYPE_CODE_SIZE = 4;
// Bit 5 of each byte is the case bit of an ASCII letter.
const PROPERTY_BIT = 5;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function isAsciiLetter(value: number): boolean {
    return (value >= 65 && value <= 90) || (value >= 97 && value <= 122);
}

function isPropertyBitSet(value: number): boolean {
    return ((value >> PROPERTY_BIT) & 0b1) === 0b1;
}

/**
 * A 4-byte PNG chunk type code.
 *
 * The letter case of each byte carries one property:
 * - byte 0: uppercase = critical, lowercase = ancillary
 * - byte 1: uppercase = public, lowercase = private
 * - byte 2: reserved, must be uppercase in files conforming to the current PNG version
 * - byte 3: uppercase = unsafe to copy, lowercase = safe to copy
 *
 * Decoders treat the code as fixed binary values, never as text in some other
 * character encoding.
 */
export class ChunkType {
    private readonly code: Uint8Array;

    private constructor(code: Uint8Array) {
        this.code = code;
    }

    /**
     * Builds a chunk type from raw bytes. All four bytes must be ASCII letters and
     * the reserved bit must be clear.
     *
     * @throws {PngError} InvalidChunkType
     */
    static fromBytes(bytes: ArrayLike<number>): ChunkType {
        if (bytes.length !== TYPE_CODE_SIZE) {
            throw new PngError(
                PngErrorKind.InvalidChunkType,
                `Chunk type must be ${TYPE_CODE_SIZE} bytes, got ${bytes.length}`,
            );
        }
        for (let i = 0; i < bytes.length; i++) {
            if (!Number.isInteger(bytes[i]) || !isAsciiLetter(bytes[i])) {
                throw new PngError(
                    PngErrorKind.InvalidChunkType,
                    `Chunk type byte ${i} (${bytes[i]}) is not an ASCII letter`,
                );
            }
        }
        const chunkType = new ChunkType(Uint8Array.from(bytes));
        if (!chunkType.isReservedBitValid()) {
            throw new PngError(
                PngErrorKind.InvalidChunkType,
                `Chunk type "${chunkType}" has the reserved bit set`,
            );
        }
        return chunkType;
    }

    /**
     * Builds a chunk type from a 4-letter string. The reserved bit is not checked
     * here, so the result may still report `isValid() === false`.
     *
     * @throws {PngError} InvalidCharacter or InvalidLength
     */
    static fromString(text: string): ChunkType {
        const characters = [...text];
        const offending = characters.find((character) => !isAsciiLetter(character.charCodeAt(0)));
        if (offending !== undefined) {
            throw new PngError(
                PngErrorKind.InvalidCharacter,
                `Chunk type "${text}" contains the non-letter character "${offending}"`,
            );
        }
        if (characters.length !== TYPE_CODE_SIZE) {
            throw new PngError(
                PngErrorKind.InvalidLength,
                `Chunk type "${text}" must be ${TYPE_CODE_SIZE} characters, got ${characters.length}`,
            );
        }
        return new ChunkType(Uint8Array.from(characters, (character) => character.charCodeAt(0)));
    }

    bytes(): Uint8Array {
        return this.code.slice();
    }

    isValid(): boolean {
        return this.code.every(isAsciiLetter) && this.isReservedBitValid();
    }

    isCritical(): boolean {
        return !isPropertyBitSet(this.code[0]);
    }

    isPublic(): boolean {
        return !isPropertyBitSet(this.code[1]);
    }

    isReservedBitValid(): boolean {
        return !isPropertyBitSet(this.code[2]);
    }

    isSafeToCopy(): boolean {
        return isPropertyBitSet(this.code[3]);
    }

    equals(other: ChunkType): boolean {
        return compareUint8ArraysQuick(this.code, other.code);
    }

    /**
     * Renders the code as text.
     *
     * @throws {PngError} InvalidUtf8 if the bytes do not decode; never substitutes characters.
     */
    toString(): string {
        try {
            return utf8Decoder.decode(this.code);
        } catch (error) {
            throw new PngError(PngErrorKind.InvalidUtf8, `Chunk type bytes are not valid UTF-8: ${error}`);
        }
    }
}
