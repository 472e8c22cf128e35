// src/core/png/png.ts

import { CHUNK_LAYOUT, PNG_SIGNATURE } from '../../config/index.ts';
import { Chunk } from '../chunk/chunk.ts';
import { PngError, PngErrorKind } from '../errors.ts';
import { deserializeUInt32 } from '../../utils/serialization/serializationHelpers.ts';
import { concatUint8Arrays, startsWithBytes } from '../../utils/misc/uint8arrayHelpers.ts';

/**
 * A PNG file body: the signature followed by an ordered list of chunks.
 * Chunk ordering rules (IHDR first, IEND last, ...) are not enforced.
 */
export class Png {
    static readonly STANDARD_HEADER: Uint8Array = PNG_SIGNATURE;

    private readonly chunkList: Chunk[];

    constructor(chunks: Chunk[]) {
        this.chunkList = [...chunks];
    }

    /**
     * Decodes a whole PNG file held in memory.
     *
     * @throws {PngError} InvalidSignature, or the first error raised while decoding a chunk.
     */
    static fromBytes(bytes: Uint8Array): Png {
        if (!startsWithBytes(bytes, PNG_SIGNATURE)) {
            throw new PngError(PngErrorKind.InvalidSignature, 'Data does not start with the PNG signature');
        }

        const chunks: Chunk[] = [];
        let offset = PNG_SIGNATURE.length;
        while (offset < bytes.length) {
            const remaining = bytes.length - offset;
            if (remaining < CHUNK_LAYOUT.lengthFieldSize) {
                throw new PngError(
                    PngErrorKind.TruncatedHeader,
                    `Chunk ${chunks.length} at offset ${offset} has only ${remaining} bytes left for its length`,
                );
            }
            const { value: length } = deserializeUInt32(bytes, offset);
            const end = offset + length + CHUNK_LAYOUT.overhead;
            if (end > bytes.length) {
                throw new PngError(
                    PngErrorKind.SizeMismatch,
                    `Chunk ${chunks.length} at offset ${offset} declares ${length} data bytes, past the end of the data`,
                );
            }
            chunks.push(Chunk.fromBytes(bytes.subarray(offset, end)));
            offset = end;
        }
        return new Png(chunks);
    }

    header(): Uint8Array {
        return Png.STANDARD_HEADER.slice();
    }

    chunks(): readonly Chunk[] {
        return this.chunkList;
    }

    appendChunk(chunk: Chunk): void {
        this.chunkList.push(chunk);
    }

    /**
     * Removes and returns the first chunk whose type code is `chunkType`.
     *
     * @throws {PngError} ChunkNotFound
     */
    removeFirstChunk(chunkType: string): Chunk {
        const index = this.chunkList.findIndex((chunk) => chunk.chunkType().toString() === chunkType);
        if (index === -1) {
            throw new PngError(PngErrorKind.ChunkNotFound, `No "${chunkType}" chunk in this PNG`);
        }
        const [removed] = this.chunkList.splice(index, 1);
        return removed;
    }

    chunkByType(chunkType: string): Chunk | null {
        return this.chunkList.find((chunk) => chunk.chunkType().toString() === chunkType) ?? null;
    }

    asBytes(): Uint8Array {
        return concatUint8Arrays([this.header(), ...this.chunkList.map((chunk) => chunk.asBytes())]);
    }

    toString(): string {
        return `Png [ ${this.chunkList.map((chunk) => chunk.chunkType().toString()).join(', ')} ]`;
    }
}
