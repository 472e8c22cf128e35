// src/core/chunk/chunk.ts

import { CHUNK_LAYOUT } from '../../config/index.ts';
import { PngError, PngErrorKind } from '../errors.ts';
import { ChunkType } from './chunkType.ts';
import { crc32 } from './crc32.ts';
import { deserializeUInt32, serializeUInt32 } from '../../utils/serialization/serializationHelpers.ts';
import { compareUint8ArraysQuick, concatUint8Arrays } from '../../utils/misc/uint8arrayHelpers.ts';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * One PNG chunk: a big-endian length, a 4-byte type, `length` bytes of payload and a
 * CRC-32 over type and payload. Length and CRC are computed once, on construction.
 */
export class Chunk {
    private readonly dataLength: number;
    private readonly type: ChunkType;
    private readonly payload: Uint8Array;
    private readonly checksum: number;

    /**
     * Wraps a payload under an already validated chunk type. The type is not checked
     * again and the payload is copied.
     *
     * @throws {RangeError} when the payload does not fit the 32-bit length field.
     */
    constructor(chunkType: ChunkType, data: Uint8Array) {
        if (data.length > CHUNK_LAYOUT.maxDataLength) {
            throw new RangeError(`Chunk data of ${data.length} bytes does not fit a 32-bit length`);
        }
        this.type = chunkType;
        // A Buffer's slice() is a view; the constructor always copies.
        this.payload = new Uint8Array(data);
        this.dataLength = this.payload.length;
        this.checksum = crc32(chunkType.bytes(), this.payload);
    }

    /**
     * Decodes exactly one chunk record. The buffer must hold the record and nothing else.
     *
     * @param bytes - length ++ type ++ data ++ crc
     * @throws {PngError} TruncatedHeader, SizeMismatch, InvalidChunkType or ChecksumMismatch
     */
    static fromBytes(bytes: Uint8Array): Chunk {
        if (bytes.length < CHUNK_LAYOUT.lengthFieldSize) {
            throw new PngError(
                PngErrorKind.TruncatedHeader,
                `Need ${CHUNK_LAYOUT.lengthFieldSize} bytes to read the chunk length, got ${bytes.length}`,
            );
        }
        const { value: length, newOffset: typeOffset } = deserializeUInt32(bytes, 0);
        if (bytes.length !== length + CHUNK_LAYOUT.overhead) {
            throw new PngError(
                PngErrorKind.SizeMismatch,
                `Chunk declares ${length} data bytes (${length + CHUNK_LAYOUT.overhead} in total) but ${bytes.length} bytes were given`,
            );
        }

        const dataOffset = typeOffset + CHUNK_LAYOUT.typeFieldSize;
        const crcOffset = dataOffset + length;
        const chunkType = ChunkType.fromBytes(bytes.subarray(typeOffset, dataOffset));
        const chunk = new Chunk(chunkType, bytes.subarray(dataOffset, crcOffset));

        const { value: declaredCrc } = deserializeUInt32(bytes, crcOffset);
        if (declaredCrc !== chunk.crc()) {
            throw new PngError(
                PngErrorKind.ChecksumMismatch,
                `Chunk "${chunkType}" declares CRC ${formatCrc(declaredCrc)} but its content hashes to ${formatCrc(chunk.crc())}`,
            );
        }
        return chunk;
    }

    length(): number {
        return this.dataLength;
    }

    chunkType(): ChunkType {
        return this.type;
    }

    /**
     * A copy of the payload.
     */
    data(): Uint8Array {
        return new Uint8Array(this.payload);
    }

    crc(): number {
        return this.checksum;
    }

    /**
     * Reads the payload as UTF-8 text. Only meaningful for text-bearing chunk types.
     *
     * @throws {PngError} InvalidUtf8
     */
    dataAsString(): string {
        try {
            return utf8Decoder.decode(this.payload);
        } catch (error) {
            throw new PngError(
                PngErrorKind.InvalidUtf8,
                `Data of chunk "${this.type}" is not valid UTF-8: ${error}`,
            );
        }
    }

    /**
     * Encodes the chunk in its on-wire layout, `length() + 12` bytes long.
     */
    asBytes(): Uint8Array {
        return concatUint8Arrays([
            serializeUInt32(this.dataLength),
            this.type.bytes(),
            this.payload,
            serializeUInt32(this.checksum),
        ]);
    }

    equals(other: Chunk): boolean {
        return (
            this.dataLength === other.dataLength &&
            this.checksum === other.checksum &&
            this.type.equals(other.type) &&
            compareUint8ArraysQuick(this.payload, other.payload)
        );
    }

    toString(): string {
        return `Chunk { length: ${this.dataLength}, type: ${this.type}, crc: ${formatCrc(this.checksum)} }`;
    }
}

export function formatCrc(value: number): string {
    return `0x${value.toString(16).padStart(8, '0')}`;
}
