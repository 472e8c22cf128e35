// src/core/chunkSpec/imageHeader.ts

import type { IImageHeader } from '../../@types/index.ts';
import { Chunk } from '../chunk/chunk.ts';
import { ChunkType } from '../chunk/chunkType.ts';
import { PngError, PngErrorKind } from '../errors.ts';
import { deserializeUInt32, deserializeUInt8, serializeUInt32 } from '../../utils/serialization/serializationHelpers.ts';
import { concatUint8Arrays } from '../../utils/misc/uint8arrayHelpers.ts';

export const KnownChunkTypes = {
    IHDR: 'IHDR',
    PLTE: 'PLTE',
    IDAT: 'IDAT',
    IEND: 'IEND',
} as const;

export const IMAGE_HEADER_LENGTH = 13;
const MAX_DIMENSION = 0x7fffffff;

/**
 * Color type values; each is a sum of the flags palette (1), color (2) and alpha (4).
 */
export enum ColorType {
    Grayscale = 0,
    Truecolor = 2,
    IndexedColor = 3,
    GrayscaleAlpha = 4,
    TruecolorAlpha = 6,
}

export enum InterlaceMethod {
    None = 0,
    Adam7 = 1,
}

const ALLOWED_BIT_DEPTHS: Record<ColorType, readonly number[]> = {
    [ColorType.Grayscale]: [1, 2, 4, 8, 16],
    [ColorType.Truecolor]: [8, 16],
    [ColorType.IndexedColor]: [1, 2, 4, 8],
    [ColorType.GrayscaleAlpha]: [8, 16],
    [ColorType.TruecolorAlpha]: [8, 16],
};

export function isColorType(value: number): value is ColorType {
    return value in ALLOWED_BIT_DEPTHS;
}

export function usesPalette(colorType: ColorType): boolean {
    return (colorType & 0x1) === 0x1;
}

export function usesColor(colorType: ColorType): boolean {
    return (colorType & 0x2) === 0x2;
}

export function usesAlpha(colorType: ColorType): boolean {
    return (colorType & 0x4) === 0x4;
}

export function isAllowedBitDepth(colorType: ColorType, bitDepth: number): boolean {
    return ALLOWED_BIT_DEPTHS[colorType].includes(bitDepth);
}

/**
 * Bits per sample once palette indices are resolved: indexed images always carry
 * 8-bit palette entries.
 */
export function sampleDepth(header: IImageHeader): number {
    return header.colorType === ColorType.IndexedColor ? 8 : header.bitDepth;
}

function invalid(message: string): PngError {
    return new PngError(PngErrorKind.InvalidImageHeader, message);
}

/**
 * Decodes the 13-byte IHDR payload of a chunk.
 *
 * @throws {PngError} InvalidImageHeader
 */
export function decodeImageHeader(chunk: Chunk): IImageHeader {
    const type = chunk.chunkType().toString();
    if (type !== KnownChunkTypes.IHDR) {
        throw invalid(`Expected an ${KnownChunkTypes.IHDR} chunk, got "${type}"`);
    }
    if (chunk.length() !== IMAGE_HEADER_LENGTH) {
        throw invalid(`${KnownChunkTypes.IHDR} data must be ${IMAGE_HEADER_LENGTH} bytes, got ${chunk.length()}`);
    }

    const data = chunk.data();
    const { value: width, newOffset: heightOffset } = deserializeUInt32(data, 0);
    const { value: height, newOffset: depthOffset } = deserializeUInt32(data, heightOffset);
    const { value: bitDepth, newOffset: colorOffset } = deserializeUInt8(data, depthOffset);
    const { value: colorType, newOffset: compressionOffset } = deserializeUInt8(data, colorOffset);
    const { value: compressionMethod, newOffset: filterOffset } = deserializeUInt8(data, compressionOffset);
    const { value: filterMethod, newOffset: interlaceOffset } = deserializeUInt8(data, filterOffset);
    const { value: interlaceMethod } = deserializeUInt8(data, interlaceOffset);

    const header = { width, height, bitDepth, colorType, compressionMethod, filterMethod, interlaceMethod };
    if (!isColorType(header.colorType)) {
        throw invalid(`Unknown color type ${header.colorType}`);
    }
    return validateImageHeader({ ...header, colorType: header.colorType });
}

/**
 * Builds the IHDR chunk for a header.
 *
 * @throws {PngError} InvalidImageHeader
 */
export function encodeImageHeader(header: IImageHeader): Chunk {
    validateImageHeader(header);
    const data = concatUint8Arrays([
        serializeUInt32(header.width),
        serializeUInt32(header.height),
        Uint8Array.of(
            header.bitDepth,
            header.colorType,
            header.compressionMethod,
            header.filterMethod,
            header.interlaceMethod,
        ),
    ]);
    return new Chunk(ChunkType.fromString(KnownChunkTypes.IHDR), data);
}

function validateImageHeader(header: IImageHeader): IImageHeader {
    for (const [name, value] of [['width', header.width], ['height', header.height]] as const) {
        if (!Number.isInteger(value) || value < 1 || value > MAX_DIMENSION) {
            throw invalid(`Image ${name} must be between 1 and ${MAX_DIMENSION}, got ${value}`);
        }
    }
    if (!isColorType(header.colorType)) {
        throw invalid(`Unknown color type ${header.colorType}`);
    }
    if (!isAllowedBitDepth(header.colorType, header.bitDepth)) {
        throw invalid(`Bit depth ${header.bitDepth} is not allowed for color type ${header.colorType}`);
    }
    if (header.compressionMethod !== 0) {
        throw invalid(`Unknown compression method ${header.compressionMethod}`);
    }
    if (header.filterMethod !== 0) {
        throw invalid(`Unknown filter method ${header.filterMethod}`);
    }
    if (header.interlaceMethod !== InterlaceMethod.None && header.interlaceMethod !== InterlaceMethod.Adam7) {
        throw invalid(`Unknown interlace method ${header.interlaceMethod}`);
    }
    return header;
}
