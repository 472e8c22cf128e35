// src/core/png/pngUtils.ts

import type { ChunkType } from '../chunk/chunkType.ts';
import { Png } from './png.ts';
import {
    readBufferFromFile,
    readBufferFromFileAsync,
    writeBufferToFile,
} from '../../utils/storage/storageUtils.ts';

/**
 * Loads a PNG file into memory and decodes its chunks.
 *
 * @throws {PngError} when the content is not a well-formed PNG chunk stream.
 */
export function readPng(filePath: string): Png {
    return Png.fromBytes(readBufferFromFile(filePath));
}

export async function readPngAsync(filePath: string): Promise<Png> {
    return Png.fromBytes(await readBufferFromFileAsync(filePath));
}

export function writePng(filePath: string, png: Png): void {
    writeBufferToFile(filePath, png.asBytes());
}

/**
 * The type of every chunk, in file order.
 */
export function chunkHeaders(png: Png): ChunkType[] {
    return png.chunks().map((chunk) => chunk.chunkType());
}

/**
 * The type code of every chunk as text, in file order.
 */
export function chunkHeadersShow(png: Png): string[] {
    return chunkHeaders(png).map((chunkType) => chunkType.toString());
}
