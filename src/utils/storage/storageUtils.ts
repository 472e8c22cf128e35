// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Buffer } from 'node:buffer';

/**
 * Ensures that the specified output directory exists, creating it and any
 * missing parents.
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * Writes bytes to a file, replacing any previous content.
 *
 * @param filePath - Destination file.
 * @param data - Bytes to write.
 */
export function writeBufferToFile(filePath: string, data: Uint8Array): void {
    fs.writeFileSync(filePath, data);
}

/**
 * Reads the entire contents of a file into memory.
 */
export function readBufferFromFile(filePath: string): Buffer {
    return fs.readFileSync(filePath);
}

export async function readBufferFromFileAsync(filePath: string): Promise<Buffer> {
    return await readFile(filePath);
}

/**
 * Reads the names of the entries of a directory.
 *
 * @param dirPath - The path of the directory to read.
 * @return Entry names, sorted.
 */
export function readDirectory(dirPath: string): string[] {
    return fs.readdirSync(dirPath).sort();
}

export function isDirectory(filePath: string): boolean {
    return fs.statSync(filePath).isDirectory();
}

/**
 * Checks whether the filename carries the given extension, ignoring case.
 */
export function hasExtension(filename: string, extension: string): boolean {
    return path.extname(filename).toLowerCase() === extension.toLowerCase();
}
