// tests/png.test.ts

import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import { Buffer } from 'node:buffer';
import path from 'node:path';
import { Png } from '../src/core/png/png.ts';
import { chunkHeaders, chunkHeadersShow, readPng, readPngAsync, writePng } from '../src/core/png/pngUtils.ts';
import { PNG_SIGNATURE } from '../src/config/index.ts';
import { PngErrorKind } from '../src/core/errors.ts';
import { kindOf } from './helpers/errorHelpers.ts';
import { concatUint8Arrays } from '../src/utils/misc/uint8arrayHelpers.ts';
import { ascii, buildPng, makeTempDir, rawChunk, textChunk } from './helpers/pngBuilders.ts';

describe('Png', () => {
    it('should decode every chunk after the signature, in order', () => {
        const png = Png.fromBytes(buildPng('Title\0pngchunk', 'Author\0tester').asBytes());
        expect(chunkHeadersShow(png)).toEqual(['IHDR', 'tEXt', 'tEXt', 'IEND']);
        expect(png.chunks()[1].dataAsString()).toBe('Title\0pngchunk');
    });

    it('should encode back to the bytes it was decoded from', () => {
        const bytes = buildPng('Comment\0hello').asBytes();
        expect(Png.fromBytes(bytes).asBytes()).toEqual(bytes);
    });

    it('should start its encoding with the standard signature', () => {
        const png = buildPng();
        expect(Array.from(png.header())).toEqual([137, 80, 78, 71, 13, 10, 26, 10]);
        expect(Array.from(png.asBytes().subarray(0, 8))).toEqual(Array.from(Png.STANDARD_HEADER));
    });

    it('should accept a signature with no chunks', () => {
        expect(Png.fromBytes(PNG_SIGNATURE).chunks()).toHaveLength(0);
    });

    it('should not check chunk ordering', () => {
        const png = Png.fromBytes(concatUint8Arrays([PNG_SIGNATURE, textChunk('x').asBytes()]));
        expect(chunkHeadersShow(png)).toEqual(['tEXt']);
    });

    it('should reject data without the signature', () => {
        expect(kindOf(() => Png.fromBytes(ascii('GIF89a')))).toBe(PngErrorKind.InvalidSignature);
        expect(kindOf(() => Png.fromBytes(PNG_SIGNATURE.subarray(0, 7)))).toBe(PngErrorKind.InvalidSignature);
    });

    it('should reject a trailing fragment too short for a length field', () => {
        const bytes = concatUint8Arrays([buildPng().asBytes(), new Uint8Array([0, 0])]);
        expect(kindOf(() => Png.fromBytes(bytes))).toBe(PngErrorKind.TruncatedHeader);
    });

    it('should reject a chunk whose declared length runs past the data', () => {
        const bytes = concatUint8Arrays([PNG_SIGNATURE, rawChunk(100, 'tEXt', ascii('short'), 0)]);
        expect(kindOf(() => Png.fromBytes(bytes))).toBe(PngErrorKind.SizeMismatch);
    });

    it('should surface the first corrupt chunk', () => {
        const bytes = buildPng('abc').asBytes();
        // last byte of the tEXt payload: signature 8 + IHDR 25 + tEXt header 8 + 2
        bytes[8 + 25 + 8 + 2] ^= 0x01;
        expect(kindOf(() => Png.fromBytes(bytes))).toBe(PngErrorKind.ChecksumMismatch);
    });

    it('should not share memory with the Buffer it was decoded from', () => {
        const buffer = Buffer.from(buildPng('abc').asBytes());
        const png = Png.fromBytes(buffer);
        buffer.fill(0, PNG_SIGNATURE.length);
        expect(png.chunks()[1].dataAsString()).toBe('abc');
        expect(Png.fromBytes(png.asBytes()).toString()).toBe('Png [ IHDR, tEXt, IEND ]');
    });

    it('should append chunks at the end', () => {
        const png = buildPng();
        png.appendChunk(textChunk('late'));
        expect(chunkHeadersShow(png)).toEqual(['IHDR', 'IEND', 'tEXt']);
    });

    it('should remove only the first chunk of a type', () => {
        const png = buildPng('first', 'second');
        const removed = png.removeFirstChunk('tEXt');
        expect(removed.dataAsString()).toBe('first');
        expect(chunkHeadersShow(png)).toEqual(['IHDR', 'tEXt', 'IEND']);
        expect(png.chunkByType('tEXt')?.dataAsString()).toBe('second');
    });

    it('should report a missing chunk type', () => {
        const png = buildPng();
        expect(kindOf(() => png.removeFirstChunk('tEXt'))).toBe(PngErrorKind.ChunkNotFound);
        expect(png.chunkByType('tEXt')).toBeNull();
    });

    it('should describe itself by its chunk types', () => {
        expect(buildPng('a').toString()).toBe('Png [ IHDR, tEXt, IEND ]');
    });
});

describe('pngUtils', () => {
    it('should list chunk types', () => {
        const headers = chunkHeaders(buildPng('a'));
        expect(headers.map((chunkType) => chunkType.isCritical())).toEqual([true, false, true]);
    });

    it('should write and read a file', async () => {
        const file = path.join(makeTempDir(), 'roundtrip.png');
        writePng(file, buildPng('Comment\0on disk'));
        expect(fs.statSync(file).size).toBe(buildPng('Comment\0on disk').asBytes().length);
        expect(chunkHeadersShow(readPng(file))).toEqual(['IHDR', 'tEXt', 'IEND']);
        expect(chunkHeadersShow(await readPngAsync(file))).toEqual(['IHDR', 'tEXt', 'IEND']);
    });

    it('should keep chunks read from a file independent of their data copies', () => {
        const file = path.join(makeTempDir(), 'copies.png');
        writePng(file, buildPng('abc'));
        const chunk = readPng(file).chunks()[1];
        chunk.data()[0] = 0x7a;
        expect(chunk.dataAsString()).toBe('abc');
        expect(readPng(file).chunks()[1].equals(chunk)).toBe(true);
    });
});
