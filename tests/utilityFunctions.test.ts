// tests/utilityFunctions.test.ts

import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
    ensureOutputDirectory,
    hasExtension,
    readDirectory,
} from '../src/utils/storage/storageUtils.ts';
import {
    deserializeUInt32,
    deserializeUInt8,
    serializeUInt32,
} from '../src/utils/serialization/serializationHelpers.ts';
import {
    compareUint8ArraysQuick,
    concatUint8Arrays,
    startsWithBytes,
} from '../src/utils/misc/uint8arrayHelpers.ts';
import { makeTempDir } from './helpers/pngBuilders.ts';

describe('Utility Functions', () => {
    describe('serialization', () => {
        it('should write unsigned 32-bit integers big-endian', () => {
            expect(Array.from(serializeUInt32(2882656334))).toEqual([0xab, 0xd1, 0xd8, 0x4e]);
            expect(Array.from(serializeUInt32(42))).toEqual([0, 0, 0, 42]);
        });

        it('should read relative to the view it is given', () => {
            const backing = Uint8Array.of(9, 9, 0xab, 0xd1, 0xd8, 0x4e, 7);
            const view = backing.subarray(2);
            expect(deserializeUInt32(view, 0)).toEqual({ value: 2882656334, newOffset: 4 });
            expect(deserializeUInt8(view, 4)).toEqual({ value: 7, newOffset: 5 });
        });
    });

    describe('Uint8Array helpers', () => {
        it('should concatenate in order', () => {
            expect(Array.from(concatUint8Arrays([Uint8Array.of(1), new Uint8Array(0), Uint8Array.of(2, 3)]))).toEqual([
                1, 2, 3,
            ]);
        });

        it('should compare contents', () => {
            expect(compareUint8ArraysQuick(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true);
            expect(compareUint8ArraysQuick(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBe(false);
            expect(compareUint8ArraysQuick(Uint8Array.of(1, 2), Uint8Array.of(1, 2, 3))).toBe(false);
        });

        it('should match prefixes', () => {
            expect(startsWithBytes(Uint8Array.of(1, 2, 3), Uint8Array.of(1, 2))).toBe(true);
            expect(startsWithBytes(Uint8Array.of(1), Uint8Array.of(1, 2))).toBe(false);
            expect(startsWithBytes(Uint8Array.of(2, 1), Uint8Array.of(1))).toBe(false);
        });
    });

    describe('storage', () => {
        it('should create nested output folders and list them sorted', () => {
            const folder = makeTempDir();
            const nested = path.join(folder, 'a', 'b');
            ensureOutputDirectory(nested);
            fs.writeFileSync(path.join(nested, 'z.png'), '');
            fs.writeFileSync(path.join(nested, 'm.png'), '');
            expect(readDirectory(nested)).toEqual(['m.png', 'z.png']);
        });

        it('should match extensions ignoring case', () => {
            expect(hasExtension('image.PNG', '.png')).toBe(true);
            expect(hasExtension('image.png.txt', '.png')).toBe(false);
            expect(hasExtension('README', '.png')).toBe(false);
        });
    });
});
