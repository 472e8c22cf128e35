// tests/inspector.test.ts

import { describe, expect, it } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import { inspect } from '../src/core/inspector/index.ts';
import { InspectStateMachine } from '../src/core/inspector/stateMachine.ts';
import { InspectorStates } from '../src/stateMachine/definedStates.ts';
import { ColorType } from '../src/core/chunkSpec/imageHeader.ts';
import { writePng } from '../src/core/png/pngUtils.ts';
import { Png } from '../src/core/png/png.ts';
import { PngError, PngErrorKind } from '../src/core/errors.ts';
import { buildPng, endChunk, makeTempDir, textChunk } from './helpers/pngBuilders.ts';
import { MockLogger } from './helpers/mockLogger.ts';

describe('inspect', () => {
    it('should report every chunk with its properties', async () => {
        const file = path.join(makeTempDir(), 'sample.png');
        const png = buildPng('Title\0a', 'Author\0b');
        writePng(file, png);

        const report = await inspect({ inputFile: file, verbose: false, logger: new MockLogger() });

        expect(report.file).toBe(file);
        expect(report.size).toBe(png.asBytes().length);
        expect(report.chunks.map((chunk) => chunk.type)).toEqual(['IHDR', 'tEXt', 'tEXt', 'IEND']);
        expect(report.chunks[1]).toEqual({
            index: 1,
            type: 'tEXt',
            length: 7,
            crc: png.chunks()[1].crc(),
            critical: false,
            public: true,
            reservedBitValid: true,
            safeToCopy: true,
        });
        expect(report.typeCounts).toEqual({ IHDR: 1, tEXt: 2, IEND: 1 });
        expect(report.imageHeader).toEqual({
            width: 1,
            height: 1,
            bitDepth: 8,
            colorType: ColorType.Truecolor,
            compressionMethod: 0,
            filterMethod: 0,
            interlaceMethod: 0,
        });
    });

    it('should warn when there is no image header', async () => {
        const file = path.join(makeTempDir(), 'headless.png');
        writePng(file, new Png([textChunk('x'), endChunk()]));
        const logger = new MockLogger();

        const report = await inspect({ inputFile: file, verbose: false, logger });

        expect(report.imageHeader).toBeNull();
        expect(logger.warnMessages).toEqual(['No IHDR chunk found.']);
    });

    it('should log transitions and finish in the completed state', async () => {
        const file = path.join(makeTempDir(), 'sample.png');
        writePng(file, buildPng());
        const logger = new MockLogger(true);
        const stateMachine = new InspectStateMachine({ inputFile: file, verbose: true, logger });

        await stateMachine.run();

        expect(stateMachine.getState()).toBe(InspectorStates.COMPLETED);
        expect(logger.debugMessages).toContain('STATE :: Transitioning from state "DESCRIBE_CHUNKS" -> "COMPLETED"');
        expect(logger.infoMessages).toEqual([`Inspecting "${file}"...`]);
    });

    it('should advance the progress bar once per state', async () => {
        const file = path.join(makeTempDir(), 'sample.png');
        writePng(file, buildPng());
        const states: unknown[] = [];
        const progressBar = {
            start: () => {},
            stop: () => {},
            increment: (payload?: Record<string, unknown>) => states.push(payload?.state),
        };

        await inspect({ inputFile: file, verbose: false, logger: new MockLogger(), progressBar });

        expect(states).toEqual(['INIT', 'READ_FILE', 'PARSE_PNG', 'DESCRIBE_CHUNKS', 'COMPLETED']);
    });

    it('should fail in the error state on a corrupt file', async () => {
        const file = path.join(makeTempDir(), 'broken.png');
        fs.writeFileSync(file, 'not a png');
        const logger = new MockLogger();
        const stateMachine = new InspectStateMachine({ inputFile: file, verbose: false, logger });

        const failure = await stateMachine.run().catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(PngError);
        expect(failure instanceof PngError && failure.kind).toBe(PngErrorKind.InvalidSignature);
        expect(stateMachine.getState()).toBe(InspectorStates.ERROR);
        expect(logger.errorMessages).toEqual([
            'Error occurred during "PARSE_PNG": Data does not start with the PNG signature',
        ]);
    });
});
