// src/core/inspector/stateMachine.ts

import type { IChunkSummary, IImageHeader, IInspectOptions, IPngReport } from '../../@types/index.ts';
import _ from 'lodash';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { InspectorStates } from '../../stateMachine/definedStates.ts';
import { readBufferFromFileAsync } from '../../utils/storage/storageUtils.ts';
import { config } from '../../config/index.ts';
import { Png } from '../png/png.ts';
import { decodeImageHeader } from '../chunkSpec/imageHeader.ts';
import { isPngError } from '../errors.ts';

export class InspectStateMachine extends AbstractStateMachine<InspectorStates, IInspectOptions, IPngReport> {
    private fileData: Uint8Array | null = null;
    private png: Png | null = null;
    private chunkSummaries: IChunkSummary[] = [];
    private imageHeader: IImageHeader | null = null;

    constructor(options: IInspectOptions) {
        super(InspectorStates.INIT, options);
        this.stateTransitions = [
            { state: InspectorStates.INIT, handler: this.init },
            { state: InspectorStates.READ_FILE, handler: this.readFile },
            { state: InspectorStates.PARSE_PNG, handler: this.parsePng },
            { state: InspectorStates.DESCRIBE_CHUNKS, handler: this.describeChunks },
        ];
    }

    protected getCompletionState(): InspectorStates {
        return InspectorStates.COMPLETED;
    }

    protected getErrorState(): InspectorStates {
        return InspectorStates.ERROR;
    }

    protected getResult(): IPngReport {
        return {
            file: this.options.inputFile,
            size: this.fileData?.length ?? 0,
            chunks: this.chunkSummaries,
            typeCounts: _.countBy(this.chunkSummaries, (summary) => summary.type),
            imageHeader: this.imageHeader,
        };
    }

    private init(): void {
        const { logger, verbose, inputFile } = this.options;
        if (verbose) logger.info(`Inspecting "${inputFile}"...`);
    }

    private async readFile(): Promise<void> {
        const { logger, inputFile } = this.options;
        this.fileData = await readBufferFromFileAsync(inputFile);
        logger.debug(`Read ${this.fileData.length} bytes from "${inputFile}".`);
    }

    private parsePng(): void {
        const { logger } = this.options;
        if (!this.fileData) {
            throw new Error('No file data was read.');
        }
        this.png = Png.fromBytes(this.fileData);
        logger.debug(`Decoded ${this.png.chunks().length} chunks.`);
    }

    /**
     * Summarizes each chunk and decodes the image header when the file has one.
     * A malformed header is reported as a warning; the chunk stream itself is intact.
     */
    private describeChunks(): void {
        const { logger } = this.options;
        if (!this.png) {
            throw new Error('No PNG was decoded.');
        }
        this.chunkSummaries = this.png.chunks().map((chunk, index) => {
            const chunkType = chunk.chunkType();
            return {
                index,
                type: chunkType.toString(),
                length: chunk.length(),
                crc: chunk.crc(),
                critical: chunkType.isCritical(),
                public: chunkType.isPublic(),
                reservedBitValid: chunkType.isReservedBitValid(),
                safeToCopy: chunkType.isSafeToCopy(),
            };
        });

        const headerChunk = this.png.chunkByType(config.inspection.headerType);
        if (!headerChunk) {
            logger.warn(`No ${config.inspection.headerType} chunk found.`);
            return;
        }
        try {
            this.imageHeader = decodeImageHeader(headerChunk);
        } catch (error) {
            if (!isPngError(error)) throw error;
            logger.warn(`Image header is malformed: ${error.message}`);
        }
    }
}
