// src/index.ts

export type * from './@types/index.ts';
export { PngError, PngErrorKind, isPngError } from './core/errors.ts';
export { ChunkType } from './core/chunk/chunkType.ts';
export { Chunk, formatCrc } from './core/chunk/chunk.ts';
export { crc32 } from './core/chunk/crc32.ts';
export { Png } from './core/png/png.ts';
export { chunkHeaders, chunkHeadersShow, readPng, readPngAsync, writePng } from './core/png/pngUtils.ts';
export {
    ColorType,
    InterlaceMethod,
    KnownChunkTypes,
    decodeImageHeader,
    encodeImageHeader,
    isAllowedBitDepth,
    sampleDepth,
    usesAlpha,
    usesColor,
    usesPalette,
} from './core/chunkSpec/imageHeader.ts';
export { inspect, collectPngFiles, verifyPngFiles } from './core/inspector/index.ts';
export { createLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
export { config, PNG_SIGNATURE } from './config/index.ts';
