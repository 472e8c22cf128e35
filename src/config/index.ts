// src/config/index.ts

import os from 'node:os';

export const PNG_SIGNATURE = Uint8Array.from([137, 80, 78, 71, 13, 10, 26, 10]);

export const CHUNK_LAYOUT = {
    lengthFieldSize: 4,
    typeFieldSize: 4,
    crcFieldSize: 4,
    // length + type + crc around the payload
    overhead: 12,
    maxDataLength: 0xffffffff,
} as const;

export const config = {
    verification: {
        concurrency: Math.max(1, os.cpus().length - 1), // Parallel file reads during verify
    },
    inspection: {
        headerType: 'IHDR',
    },
    fileExtension: '.png',
};
