// src/core/chunk/crc32.ts

const CRC32_POLYNOMIAL = 0xedb88320;

const CRC32_TABLE: Uint32Array = ((): Uint32Array => {
    const table = new Uint32Array(256);
    for (let n = 0; n < 256; n++) {
        let c = n;
        for (let k = 0; k < 8; k++) {
            c = c & 1 ? CRC32_POLYNOMIAL ^ (c >>> 1) : c >>> 1;
        }
        table[n] = c >>> 0;
    }
    return table;
})();

/**
 * Computes the CRC-32/ISO-HDLC checksum (the one PNG and zlib use) over the
 * concatenation of the given parts, without building the concatenated buffer.
 *
 * @param parts - Byte sequences, checksummed in order.
 * @return The checksum as an unsigned 32-bit number.
 */
export function crc32(...parts: Uint8Array[]): number {
    let crc = 0xffffffff;
    for (const part of parts) {
        for (let i = 0; i < part.length; i++) {
            crc = CRC32_TABLE[(crc ^ part[i]) & 0xff] ^ (crc >>> 8);
        }
    }
    return (crc ^ 0xffffffff) >>> 0;
}
