// src/utils/serialization/serializationHelpers.ts

/**
 * Serializes an unsigned 32-bit integer as 4 big-endian bytes.
 *
 * @param value - Integer in the range 0..2^32-1.
 */
export function serializeUInt32(value: number): Uint8Array {
    const buffer = new Uint8Array(4);
    const view = new DataView(buffer.buffer);
    view.setUint32(0, value, false); // false for Big Endian
    return buffer;
}

/**
 * Reads an unsigned big-endian 32-bit integer.
 *
 * @param buffer - Source bytes; may be a view into a larger buffer.
 * @param offset - Position of the first byte, relative to `buffer`.
 * @return The value and the offset just past it.
 */
export function deserializeUInt32(buffer: Uint8Array, offset: number): { value: number; newOffset: number } {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const value = view.getUint32(offset, false); // false for Big Endian
    return { value, newOffset: offset + 4 };
}

/**
 * Reads one unsigned byte.
 */
export function deserializeUInt8(buffer: Uint8Array, offset: number): { value: number; newOffset: number } {
    const value = buffer[offset];
    return { value, newOffset: offset + 1 };
}
