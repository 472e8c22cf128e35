// src/utils/misc/uint8arrayHelpers.ts

/**
 * Compares two Uint8Array objects for equality.
 *
 * @return true if both arrays have the same length and identical elements at each index.
 */
export function compareUint8ArraysQuick(arr1: Uint8Array, arr2: Uint8Array): boolean {
    return arr1.length === arr2.length && arr1.every((value, index) => value === arr2[index]);
}

/**
 * Checks whether `arr` begins with every byte of `prefix`.
 */
export function startsWithBytes(arr: Uint8Array, prefix: Uint8Array): boolean {
    return arr.length >= prefix.length && compareUint8ArraysQuick(arr.subarray(0, prefix.length), prefix);
}

/**
 * Concatenates multiple Uint8Array objects into a single Uint8Array.
 *
 * @param arrays - Parts to join, in order.
 * @return A new Uint8Array holding all the parts.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);

    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }

    return result;
}
