// src/utils/utils.ts

import { ENCODING } from '../constants/constants.js';

const HEX_TABLE = '0123456789abcdef';

const CONTROL_NAMES: Record<number, string> = {
  0x00: '<NUL>',
  0x01: '<SOH>',
  0x02: '<STX>',
  0x03: '<ETX>',
  0x04: '<EOT>',
  0x06: '<ACK>',
  0x0a: '<LF>',
  0x0d: '<CR>',
  0x15: '<NACK>',
};

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view of a slice of the input array (negative indexes count from the end).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Encodes text with the protocol's one-byte-per-character encoding.
 */
export function encodeText(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, ENCODING));
}

/**
 * Decodes bytes with the protocol's one-byte-per-character encoding.
 */
export function decodeText(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(ENCODING);
}

/**
 * Renders bytes for log output with control characters spelled out,
 * e.g. `<STX>1.8.0(1)<ETX>k`.
 */
export function describeBytes(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    const name = CONTROL_NAMES[b];
    if (name !== undefined) out += name;
    else if (b < 0x20 || b > 0x7e) out += `<0x${HEX_TABLE.charAt(b >> 4)}${HEX_TABLE.charAt(b & 0xf)}>`;
    else out += String.fromCharCode(b);
  }
  return out;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
