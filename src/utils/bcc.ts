// src/utils/bcc.ts

import { CONTROL_BYTES } from '../constants/constants.js';
import { Iec62056FramingError } from '../errors.js';
import { decodeText, encodeText } from './utils.js';

/**
 * Calculates the IEC 62056-21 block check character: XOR of every byte, 7 bits wide.
 * @param buffer - bytes covered by the check
 * @returns the BCC as a number in 0..0x7f
 */
export function calculateBcc(buffer: Uint8Array): number {
  let bcc: number = 0;
  for (const byte of buffer) {
    bcc ^= byte & 0x7f;
    bcc &= 0x7f;
  }
  return bcc;
}

/**
 * Index of the byte the BCC starts after: the last SOH if present, otherwise the last STX.
 */
function bccStartIndex(buffer: Uint8Array): number {
  const soh = buffer.lastIndexOf(CONTROL_BYTES.SOH);
  if (soh !== -1) return soh;
  return buffer.lastIndexOf(CONTROL_BYTES.STX);
}

/**
 * Returns a copy of the message with its BCC appended.
 * The BCC covers everything after the SOH (or STX when there is no SOH) up to and
 * including the already present ETX/EOT.
 * @throws Iec62056FramingError if the message has neither SOH nor STX
 */
export function addBcc(buffer: Uint8Array): Uint8Array {
  const start = bccStartIndex(buffer);
  if (start === -1) {
    throw new Iec62056FramingError();
  }
  const result = new Uint8Array(buffer.length + 1);
  result.set(buffer, 0);
  result[buffer.length] = calculateBcc(buffer.subarray(start + 1));
  return result;
}

/**
 * Checks the trailing BCC of a message.
 */
export function isBccValid(buffer: Uint8Array): boolean {
  if (buffer.length < 2) return false;
  const body = buffer.subarray(0, buffer.length - 1);
  if (bccStartIndex(body) === -1) return false;
  const expected = addBcc(body);
  return expected[expected.length - 1] === buffer[buffer.length - 1];
}

export function addBccToString(message: string): string {
  return decodeText(addBcc(encodeText(message)));
}

export function isBccValidString(message: string): boolean {
  return isBccValid(encodeText(message));
}
