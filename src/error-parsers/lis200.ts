// src/error-parsers/lis200.ts

import { Iec62056ProtocolError } from '../errors.js';
import type { DataMessage } from '../messages/index.js';
import type { ErrorParser } from './error-parser.js';

/**
 * Error codes of Elster LIS-200 volume converters
 */
export const LIS200_ERROR_MESSAGES: Readonly<Record<number, string>> = {
  1: 'Wrong (unknown) address',
  2: 'Wrong address, object not available',
  3: 'Wrong address, entity for object not available',
  4: 'Wrong address, unknown attribute',
  5: 'Wrong address, attribute for object not available',
  6: 'Value outside of allowed range',
  9: 'Write command on constant not executable',
  11: 'No value range available since no input is allowed',
  13: 'Wrong input',
  14: 'Unknown units code',
  17: 'Wrong access code',
  18: 'No read authorization',
  19: 'No write authorization',
  20: 'Function is locked',
  100: 'Archive number not available',
  101: 'Value position not available',
  103: 'Archive empty',
  104: 'Lower limit (From-value) not found',
  105: 'Upper limit (To-value) not found',
  108: 'Maximum limit of simultaneous opened archives exceeded',
  109: 'Archive entry was overwritten while reading out',
  110: 'CRC error in archive data record',
  180: 'Source not allowed',
  200: 'Syntax error in telegram',
  201: 'Wrong password in telegram',
  222: 'EEPROM read error',
  223: 'EEPROM write error',
  249: 'Encoder mode not possible / Counter reading cannot be changed',
};

/**
 * Error class for a LIS-200 `#NNNN` error value
 */
export class Lis200ProtocolError extends Iec62056ProtocolError {
  code: number;

  constructor(code: number) {
    super(`LIS-200 error ${code}: ${LIS200_ERROR_MESSAGES[code] ?? 'Unknown error code'}`);
    this.name = 'Lis200ProtocolError';
    this.code = code;
  }
}

const LIS200_ERROR_REGEX = /^#(\d{4})/;

/**
 * LIS-200 reports errors as values of the form `#0018`. The first one found is thrown.
 */
export class Lis200ErrorParser implements ErrorParser {
  checkForErrors(answer: DataMessage): void {
    for (const dataSet of answer.data) {
      const match = LIS200_ERROR_REGEX.exec(dataSet.value);
      if (match?.[1] !== undefined) {
        throw new Lis200ProtocolError(Number.parseInt(match[1], 10));
      }
    }
  }
}
