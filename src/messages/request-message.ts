// src/messages/request-message.ts

import { END_CHAR, LINE_END, REQUEST_CHAR, START_CHAR } from '../constants/constants.js';
import { Iec62056ParseError } from '../errors.js';
import { decodeText, encodeText } from '../utils/utils.js';
import type { IecMessage } from './types.js';

/**
 * Opens a session: `/?{address}!\r\n`. The address is left empty on point-to-point links.
 */
export class RequestMessage implements IecMessage {
  readonly kind = 'request' as const;
  readonly deviceAddress: string;

  constructor(deviceAddress: string = '') {
    this.deviceAddress = deviceAddress;
  }

  toRepresentation(): string {
    return `${START_CHAR}${REQUEST_CHAR}${this.deviceAddress}${END_CHAR}${LINE_END}`;
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  static fromRepresentation(text: string): RequestMessage {
    if (!text.startsWith(START_CHAR + REQUEST_CHAR) || !text.endsWith(END_CHAR + LINE_END)) {
      throw new Iec62056ParseError(`Not a request message: ${JSON.stringify(text)}`);
    }
    return new RequestMessage(text.slice(2, -3));
  }

  static fromBytes(bytes: Uint8Array): RequestMessage {
    return RequestMessage.fromRepresentation(decodeText(bytes));
  }
}
