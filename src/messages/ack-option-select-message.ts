// src/messages/ack-option-select-message.ts

import { ACK, LINE_END } from '../constants/constants.js';
import { Iec62056ParseError } from '../errors.js';
import { decodeText, encodeText } from '../utils/utils.js';
import type { IecMessage } from './types.js';

export interface AckOptionSelectMessageInit {
  baudChar: string;
  modeChar: string;
  protocolChar?: string;
}

/**
 * Client's choice of mode and switchover baud: `ACK{protocol}{baud}{mode}\r\n`.
 */
export class AckOptionSelectMessage implements IecMessage {
  readonly kind = 'ack-option-select' as const;
  readonly protocolChar: string;
  readonly baudChar: string;
  readonly modeChar: string;

  constructor({ baudChar, modeChar, protocolChar = '0' }: AckOptionSelectMessageInit) {
    this.baudChar = baudChar;
    this.modeChar = modeChar;
    this.protocolChar = protocolChar;
  }

  toRepresentation(): string {
    return `${ACK}${this.protocolChar}${this.baudChar}${this.modeChar}${LINE_END}`;
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  static fromRepresentation(text: string): AckOptionSelectMessage {
    if (!text.startsWith(ACK) || text.length < 4) {
      throw new Iec62056ParseError(`Not an option select message: ${JSON.stringify(text)}`);
    }
    return new AckOptionSelectMessage({
      protocolChar: text.charAt(1),
      baudChar: text.charAt(2),
      modeChar: text.charAt(3),
    });
  }

  static fromBytes(bytes: Uint8Array): AckOptionSelectMessage {
    return AckOptionSelectMessage.fromRepresentation(decodeText(bytes));
  }
}
