// src/messages/identification-message.ts

import { LINE_END, START_CHAR } from '../constants/constants.js';
import { Iec62056ParseError } from '../errors.js';
import { decodeText, encodeText } from '../utils/utils.js';
import type { IecMessage } from './types.js';

export interface IdentificationMessageInit {
  identification: string;
  manufacturer: string;
  switchoverBaudrateChar: string;
}

/**
 * The device's answer to a request: `/{manufacturer:3}{baud}\{identification}\r\n`.
 */
export class IdentificationMessage implements IecMessage {
  readonly kind = 'identification' as const;
  readonly identification: string;
  readonly manufacturer: string;
  readonly switchoverBaudrateChar: string;

  constructor({ identification, manufacturer, switchoverBaudrateChar }: IdentificationMessageInit) {
    this.identification = identification;
    this.manufacturer = manufacturer;
    this.switchoverBaudrateChar = switchoverBaudrateChar;
  }

  /**
   * A lowercase third manufacturer letter announces the 20 ms reaction time.
   */
  get usesShortReactionTime(): boolean {
    const last = this.manufacturer.charAt(2);
    return last !== '' && last !== last.toUpperCase() && last === last.toLowerCase();
  }

  toRepresentation(): string {
    return `${START_CHAR}${this.manufacturer}${this.switchoverBaudrateChar}\\${this.identification}${LINE_END}`;
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  static fromRepresentation(text: string): IdentificationMessage {
    if (!text.startsWith(START_CHAR) || text.length < 6) {
      throw new Iec62056ParseError(`Not an identification message: ${JSON.stringify(text)}`);
    }
    const body = text.endsWith(LINE_END) ? text.slice(0, -LINE_END.length) : text;
    return new IdentificationMessage({
      manufacturer: body.slice(1, 4),
      switchoverBaudrateChar: body.charAt(4),
      identification: body.slice(6),
    });
  }

  static fromBytes(bytes: Uint8Array): IdentificationMessage {
    return IdentificationMessage.fromRepresentation(decodeText(bytes));
  }
}
