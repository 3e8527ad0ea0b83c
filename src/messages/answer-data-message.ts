// src/messages/answer-data-message.ts

import { END_CHAR, ETX, LINE_END, STX } from '../constants/constants.js';
import { Iec62056ChecksumError, Iec62056ParseError } from '../errors.js';
import { addBccToString, isBccValidString } from '../utils/bcc.js';
import { decodeText, encodeText } from '../utils/utils.js';
import { DataBlock, DataSet } from './data.js';
import type { IecMessage } from './types.js';

const READOUT_TRAILER = `${END_CHAR}${LINE_END}${ETX}`;

function flatten(block: DataBlock): readonly DataSet[] {
  return block.dataLines.flatMap(line => line.dataSets);
}

/**
 * Strips the STX header and the given trailer (which precedes the BCC) after checking the BCC.
 */
function unwrap(text: string, trailer: string): string {
  if (!text.startsWith(STX)) {
    throw new Iec62056ParseError(`Data message must start with STX: ${JSON.stringify(text)}`);
  }
  if (!isBccValidString(text)) {
    throw new Iec62056ChecksumError();
  }
  const withoutBcc = text.slice(0, -1);
  if (!withoutBcc.endsWith(trailer)) {
    throw new Iec62056ParseError(`Data message must end with ${JSON.stringify(trailer)}`);
  }
  return withoutBcc.slice(STX.length, -trailer.length);
}

/**
 * Device answer in programming mode: `STX{datablock}ETX{bcc}`.
 */
export class AnswerDataMessage implements IecMessage {
  readonly kind = 'answer-data' as const;
  readonly dataBlock: DataBlock;
  private _data: readonly DataSet[] | null = null;

  constructor(dataBlock: DataBlock) {
    this.dataBlock = dataBlock;
  }

  /** All data sets of all lines, in order. */
  get data(): readonly DataSet[] {
    if (this._data === null) {
      this._data = flatten(this.dataBlock);
    }
    return this._data;
  }

  toRepresentation(): string {
    return addBccToString(`${STX}${this.dataBlock.toRepresentation()}${ETX}`);
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  /**
   * @throws Iec62056ChecksumError if the trailing BCC does not match
   */
  static fromRepresentation(text: string): AnswerDataMessage {
    return new AnswerDataMessage(DataBlock.fromRepresentation(unwrap(text, ETX)));
  }

  static fromBytes(bytes: Uint8Array): AnswerDataMessage {
    return AnswerDataMessage.fromRepresentation(decodeText(bytes));
  }
}

/**
 * Device answer to a standard readout: `STX{datablock}!\r\nETX{bcc}`.
 */
export class ReadoutDataMessage implements IecMessage {
  readonly kind = 'readout-data' as const;
  readonly dataBlock: DataBlock;
  private _data: readonly DataSet[] | null = null;

  constructor(dataBlock: DataBlock) {
    this.dataBlock = dataBlock;
  }

  get data(): readonly DataSet[] {
    if (this._data === null) {
      this._data = flatten(this.dataBlock);
    }
    return this._data;
  }

  toRepresentation(): string {
    return addBccToString(`${STX}${this.dataBlock.toRepresentation()}${READOUT_TRAILER}`);
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  static fromRepresentation(text: string): ReadoutDataMessage {
    return new ReadoutDataMessage(DataBlock.fromRepresentation(unwrap(text, READOUT_TRAILER)));
  }

  static fromBytes(bytes: Uint8Array): ReadoutDataMessage {
    return ReadoutDataMessage.fromRepresentation(decodeText(bytes));
  }
}
