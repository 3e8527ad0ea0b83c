// src/messages/data.ts

import { LINE_END } from '../constants/constants.js';
import { Iec62056ParseError } from '../errors.js';
import { decodeText, encodeText } from '../utils/utils.js';
import type { Representable } from './types.js';

const DATA_SET_REGEX = /^(.+)\((.*)\)/;
const DATA_SET_VALUE_UNIT_REGEX = /^(.*)\*(.*)/;
const DATA_SET_JUST_VALUE_REGEX = /^\((.*)\)/;
const LINE_SPLIT_REGEX = /\r\n|\n|\r/;

export interface DataSetInit {
  value: string;
  address?: string;
  unit?: string;
}

/**
 * The smallest component of a response: `{address}({value}*{unit})`.
 * Address and unit are optional.
 */
export class DataSet implements Representable {
  readonly value: string;
  readonly address: string | undefined;
  readonly unit: string | undefined;

  constructor({ value, address, unit }: DataSetInit) {
    this.value = value;
    this.address = address;
    this.unit = unit;
  }

  toRepresentation(): string {
    if (this.address !== undefined && this.unit !== undefined) {
      return `${this.address}(${this.value}*${this.unit})`;
    }
    if (this.address !== undefined) {
      return `${this.address}(${this.value})`;
    }
    return `(${this.value})`;
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  /**
   * @throws Iec62056ParseError if no `(...)` part is found
   */
  static fromRepresentation(text: string): DataSet {
    const justValue = DATA_SET_JUST_VALUE_REGEX.exec(text);
    if (justValue) {
      return new DataSet({ value: justValue[1] ?? '' });
    }

    const match = DATA_SET_REGEX.exec(text);
    if (!match) {
      throw new Iec62056ParseError(`Unable to find address and data in ${JSON.stringify(text)}`);
    }
    const address = match[1] ?? '';
    const body = match[2] ?? '';

    const valueUnit = DATA_SET_VALUE_UNIT_REGEX.exec(body);
    if (valueUnit) {
      return new DataSet({ address, value: valueUnit[1] ?? '', unit: valueUnit[2] ?? '' });
    }
    return new DataSet({ address, value: body });
  }

  static fromBytes(bytes: Uint8Array): DataSet {
    return DataSet.fromRepresentation(decodeText(bytes));
  }
}

/**
 * A list of data sets written back to back: `id(value*unit)id(value*unit)`.
 */
export class DataLine implements Representable {
  readonly dataSets: readonly DataSet[];

  constructor(dataSets: readonly DataSet[]) {
    this.dataSets = dataSets;
  }

  toRepresentation(): string {
    return this.dataSets.map(set => set.toRepresentation()).join('');
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  /**
   * Splits after every `)`; anything after the last `)` is ignored.
   */
  static fromRepresentation(text: string): DataLine {
    const dataSets: DataSet[] = [];
    let rest = text;
    let index = rest.indexOf(')');
    while (index !== -1) {
      dataSets.push(DataSet.fromRepresentation(rest.slice(0, index + 1)));
      rest = rest.slice(index + 1);
      index = rest.indexOf(')');
    }
    return new DataLine(dataSets);
  }

  static fromBytes(bytes: Uint8Array): DataLine {
    return DataLine.fromRepresentation(decodeText(bytes));
  }
}

/**
 * A list of data lines, each terminated by CR LF.
 */
export class DataBlock implements Representable {
  readonly dataLines: readonly DataLine[];

  constructor(dataLines: readonly DataLine[]) {
    this.dataLines = dataLines;
  }

  toRepresentation(): string {
    return this.dataLines.map(line => line.toRepresentation() + LINE_END).join('');
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  /**
   * Every line is parsed on its own; a trailing line break does not add an empty line.
   */
  static fromRepresentation(text: string): DataBlock {
    const lines = text.split(LINE_SPLIT_REGEX);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return new DataBlock(lines.map(line => DataLine.fromRepresentation(line)));
  }

  static fromBytes(bytes: Uint8Array): DataBlock {
    return DataBlock.fromRepresentation(decodeText(bytes));
  }
}
