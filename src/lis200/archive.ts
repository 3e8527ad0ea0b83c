// src/lis200/archive.ts

import { ETX, SOH, STX } from '../constants/constants.js';
import { Iec62056ParseError, Iec62056ValidationError } from '../errors.js';
import type { AnswerDataMessage } from '../messages/answer-data-message.js';
import { addBccToString } from '../utils/bcc.js';
import { encodeText } from '../utils/utils.js';

const LIS200_DATETIME_REGEX = /^(\d{4})-(\d{2})-(\d{2}),(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Formats a wall-clock time as LIS-200 expects it: `YYYY-MM-DD,HH:MM:SS`.
 * The device has no notion of time zones, so the local fields of the date are used.
 */
export function formatLis200Datetime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())},` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parses `YYYY-MM-DD,HH:MM:SS`.
 * @param utcOffset - offset of the device clock from UTC in seconds; without it the
 *   fields are read as local time
 */
export function parseLis200Datetime(text: string, utcOffset?: number): Date {
  const match = LIS200_DATETIME_REGEX.exec(text);
  if (!match) {
    throw new Iec62056ParseError(`Invalid LIS-200 datetime: ${JSON.stringify(text)}`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);
  if (utcOffset === undefined) {
    return new Date(year, month - 1, day, hour, minute, second);
  }
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second) - utcOffset * 1000);
}

export interface ArchiveReadoutCommandInit {
  archive: number;
  /** Lower limit (oldest row); empty for the oldest available */
  start?: string;
  /** Upper limit (newest row); empty for the newest available */
  end?: string;
  /** Column of the controlling value, 1-99 */
  position?: number;
  /**
   * 0 value, 1 access rights, 2 description, 3 units (text), 4 source, 5 units (code),
   * 6 format, 7 data type, 8 settable source, A number of data sets in range
   */
  attribute?: string;
  partialBlocks?: boolean;
  rowsPerBlock?: number;
}

/**
 * LIS-200 archive readout: `SOH R1 STX {archive}:V.{attribute}({position};{start};{end};{rows}) ETX bcc`,
 * `R3` with a row count when partial blocks are requested.
 */
export class ArchiveReadoutCommand {
  readonly archive: number;
  readonly start: string;
  readonly end: string;
  readonly position: number;
  readonly attribute: string;
  readonly partialBlocks: boolean;
  readonly rowsPerBlock: number;

  constructor({
    archive,
    start = '',
    end = '',
    position = 1,
    attribute = '0',
    partialBlocks = false,
    rowsPerBlock = 10,
  }: ArchiveReadoutCommandInit) {
    if (!Number.isInteger(position) || position < 1 || position > 99) {
      throw new Iec62056ValidationError(`Archive position must be 1-99, got ${position}`);
    }
    this.archive = archive;
    this.start = start;
    this.end = end;
    this.position = position;
    this.attribute = attribute;
    this.partialBlocks = partialBlocks;
    this.rowsPerBlock = rowsPerBlock;
  }

  toRepresentation(): string {
    const command = this.partialBlocks ? 'R3' : 'R1';
    const rows = this.partialBlocks ? String(this.rowsPerBlock) : '';
    return addBccToString(
      `${SOH}${command}${STX}${this.archive}:V.${this.attribute}` +
        `(${this.position};${this.start};${this.end};${rows})${ETX}`
    );
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }
}

export interface ArchiveDataPoint {
  timestamp: Date;
  value: string;
  address: string;
  unit: string | undefined;
}

/**
 * Joins the three reads an archive needs into data points: the values (attribute 0),
 * the column addresses (attribute 4) and the column units (attribute 3).
 */
export class ArchiveReadout {
  readonly values: AnswerDataMessage;
  readonly addresses: AnswerDataMessage;
  readonly units: AnswerDataMessage;
  /** 1-based column holding the row timestamp */
  readonly datetimePosition: number;
  readonly utcOffset: number | undefined;

  constructor(
    values: AnswerDataMessage,
    addresses: AnswerDataMessage,
    units: AnswerDataMessage,
    datetimePosition: number,
    utcOffset?: number
  ) {
    this.values = values;
    this.addresses = addresses;
    this.units = units;
    this.datetimePosition = datetimePosition;
    this.utcOffset = utcOffset;
  }

  get data(): ArchiveDataPoint[] {
    const addresses = this.addresses.dataBlock.dataLines[0]?.dataSets ?? [];
    const units = this.units.dataBlock.dataLines[0]?.dataSets ?? [];
    const points: ArchiveDataPoint[] = [];

    for (const line of this.values.dataBlock.dataLines) {
      const stamp = line.dataSets[this.datetimePosition - 1];
      if (!stamp) {
        throw new Iec62056ParseError(`Archive row has no column ${this.datetimePosition}`);
      }
      const timestamp = parseLis200Datetime(stamp.value, this.utcOffset);

      line.dataSets.forEach((dataSet, i) => {
        const unit = units[i]?.value;
        points.push({
          timestamp,
          value: dataSet.value,
          address: (addresses[i]?.value ?? '').replace(/^0+/, ''),
          unit: unit ? unit : undefined,
        });
      });
    }
    return points;
  }
}
