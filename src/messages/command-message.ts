// src/messages/command-message.ts

import {
  ALLOWED_COMMANDS,
  ALLOWED_COMMAND_TYPES,
  ETX,
  SOH,
  STX,
  type Command,
  type CommandType,
} from '../constants/constants.js';
import { Iec62056ChecksumError, Iec62056ParseError, Iec62056ValidationError } from '../errors.js';
import { addBccToString, isBccValidString } from '../utils/bcc.js';
import { decodeText, encodeText } from '../utils/utils.js';
import { DataSet } from './data.js';
import type { IecMessage } from './types.js';

export interface CommandMessageInit {
  command: string;
  commandType: string | number;
  dataSet?: DataSet;
}

function isCommand(value: string): value is Command {
  return (ALLOWED_COMMANDS as readonly string[]).includes(value);
}

function isCommandType(value: string): value is CommandType {
  return (ALLOWED_COMMAND_TYPES as readonly string[]).includes(value);
}

/**
 * Client command in programming mode:
 * `SOH{cmd}{type}STX{dataset}ETX{bcc}`, or `SOH{cmd}{type}ETX{bcc}` without a data set.
 */
export class CommandMessage implements IecMessage {
  readonly kind = 'command' as const;
  readonly command: Command;
  readonly commandType: CommandType;
  readonly dataSet: DataSet | undefined;

  /**
   * @throws Iec62056ValidationError for a command letter outside P/W/R/E/B or a type outside 0-9
   */
  constructor({ command, commandType, dataSet }: CommandMessageInit) {
    const type = String(commandType);
    if (!isCommand(command)) {
      throw new Iec62056ValidationError(
        `Invalid command ${JSON.stringify(command)}, allowed: ${ALLOWED_COMMANDS.join(', ')}`
      );
    }
    if (!isCommandType(type)) {
      throw new Iec62056ValidationError(`Invalid command type ${JSON.stringify(type)}, allowed: 0-9`);
    }
    this.command = command;
    this.commandType = type;
    this.dataSet = dataSet;
  }

  toRepresentation(): string {
    const header = `${SOH}${this.command}${this.commandType}`;
    const body = this.dataSet ? `${STX}${this.dataSet.toRepresentation()}${ETX}` : ETX;
    return addBccToString(header + body);
  }

  toBytes(): Uint8Array {
    return encodeText(this.toRepresentation());
  }

  /**
   * @throws Iec62056ChecksumError if the trailing BCC does not match
   */
  static fromRepresentation(text: string): CommandMessage {
    if (!text.startsWith(SOH) || text.length < 5) {
      throw new Iec62056ParseError(`Not a command message: ${JSON.stringify(text)}`);
    }
    if (!isBccValidString(text)) {
      throw new Iec62056ChecksumError();
    }
    const message = text.slice(0, -1);
    const command = message.charAt(1);
    const commandType = message.charAt(2);
    const body = message.slice(3);

    if (body === ETX) {
      return new CommandMessage({ command, commandType });
    }
    if (!body.startsWith(STX) || !body.endsWith(ETX)) {
      throw new Iec62056ParseError(`Malformed command body: ${JSON.stringify(body)}`);
    }
    return new CommandMessage({
      command,
      commandType,
      dataSet: DataSet.fromRepresentation(body.slice(1, -1)),
    });
  }

  static fromBytes(bytes: Uint8Array): CommandMessage {
    return CommandMessage.fromRepresentation(decodeText(bytes));
  }

  /**
   * `R1` read of a single address. Some devices expect additional data inside the
   * parentheses, e.g. the number of values to read.
   */
  static forSingleRead(address: string, additionalData?: string): CommandMessage {
    return new CommandMessage({
      command: 'R',
      commandType: '1',
      dataSet: new DataSet({ address, value: additionalData ?? '' }),
    });
  }

  /**
   * `W1` write of a single value.
   */
  static forSingleWrite(address: string, value: string): CommandMessage {
    return new CommandMessage({
      command: 'W',
      commandType: '1',
      dataSet: new DataSet({ address, value }),
    });
  }
}
