import { describe, it, expect } from 'vitest';
import {
  AckOptionSelectMessage,
  AnswerDataMessage,
  CommandMessage,
  DataBlock,
  DataLine,
  DataSet,
  IdentificationMessage,
  ReadoutDataMessage,
  RequestMessage,
} from '../src/messages/index.js';
import type { WireMessage } from '../src/messages/index.js';
import {
  Iec62056ChecksumError,
  Iec62056ParseError,
  Iec62056ValidationError,
} from '../src/errors.js';
import { decodeText } from '../src/utils/utils.js';

describe('DataSet', () => {
  it('parses address, value and unit', () => {
    const dataSet = DataSet.fromRepresentation('1.8.0(00012345.6*kWh)');
    expect(dataSet.address).toBe('1.8.0');
    expect(dataSet.value).toBe('00012345.6');
    expect(dataSet.unit).toBe('kWh');
  });

  it('parses address and value without unit', () => {
    const dataSet = DataSet.fromRepresentation('0.9.1(123456)');
    expect(dataSet.address).toBe('0.9.1');
    expect(dataSet.value).toBe('123456');
    expect(dataSet.unit).toBeUndefined();
  });

  it('parses a bare value', () => {
    const dataSet = DataSet.fromRepresentation('(1234)');
    expect(dataSet.address).toBeUndefined();
    expect(dataSet.value).toBe('1234');
  });

  it('accepts an empty value', () => {
    expect(DataSet.fromRepresentation('()').value).toBe('');
  });

  it('renders the three shapes', () => {
    expect(new DataSet({ address: '1.8.0', value: '5', unit: 'kWh' }).toRepresentation()).toBe(
      '1.8.0(5*kWh)'
    );
    expect(new DataSet({ address: '1.8.0', value: '5' }).toRepresentation()).toBe('1.8.0(5)');
    expect(new DataSet({ value: '5' }).toRepresentation()).toBe('(5)');
  });

  it('throws on text without parentheses', () => {
    expect(() => DataSet.fromRepresentation('1.8.0')).toThrow(Iec62056ParseError);
  });
});

describe('DataLine', () => {
  it('splits after each closing parenthesis', () => {
    const line = DataLine.fromRepresentation('3:14(314*kWh)4:15(415*kWh)');
    expect(line.dataSets.map(set => set.address)).toEqual(['3:14', '4:15']);
    expect(line.dataSets.map(set => set.value)).toEqual(['314', '415']);
    expect(line.toRepresentation()).toBe('3:14(314*kWh)4:15(415*kWh)');
  });

  it('yields no data sets for an empty line', () => {
    expect(DataLine.fromRepresentation('').dataSets).toHaveLength(0);
  });
});

describe('DataBlock', () => {
  it('ends every line with CR LF', () => {
    const block = DataBlock.fromRepresentation('1.8.0(1)\r\n2.8.0(2)\r\n');
    expect(block.dataLines).toHaveLength(2);
    expect(block.toRepresentation()).toBe('1.8.0(1)\r\n2.8.0(2)\r\n');
  });

  it('accepts bare LF and CR line breaks', () => {
    const block = DataBlock.fromRepresentation('a(1)\nb(2)\rc(3)');
    expect(block.dataLines).toHaveLength(3);
    expect(block.toRepresentation()).toBe('a(1)\r\nb(2)\r\nc(3)\r\n');
  });
});

describe('AnswerDataMessage', () => {
  const text = '\x023:14(314*kWh)4:15(415*kWh)\r\n\x03\x04';

  it('parses the data block', () => {
    const message = AnswerDataMessage.fromRepresentation(text);
    expect(message.kind).toBe('answer-data');
    expect(message.data).toHaveLength(2);
    expect(message.data[1]?.address).toBe('4:15');
    expect(message.data[1]?.value).toBe('415');
    expect(message.data[1]?.unit).toBe('kWh');
  });

  it('renders back to the same text', () => {
    expect(AnswerDataMessage.fromRepresentation(text).toRepresentation()).toBe(text);
  });

  it('memoises the flattened data', () => {
    const message = AnswerDataMessage.fromRepresentation(text);
    expect(message.data).toBe(message.data);
  });

  it('rejects a wrong BCC', () => {
    expect(() => AnswerDataMessage.fromRepresentation('\x023:14(314*kWh)\r\n\x03Z')).toThrow(
      Iec62056ChecksumError
    );
  });

  it('rejects text without STX', () => {
    expect(() => AnswerDataMessage.fromRepresentation('3:14(314)\x03\x04')).toThrow(
      Iec62056ParseError
    );
  });
});

describe('ReadoutDataMessage', () => {
  const text = '\x023:14(314*kWh)4:15(415*kWh)\r\n!\r\n\x03"';

  it('strips the end marker', () => {
    const message = ReadoutDataMessage.fromRepresentation(text);
    expect(message.kind).toBe('readout-data');
    expect(message.dataBlock.dataLines).toHaveLength(1);
    expect(message.data.map(set => set.value)).toEqual(['314', '415']);
    expect(message.toRepresentation()).toBe(text);
  });
});

describe('CommandMessage', () => {
  it('builds a single read', () => {
    expect(CommandMessage.forSingleRead('1.8.0', '1').toRepresentation()).toBe(
      '\x01R1\x021.8.0(1)\x03k'
    );
  });

  it('builds a single write', () => {
    expect(decodeText(CommandMessage.forSingleWrite('0.9.1', '123456').toBytes())).toBe(
      '\x01W1\x020.9.1(123456)\x03Y'
    );
  });

  it('renders a command without data set', () => {
    expect(new CommandMessage({ command: 'B', commandType: 0 }).toRepresentation()).toBe(
      '\x01B0\x03q'
    );
  });

  it('parses a password challenge', () => {
    const message = CommandMessage.fromRepresentation('\x01P0\x02(1234567)\x03P');
    expect(message.command).toBe('P');
    expect(message.commandType).toBe('0');
    expect(message.dataSet?.value).toBe('1234567');
    expect(message.dataSet?.address).toBeUndefined();
  });

  it('parses a command without data set', () => {
    const message = CommandMessage.fromRepresentation('\x01B0\x03q');
    expect(message.command).toBe('B');
    expect(message.dataSet).toBeUndefined();
  });

  it('rejects a wrong BCC', () => {
    expect(() => CommandMessage.fromRepresentation('\x01P0\x02(1234567)\x03X')).toThrow(
      Iec62056ChecksumError
    );
  });

  it('validates command and type', () => {
    expect(() => new CommandMessage({ command: 'X', commandType: '1' })).toThrow(
      Iec62056ValidationError
    );
    expect(() => new CommandMessage({ command: 'R', commandType: 10 })).toThrow(
      Iec62056ValidationError
    );
  });
});

describe('RequestMessage', () => {
  it('renders with and without address', () => {
    expect(new RequestMessage().toRepresentation()).toBe('/?!\r\n');
    expect(new RequestMessage('12345678').toRepresentation()).toBe('/?12345678!\r\n');
  });

  it('parses the address', () => {
    expect(RequestMessage.fromRepresentation('/?12345678!\r\n').deviceAddress).toBe('12345678');
  });
});

describe('IdentificationMessage', () => {
  it('parses manufacturer, baud character and identification', () => {
    const message = IdentificationMessage.fromRepresentation('/Els6\\2EK280\r\n');
    expect(message.manufacturer).toBe('Els');
    expect(message.switchoverBaudrateChar).toBe('6');
    expect(message.identification).toBe('2EK280');
    expect(message.usesShortReactionTime).toBe(true);
    expect(message.toRepresentation()).toBe('/Els6\\2EK280\r\n');
  });

  it('uses the standard reaction time for an uppercase manufacturer', () => {
    const message = IdentificationMessage.fromRepresentation('/ABC5\\METER01\r\n');
    expect(message.usesShortReactionTime).toBe(false);
  });

  it('rejects short or unmarked text', () => {
    expect(() => IdentificationMessage.fromRepresentation('/ABC')).toThrow(Iec62056ParseError);
    expect(() => IdentificationMessage.fromRepresentation('ABC5\\METER01\r\n')).toThrow(
      Iec62056ParseError
    );
  });
});

describe('AckOptionSelectMessage', () => {
  it('renders protocol, baud and mode', () => {
    const message = new AckOptionSelectMessage({ baudChar: '5', modeChar: '1' });
    expect(message.toRepresentation()).toBe('\x06051\r\n');
  });

  it('parses its fields', () => {
    const message = AckOptionSelectMessage.fromRepresentation('\x06060\r\n');
    expect(message.protocolChar).toBe('0');
    expect(message.baudChar).toBe('6');
    expect(message.modeChar).toBe('0');
  });
});

describe('WireMessage', () => {
  it('is discriminated by kind', () => {
    const messages: WireMessage[] = [
      new RequestMessage(),
      new AckOptionSelectMessage({ baudChar: '5', modeChar: '0' }),
      new CommandMessage({ command: 'B', commandType: '0' }),
    ];
    expect(messages.map(message => message.kind)).toEqual([
      'request',
      'ack-option-select',
      'command',
    ]);
  });
});
