import { describe, it, expect } from 'vitest';
import { NoopErrorParser } from '../src/error-parsers/error-parser.js';
import { Lis200ErrorParser, Lis200ProtocolError } from '../src/error-parsers/lis200.js';
import { Iec62056ProtocolError } from '../src/errors.js';
import { AnswerDataMessage, DataBlock, ReadoutDataMessage } from '../src/messages/index.js';

function answer(block: string): AnswerDataMessage {
  return new AnswerDataMessage(DataBlock.fromRepresentation(block));
}

describe('NoopErrorParser', () => {
  it('accepts anything', () => {
    expect(() => new NoopErrorParser().checkForErrors(answer('3:171.0(#0018)\r\n'))).not.toThrow();
  });
});

describe('Lis200ErrorParser', () => {
  const parser = new Lis200ErrorParser();

  it('throws the catalogued error', () => {
    expect(() => parser.checkForErrors(answer('3:171.0(#0018)\r\n'))).toThrow(
      'LIS-200 error 18: No read authorization'
    );
  });

  it('exposes the code on a protocol error', () => {
    try {
      parser.checkForErrors(answer('3:171.0(#0201)\r\n'));
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(Lis200ProtocolError);
      expect(err).toBeInstanceOf(Iec62056ProtocolError);
      expect(err instanceof Lis200ProtocolError && err.code).toBe(201);
      expect(err instanceof Error && err.name).toBe('Lis200ProtocolError');
    }
  });

  it('reports unknown codes generically', () => {
    expect(() => parser.checkForErrors(answer('(#0999)\r\n'))).toThrow(
      'LIS-200 error 999: Unknown error code'
    );
  });

  it('throws for the first error value found', () => {
    expect(() => parser.checkForErrors(answer('1(5)2(#0013)3(#0017)\r\n'))).toThrow(
      'LIS-200 error 13: Wrong input'
    );
  });

  it('ignores values that only resemble an error', () => {
    expect(() => parser.checkForErrors(answer('1(#12)2(0018#)\r\n'))).not.toThrow();
  });

  it('checks readout data too', () => {
    const readout = new ReadoutDataMessage(DataBlock.fromRepresentation('1(#0006)\r\n'));
    expect(() => parser.checkForErrors(readout)).toThrow(
      'LIS-200 error 6: Value outside of allowed range'
    );
  });
});
