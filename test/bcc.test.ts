import { describe, it, expect } from 'vitest';
import {
  addBcc,
  addBccToString,
  calculateBcc,
  isBccValid,
  isBccValidString,
} from '../src/utils/bcc.js';
import { Iec62056FramingError } from '../src/errors.js';
import { encodeText } from '../src/utils/utils.js';

describe('calculateBcc', () => {
  it('XORs the bytes into 7 bits', () => {
    expect(calculateBcc(encodeText('P0\x02(1234567)\x03'))).toBe(0x50);
  });

  it('ignores the eighth bit', () => {
    expect(calculateBcc(Uint8Array.of(0xe9, 0x03))).toBe(0x6a);
    expect(calculateBcc(Uint8Array.of(0x69, 0x03))).toBe(0x6a);
  });

  it('is 0 for no bytes', () => {
    expect(calculateBcc(new Uint8Array(0))).toBe(0);
  });
});

describe('addBcc', () => {
  it('appends the BCC computed after SOH', () => {
    expect(addBccToString('\x01P0\x02(1234567)\x03')).toBe('\x01P0\x02(1234567)\x03P');
    expect(addBccToString('\x01W2\x02C.1.0(42)\x03')).toBe('\x01W2\x02C.1.0(42)\x03!');
  });

  it('covers the STX when an SOH is present', () => {
    // From the SOH: "R1<STX>1.8.0(1)<ETX>"; from the STX it would be "1.8.0(1)<ETX>" = 0x0a
    expect(addBccToString('\x01R1\x021.8.0(1)\x03')).toBe('\x01R1\x021.8.0(1)\x03k');
  });

  it('starts after STX when there is no SOH', () => {
    expect(addBccToString('\x021.8.0(1)\x03')).toBe('\x021.8.0(1)\x03\n');
  });

  it('uses the last STX', () => {
    const result = addBcc(encodeText('\x02ab\x02cd\x03'));
    expect(result[result.length - 1]).toBe(0x04);
  });

  it('does not modify its input', () => {
    const input = encodeText('\x01B0\x03');
    const result = addBcc(input);
    expect(input.length).toBe(4);
    expect(Array.from(result)).toEqual([0x01, 0x42, 0x30, 0x03, 0x71]);
  });

  it('throws without SOH or STX', () => {
    expect(() => addBcc(encodeText('1.8.0(1)\x03'))).toThrow(Iec62056FramingError);
  });
});

describe('isBccValid', () => {
  it('accepts a correct BCC', () => {
    expect(isBccValidString('\x01P0\x02(1234567)\x03P')).toBe(true);
    expect(isBccValidString('\x023:171.0(0)\x03\x12')).toBe(true);
  });

  it('rejects a wrong BCC', () => {
    expect(isBccValidString('\x01P0\x02(1234567)\x03X')).toBe(false);
  });

  it('rejects messages shorter than two bytes', () => {
    expect(isBccValid(new Uint8Array(0))).toBe(false);
    expect(isBccValid(Uint8Array.of(0x02))).toBe(false);
  });

  it('rejects messages without a start marker instead of throwing', () => {
    expect(isBccValidString('abc\x03b')).toBe(false);
  });
});
