// src/constants/constants.ts

/**
 * IEC 62056-21 control characters (byte values)
 */
export const CONTROL_BYTES = {
  NUL: 0x00,
  SOH: 0x01,
  STX: 0x02,
  ETX: 0x03,
  EOT: 0x04,
  ACK: 0x06,
  LF: 0x0a,
  CR: 0x0d,
  NACK: 0x15,
} as const;

/**
 * The same control characters as one-character strings, for building representations
 */
export const SOH = '\x01';
export const STX = '\x02';
export const ETX = '\x03';
export const EOT = '\x04';
export const ACK = '\x06';
export const NACK = '\x15';
export const LINE_END = '\r\n';
export const START_CHAR = '/';
export const REQUEST_CHAR = '?';
export const END_CHAR = '!';

/** Wire encoding: one byte per character */
export const ENCODING = 'latin1' as const;

/**
 * Mode C switchover baud rates, keyed by the character sent in the identification message
 */
export const BAUDRATES_MODE_C = {
  '0': 300,
  '1': 600,
  '2': 1200,
  '3': 2400,
  '4': 4800,
  '5': 9600,
  '6': 19200,
} as const;

export type BaudrateChar = keyof typeof BAUDRATES_MODE_C;

/**
 * Mode control characters for the option select message
 */
export const MODE_CONTROL_CHARACTER = {
  readout: '0',
  programming: '1',
  binary: '2',
  manufacturer6: '6',
  manufacturer7: '7',
  manufacturer8: '8',
  manufacturer9: '9',
} as const;

export type ProtocolMode = keyof typeof MODE_CONTROL_CHARACTER;

export const ALLOWED_COMMANDS = ['P', 'W', 'R', 'E', 'B'] as const;
export type Command = (typeof ALLOWED_COMMANDS)[number];

export const ALLOWED_COMMAND_TYPES = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;
export type CommandType = (typeof ALLOWED_COMMAND_TYPES)[number];

/** Reaction times in milliseconds */
export const REACTION_TIME = 200;
export const SHORT_REACTION_TIME = 20;

/** Rest after the option select message is this many reaction times */
export const REST_FACTOR = 1.25;

/**
 * Battery powered wake-up sequence (normal variant)
 */
export const BATTERY_STARTUP = {
  DURATION_MS: 2200,
  INTERVAL_MS: 200,
  SETTLE_MS: 1500,
} as const;

export const DEFAULT_PASSWORD = '00000000';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_CHECKSUM_RETRIES = 5;
