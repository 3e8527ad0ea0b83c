// src/messages/types.ts

/**
 * Anything with a wire representation. Bytes are the representation in the
 * one-byte-per-character protocol encoding.
 */
export interface Representable {
  toRepresentation(): string;
  toBytes(): Uint8Array;
}

export type MessageKind =
  | 'request'
  | 'identification'
  | 'ack-option-select'
  | 'command'
  | 'answer-data'
  | 'readout-data';

/**
 * Shared contract of every message that travels on the wire.
 */
export interface IecMessage extends Representable {
  readonly kind: MessageKind;
}
