// src/messages/index.ts

import type { AckOptionSelectMessage } from './ack-option-select-message.js';
import type { AnswerDataMessage, ReadoutDataMessage } from './answer-data-message.js';
import type { CommandMessage } from './command-message.js';
import type { IdentificationMessage } from './identification-message.js';
import type { RequestMessage } from './request-message.js';

export { DataSet, DataLine, DataBlock } from './data.js';
export type { DataSetInit } from './data.js';
export { RequestMessage } from './request-message.js';
export { IdentificationMessage } from './identification-message.js';
export type { IdentificationMessageInit } from './identification-message.js';
export { AckOptionSelectMessage } from './ack-option-select-message.js';
export type { AckOptionSelectMessageInit } from './ack-option-select-message.js';
export { CommandMessage } from './command-message.js';
export type { CommandMessageInit } from './command-message.js';
export { AnswerDataMessage, ReadoutDataMessage } from './answer-data-message.js';
export type { IecMessage, MessageKind, Representable } from './types.js';

/**
 * Every message of a mode C session, discriminated by `kind`.
 */
export type WireMessage =
  | RequestMessage
  | IdentificationMessage
  | AckOptionSelectMessage
  | CommandMessage
  | AnswerDataMessage
  | ReadoutDataMessage;

/**
 * What a framed read in a session can yield.
 */
export type ResponseMessage = CommandMessage | AnswerDataMessage;

/**
 * Messages carrying a data block.
 */
export type DataMessage = AnswerDataMessage | ReadoutDataMessage;
