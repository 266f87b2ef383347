import { v4 as uuidv4 } from "uuid";
import {
  CorruptIdError,
  InvalidContentError,
  MessageTooLargeError,
  MissingSeparatorError,
} from "../errors";

export const FRAME_CAPACITY = 128;
export const SEPARATOR_SIZE = 1;
export const ID_SIZE = 16;
export const MAX_CONTENT_BYTES = FRAME_CAPACITY - SEPARATOR_SIZE - ID_SIZE;

// Any 16 bytes form an id; the version and variant bits are not checked.
const ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * A unit of dissemination. `id` is the canonical UUID text of the 16 id
 * bytes carried on the wire; it is assigned once when the message is first
 * created and travels unchanged with every copy.
 */
export interface Message {
  readonly text: string;
  readonly id: string;
}

export function createMessage(text: string, id: string = uuidv4()): Message {
  if (text.includes("\u0000")) {
    throw new InvalidContentError("content must not contain a NUL byte");
  }
  const byteLength = Buffer.byteLength(text, "utf8");
  if (byteLength > MAX_CONTENT_BYTES) {
    throw new MessageTooLargeError(byteLength, MAX_CONTENT_BYTES);
  }
  if (!ID_PATTERN.test(id)) {
    throw new CorruptIdError(`"${id}" is not a UUID`);
  }
  return { text, id: id.toLowerCase() };
}

export function messageKey(message: Message): string {
  return `${message.id}:${message.text}`;
}

/**
 * Layout: content bytes, one 0x00 separator, 16 id bytes, zero padding up to
 * FRAME_CAPACITY.
 */
export function encodeFrame(message: Message): Buffer {
  const content = Buffer.from(message.text, "utf8");
  if (content.length > MAX_CONTENT_BYTES) {
    throw new MessageTooLargeError(content.length, MAX_CONTENT_BYTES);
  }

  const frame = Buffer.alloc(FRAME_CAPACITY);
  content.copy(frame, 0);
  frame.set(idToBytes(message.id), content.length + SEPARATOR_SIZE);
  return frame;
}

export function decodeFrame(frame: Uint8Array): Message {
  const separator = frame.indexOf(0);
  if (separator === -1) {
    throw new MissingSeparatorError();
  }

  const idStart = separator + SEPARATOR_SIZE;
  if (idStart + ID_SIZE > frame.length) {
    throw new CorruptIdError(
      `${frame.length - idStart} bytes follow the separator, ${ID_SIZE} needed`
    );
  }

  // Invalid UTF-8 sequences become U+FFFD instead of failing the frame.
  const text = Buffer.from(frame.subarray(0, separator)).toString("utf8");

  const id = idFromBytes(frame.subarray(idStart, idStart + ID_SIZE));
  return { text, id };
}

function idToBytes(id: string): Buffer {
  return Buffer.from(id.replace(/-/g, ""), "hex");
}

function idFromBytes(bytes: Uint8Array): string {
  const hex = Buffer.from(bytes).toString("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}
