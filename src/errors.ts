/**
 * Base class for every error raised by the flooding node.
 */
export class FloodError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "FloodError";
  }
}

export class MessageTooLargeError extends FloodError {
  constructor(byteLength: number, maxBytes: number) {
    super(
      `Message content is ${byteLength} bytes, at most ${maxBytes} fit in a frame`,
      "MESSAGE_TOO_LARGE",
      { byteLength, maxBytes }
    );
    this.name = "MessageTooLargeError";
  }
}

/**
 * Content carrying a NUL byte would be cut short at the frame separator.
 */
export class InvalidContentError extends FloodError {
  constructor(reason: string) {
    super(`Invalid message content: ${reason}`, "INVALID_CONTENT", { reason });
    this.name = "InvalidContentError";
  }
}

export class MissingSeparatorError extends FloodError {
  constructor() {
    super("Frame has no separator byte", "MISSING_SEPARATOR");
    this.name = "MissingSeparatorError";
  }
}

export class CorruptIdError extends FloodError {
  constructor(reason: string) {
    super(`Corrupt message id: ${reason}`, "CORRUPT_ID", { reason });
    this.name = "CorruptIdError";
  }
}

export type ChannelName = "accept" | "command";

/**
 * A producer feeding the node has gone away. The node cannot continue.
 */
export class ChannelClosedError extends FloodError {
  constructor(public readonly channel: ChannelName) {
    super(`The ${channel} channel was closed`, "CHANNEL_CLOSED", { channel });
    this.name = "ChannelClosedError";
  }
}

export class CommandParseError extends FloodError {
  constructor(input: string, reason: string) {
    super(`Cannot parse command "${input}": ${reason}`, "COMMAND_PARSE", {
      input,
      reason,
    });
    this.name = "CommandParseError";
  }
}

export class InvalidAddressError extends FloodError {
  constructor(address: string) {
    super(
      `Invalid socket address "${address}", expected ip:port`,
      "INVALID_ADDRESS",
      { address }
    );
    this.name = "InvalidAddressError";
  }
}

export class ConnectionClosedError extends FloodError {
  constructor(address: string) {
    super(`Connection to ${address} is closed`, "CONNECTION_CLOSED", {
      address,
    });
    this.name = "ConnectionClosedError";
  }
}

/**
 * The peer is not draining its socket and its outgoing buffer is full.
 */
export class WriteBufferFullError extends FloodError {
  constructor(address: string, pendingBytes: number, limit: number) {
    super(
      `Outgoing buffer for ${address} holds ${pendingBytes} bytes, limit is ${limit}`,
      "WRITE_BUFFER_FULL",
      { address, pendingBytes, limit }
    );
    this.name = "WriteBufferFullError";
  }
}
