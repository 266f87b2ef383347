export type ReadResult =
  | { kind: "frame"; frame: Uint8Array }
  | { kind: "would_block" }
  | { kind: "end" }
  | { kind: "error"; error: Error };

export type WriteResult =
  | { kind: "written"; bytes: number }
  | { kind: "error"; error: Error };

/**
 * A duplex, non-blocking byte stream to another node.
 *
 * `remoteAddress` is only used to recognise the peer a message came from; it
 * is not a stable identity across reconnects.
 */
export interface PeerConnection {
  readonly remoteAddress: string;

  /** Returns immediately with at most one complete frame. */
  tryRead(): ReadResult;

  /** Queues `bytes` for sending without waiting for the socket to drain. */
  write(bytes: Uint8Array): WriteResult;

  /** Closes both directions. The next `tryRead` reports `end`. */
  shutdown(): void;

  /** Called whenever new data, end of stream or an error arrives. */
  onReadable(listener: () => void): void;
}
