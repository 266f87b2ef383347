import { Socket } from "net";
import { Duplex } from "stream";
import { ConnectionClosedError, WriteBufferFullError } from "../errors";
import { FRAME_CAPACITY } from "../flood/message";
import { formatSocketAddress } from "./address";
import { PeerConnection, ReadResult, WriteResult } from "./connection";

/** Frames a peer may leave unsent before it is treated as failed. */
export const MAX_PENDING_FRAMES = 1024;

/**
 * Adapts an event-driven Node stream to the polled `PeerConnection` contract.
 * Incoming chunks are buffered until a whole frame is available, so a frame
 * split across TCP segments is still read in one piece.
 */
export class StreamPeerConnection implements PeerConnection {
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;
  private failure?: Error;
  private listener?: () => void;

  constructor(
    private readonly stream: Duplex,
    public readonly remoteAddress: string,
    private readonly maxPendingBytes = MAX_PENDING_FRAMES * FRAME_CAPACITY
  ) {
    stream.on("data", (chunk: Buffer) => {
      this.buffered = Buffer.concat([this.buffered, chunk]);
      this.notify();
    });
    stream.on("end", () => {
      this.ended = true;
      this.notify();
    });
    stream.on("close", () => {
      this.ended = true;
      this.notify();
    });
    stream.on("error", (err: Error) => {
      this.failure = err;
      this.notify();
    });
  }

  public static fromSocket(socket: Socket): StreamPeerConnection {
    const address = formatSocketAddress(
      socket.remoteAddress ?? "unknown",
      socket.remotePort ?? 0
    );
    socket.setNoDelay(true);
    return new StreamPeerConnection(socket, address);
  }

  public tryRead(): ReadResult {
    if (this.buffered.length >= FRAME_CAPACITY) {
      const frame = this.buffered.subarray(0, FRAME_CAPACITY);
      this.buffered = this.buffered.subarray(FRAME_CAPACITY);
      return { kind: "frame", frame };
    }
    if (this.failure) return { kind: "error", error: this.failure };
    // A partial frame left behind by a closed stream can never complete.
    if (this.ended) return { kind: "end" };
    return { kind: "would_block" };
  }

  public write(bytes: Uint8Array): WriteResult {
    if (this.failure) return { kind: "error", error: this.failure };
    if (this.ended || this.stream.destroyed || !this.stream.writable) {
      return {
        kind: "error",
        error: new ConnectionClosedError(this.remoteAddress),
      };
    }
    const pending = this.stream.writableLength + bytes.length;
    if (pending > this.maxPendingBytes) {
      return {
        kind: "error",
        error: new WriteBufferFullError(
          this.remoteAddress,
          this.stream.writableLength,
          this.maxPendingBytes
        ),
      };
    }
    this.stream.write(bytes);
    return { kind: "written", bytes: bytes.length };
  }

  public shutdown(): void {
    if (this.stream.destroyed) return;
    this.stream.end(() => this.stream.destroy());
  }

  public onReadable(listener: () => void): void {
    this.listener = listener;
  }

  private notify(): void {
    this.listener?.();
  }
}
