import { Duplex } from "stream";
import { WriteBufferFullError } from "../src/errors";
import { StreamPeerConnection } from "../src/net/streamConnection";

const flush = () => new Promise((resolve) => setImmediate(resolve));

/**
 * In-process duplex: `push` feeds the connection, writes land in `sent`.
 */
function createStream() {
  const sent: Buffer[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      sent.push(chunk);
      callback();
    },
  });
  return { stream, sent };
}

describe("StreamPeerConnection", () => {
  it("reports would_block until a whole frame has arrived", async () => {
    const { stream } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");

    stream.push(Buffer.alloc(100, 1));
    await flush();
    expect(connection.tryRead()).toEqual({ kind: "would_block" });

    stream.push(Buffer.alloc(60, 2));
    await flush();
    const result = connection.tryRead();
    expect(result.kind).toBe("frame");
    if (result.kind === "frame") {
      expect(result.frame).toHaveLength(128);
      expect(result.frame[99]).toBe(1);
      expect(result.frame[100]).toBe(2);
    }
    // 32 bytes of the next frame are still pending.
    expect(connection.tryRead()).toEqual({ kind: "would_block" });
  });

  it("returns one frame per read when several are buffered", async () => {
    const { stream } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");

    stream.push(Buffer.concat([Buffer.alloc(128, 7), Buffer.alloc(128, 8)]));
    await flush();

    const first = connection.tryRead();
    const second = connection.tryRead();
    expect(first.kind === "frame" && first.frame[0]).toBe(7);
    expect(second.kind === "frame" && second.frame[0]).toBe(8);
    expect(connection.tryRead()).toEqual({ kind: "would_block" });
  });

  it("drains buffered frames before reporting end of stream", async () => {
    const { stream } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");

    stream.push(Buffer.alloc(128 + 10, 3));
    stream.push(null);
    await flush();
    await flush();

    expect(connection.tryRead().kind).toBe("frame");
    expect(connection.tryRead()).toEqual({ kind: "end" });
  });

  it("reports a stream error", async () => {
    const { stream } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");

    stream.destroy(new Error("connection reset"));
    await flush();

    const result = connection.tryRead();
    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error.message).toBe("connection reset");
    }
  });

  it("writes bytes to the stream", async () => {
    const { stream, sent } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");

    expect(connection.write(Buffer.from("abc"))).toEqual({ kind: "written", bytes: 3 });
    await flush();
    expect(Buffer.concat(sent).toString()).toBe("abc");
  });

  it("fails writes once a stalled peer's buffer is full", () => {
    // The write callback never fires, so nothing ever leaves the buffer.
    const stream = new Duplex({
      read() {},
      write() {},
    });
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000", 256);
    const frame = Buffer.alloc(128);

    expect(connection.write(frame)).toEqual({ kind: "written", bytes: 128 });
    expect(connection.write(frame)).toEqual({ kind: "written", bytes: 128 });
    const result = connection.write(frame);
    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toBeInstanceOf(WriteBufferFullError);
    }
  });

  it("refuses writes after shutdown and then reports end", async () => {
    const { stream } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");

    connection.shutdown();
    expect(connection.write(Buffer.from("late")).kind).toBe("error");

    await flush();
    await flush();
    expect(connection.tryRead()).toEqual({ kind: "end" });
  });

  it("notifies the readable listener on data", async () => {
    const { stream } = createStream();
    const connection = new StreamPeerConnection(stream, "10.0.0.1:7000");
    const listener = jest.fn();
    connection.onReadable(listener);

    stream.push(Buffer.alloc(4));
    await flush();
    expect(listener).toHaveBeenCalled();
  });
});
