import { PassThrough } from "stream";
import { Command } from "../src/commands/parse";
import { StdinCommandSource } from "../src/commands/stdinSource";
import { createSilentLogger } from "../src/logger";
import { Channel } from "../src/net/channel";

const flush = () => new Promise((resolve) => setImmediate(resolve));

function drain(channel: Channel<Command>) {
  const received: Command[] = [];
  for (;;) {
    const next = channel.tryReceive();
    if (next.kind !== "item") return { received, last: next.kind };
    received.push(next.value);
  }
}

describe("StdinCommandSource", () => {
  it("queues well-formed commands and skips bad lines", async () => {
    const input = new PassThrough();
    const commands = new Channel<Command>();
    const source = new StdinCommandSource(commands, createSilentLogger(), input);
    source.start();

    input.write("broadcast hello\n");
    input.write("launch rockets\n");
    input.write("\n");
    input.write("connect 127.0.0.1:7001\ndisconnect\n");
    await flush();

    expect(drain(commands)).toEqual({
      received: [
        { type: "broadcast", text: "hello" },
        { type: "connect", address: "127.0.0.1:7001" },
        { type: "disconnect" },
      ],
      last: "empty",
    });
    source.stop();
  });

  it("closes the channel at end of input", async () => {
    const input = new PassThrough();
    const commands = new Channel<Command>();
    new StdinCommandSource(commands, createSilentLogger(), input).start();

    input.end("broadcast bye\n");
    await flush();
    await flush();

    expect(drain(commands)).toEqual({
      received: [{ type: "broadcast", text: "bye" }],
      last: "closed",
    });
  });
});
