import readline from "readline";
import { Readable } from "stream";
import { CommandParseError } from "../errors";
import { Logger } from "../logger";
import { Channel } from "../net/channel";
import { Command, COMMAND_USAGE, parseCommand } from "./parse";

/**
 * Reads operator commands line by line and queues them for the node.
 * Malformed lines are reported and skipped. End of input closes the channel.
 */
export class StdinCommandSource {
  private rl?: readline.Interface;

  constructor(
    private readonly commands: Channel<Command>,
    private readonly logger: Logger,
    private readonly input: Readable = process.stdin
  ) {}

  public start(): void {
    if (this.rl) return;

    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => this.handleLine(line));
    rl.on("close", () => {
      this.logger.debug({ event: "commands_closed" }, "Command input closed");
      this.commands.close();
    });
    this.rl = rl;
  }

  public stop(): void {
    this.rl?.close();
  }

  private handleLine(line: string): void {
    if (!line.trim()) return;
    try {
      this.commands.send(parseCommand(line));
    } catch (err) {
      if (!(err instanceof CommandParseError)) throw err;
      this.logger.warn(
        { event: "command_rejected", input: line },
        `${err.message} (usage: ${COMMAND_USAGE})`
      );
    }
  }
}
