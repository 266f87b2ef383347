import { CommandParseError } from "../errors";
import { formatSocketAddress, parseSocketAddress } from "../net/address";

export type Command =
  | { type: "connect"; address: string }
  | { type: "broadcast"; text: string }
  | { type: "disconnect" };

export const COMMAND_USAGE =
  "connect <ip:port> | broadcast <text> | disconnect";

/**
 * Parses one line of operator input.
 *
 * `broadcast` keeps everything after the first space verbatim, inner
 * whitespace included.
 */
export function parseCommand(line: string): Command {
  const input = line.replace(/[\r\n]+$/, "").trimStart();
  const space = input.indexOf(" ");
  const verb = space === -1 ? input.trimEnd() : input.slice(0, space);
  const args = space === -1 ? "" : input.slice(space + 1);

  switch (verb) {
    case "connect": {
      if (!args.trim()) {
        throw new CommandParseError(line, "connect needs an address");
      }
      try {
        const { host, port } = parseSocketAddress(args);
        return { type: "connect", address: formatSocketAddress(host, port) };
      } catch (err) {
        throw new CommandParseError(
          line,
          err instanceof Error ? err.message : String(err)
        );
      }
    }
    case "broadcast": {
      const text = args.trimEnd();
      if (!text) {
        throw new CommandParseError(line, "broadcast needs some text");
      }
      return { type: "broadcast", text };
    }
    case "disconnect":
      if (args.trim()) {
        throw new CommandParseError(line, "disconnect takes no arguments");
      }
      return { type: "disconnect" };
    case "":
      throw new CommandParseError(line, "empty command");
    default:
      throw new CommandParseError(line, `unknown command "${verb}"`);
  }
}
