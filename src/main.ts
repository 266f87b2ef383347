import { Command } from "./commands/parse";
import { StdinCommandSource } from "./commands/stdinSource";
import { Config } from "./config/types";
import { FloodNode } from "./flood/floodNode";
import { Message } from "./flood/message";
import { Logger } from "./logger";
import { Channel } from "./net/channel";
import { PeerConnection } from "./net/connection";
import { TcpAcceptor, TcpDialer } from "./net/tcp";

/**
 * Binds the listener, attaches stdin commands, dials the configured peers and
 * runs the node until a signal arrives or a producer dies.
 */
export async function runNode(config: Config, logger: Logger): Promise<void> {
  const accepted = new Channel<PeerConnection>();
  const commands = new Channel<Command>();

  const acceptor = new TcpAcceptor(accepted, logger);
  await acceptor.listen(config.node.host, config.node.port);
  logger.info(
    { event: "listening", address: acceptor.address() },
    `Listening on ${acceptor.address()}`
  );

  const node = new FloodNode({
    accepted,
    commands,
    dialer: new TcpDialer(),
    logger,
    dedupeMaxEntries: config.flood.dedupeMaxEntries,
    pollIntervalMs: config.flood.pollIntervalMs,
  });

  node.on("delivered", (message: Message, origin: string) => {
    process.stdout.write(`${origin}: ${message.text}\n`);
  });

  for (const address of config.node.peers) {
    commands.send({ type: "connect", address });
  }

  const stdin = new StdinCommandSource(commands, logger);
  stdin.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ event: "shutdown", signal }, "Stopping node");
    node.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await node.run();
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    for (const peer of node.peers) {
      peer.shutdown();
    }
    await acceptor.close();
    stdin.stop();
  }
}
