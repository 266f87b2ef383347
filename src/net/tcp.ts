import { createConnection, createServer, Server, Socket } from "net";
import { Logger } from "../logger";
import { parseSocketAddress } from "./address";
import { Channel } from "./channel";
import { PeerConnection } from "./connection";
import { StreamPeerConnection } from "./streamConnection";

/**
 * Opens outbound connections for `connect` commands.
 */
export interface Dialer {
  dial(address: string): Promise<PeerConnection>;
}

/**
 * Ends the accept channel once a listening server fails or closes. The
 * channel closes on the error itself, without waiting for open sockets to
 * drain before the server reports `close`.
 */
export function superviseListener(
  server: Server,
  accepted: Channel<PeerConnection>,
  logger: Logger
): void {
  server.on("error", (err) => {
    logger.error({ event: "accept_error", err }, "Listener failed");
    accepted.close();
    server.close();
  });
  server.on("close", () => accepted.close());
}

export class TcpAcceptor {
  private server?: Server;

  constructor(
    private readonly accepted: Channel<PeerConnection>,
    private readonly logger: Logger
  ) {}

  public listen(host: string, port: number): Promise<void> {
    const server = createServer((socket: Socket) => {
      const connection = StreamPeerConnection.fromSocket(socket);
      this.logger.debug(
        { event: "accept", peer: connection.remoteAddress },
        "Accepted inbound connection"
      );
      if (!this.accepted.send(connection)) {
        socket.destroy();
      }
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      const onListenError = (err: Error) => reject(err);
      server.once("error", onListenError);
      server.listen(port, host, () => {
        server.off("error", onListenError);
        superviseListener(server, this.accepted, this.logger);
        resolve();
      });
    });
  }

  public address(): string | undefined {
    const bound = this.server?.address();
    if (!bound || typeof bound === "string") return bound ?? undefined;
    return bound.family === "IPv6"
      ? `[${bound.address}]:${bound.port}`
      : `${bound.address}:${bound.port}`;
  }

  public close(): Promise<void> {
    const server = this.server;
    if (!server || !server.listening) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

export class TcpDialer implements Dialer {
  public async dial(address: string): Promise<PeerConnection> {
    const { host, port } = parseSocketAddress(address);

    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });
      const onError = (err: Error) => {
        socket.destroy();
        reject(err);
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(StreamPeerConnection.fromSocket(socket));
      });
    });
  }
}
