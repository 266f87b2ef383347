import { EventEmitter } from "events";
import { Command } from "../commands/parse";
import { ChannelClosedError, FloodError } from "../errors";
import { Logger } from "../logger";
import { Channel } from "../net/channel";
import { PeerConnection } from "../net/connection";
import { Dialer } from "../net/tcp";
import { Dedupe } from "./dedupe";
import { createMessage, decodeFrame, Message, messageKey } from "./message";
import { propagate } from "./propagate";
import { Waker } from "./waker";

export interface FloodNodeOptions {
  accepted: Channel<PeerConnection>;
  commands: Channel<Command>;
  dialer: Dialer;
  logger: Logger;
  dedupeMaxEntries?: number;
  pollIntervalMs?: number;
}

export type DropReason = "end" | "error";

interface Pending {
  message: Message;
  origin: string;
}

/**
 * Owns the live peer set and the dedup cache, and floods every newly seen
 * message. All state changes happen inside `tick()`, one iteration at a time:
 * accept, commands, peer reads, propagation.
 *
 * Events:
 * - `delivered` (message, origin) for each new message received from a peer
 * - `broadcast` (message) for each locally originated message
 * - `peerAdded` (address)
 * - `peerDropped` (address, reason)
 */
export class FloodNode extends EventEmitter {
  private peerSet: PeerConnection[] = [];
  private readonly seen: Dedupe<Message>;
  private readonly dialed = new Channel<PeerConnection>();
  private readonly waker = new Waker();
  private readonly pollIntervalMs: number;
  private running = false;
  private dialing = false;

  constructor(private readonly options: FloodNodeOptions) {
    super();
    this.seen = new Dedupe(options.dedupeMaxEntries ?? 16, messageKey);
    this.pollIntervalMs = options.pollIntervalMs ?? 50;

    const wake = () => this.waker.notify();
    options.accepted.onReadable(wake);
    options.commands.onReadable(wake);
    this.dialed.onReadable(wake);
  }

  public get peers(): readonly PeerConnection[] {
    return this.peerSet;
  }

  public get seenCount(): number {
    return this.seen.size;
  }

  /**
   * Runs iterations until `stop()` is called. Between iterations it waits for
   * a new connection, a command or a readable peer, at most `pollIntervalMs`.
   * Rejects with `ChannelClosedError` when the acceptor or command source dies.
   */
  public async run(): Promise<void> {
    this.running = true;
    while (this.running) {
      this.tick();
      if (!this.running) break;
      await this.waker.wait(this.pollIntervalMs);
    }
  }

  public stop(): void {
    this.running = false;
    this.waker.notify();
  }

  public tick(): void {
    this.drainConnections();
    this.drainCommands();

    const pending = this.readPeers();
    for (const { message, origin } of pending) {
      this.flood(message, origin);
    }
  }

  private drainConnections(): void {
    for (;;) {
      const next = this.options.accepted.tryReceive();
      if (next.kind === "closed") throw new ChannelClosedError("accept");
      if (next.kind === "empty") break;
      this.addPeer(next.value);
    }

    for (;;) {
      const next = this.dialed.tryReceive();
      if (next.kind !== "item") break;
      this.addPeer(next.value);
    }
  }

  /**
   * Stops early while a dial is in flight, so commands queued behind a
   * `connect` see the new peer once it has joined.
   */
  private drainCommands(): void {
    while (!this.dialing) {
      const next = this.options.commands.tryReceive();
      if (next.kind === "closed") throw new ChannelClosedError("command");
      if (next.kind === "empty") break;
      this.apply(next.value);
    }
  }

  private apply(command: Command): void {
    const { logger } = this.options;
    switch (command.type) {
      case "connect":
        this.dial(command.address);
        return;
      case "broadcast": {
        let message: Message;
        try {
          message = createMessage(command.text);
        } catch (err) {
          if (!(err instanceof FloodError)) throw err;
          logger.warn({ event: "broadcast_rejected", err }, err.message);
          return;
        }
        this.seen.push(message);
        this.emit("broadcast", message);
        logger.info(
          { event: "broadcast", id: message.id, peers: this.peerSet.length },
          "Broadcasting message"
        );
        this.flood(message, undefined);
        return;
      }
      case "disconnect":
        logger.info(
          { event: "disconnect", peers: this.peerSet.length },
          "Shutting down all peer connections"
        );
        for (const peer of this.peerSet) {
          peer.shutdown();
        }
        return;
    }
  }

  private dial(address: string): void {
    const { dialer, logger } = this.options;
    logger.info({ event: "connect", peer: address }, "Connecting to peer");
    this.dialing = true;
    void dialer.dial(address).then(
      (connection) => {
        this.dialing = false;
        if (!this.dialed.send(connection)) connection.shutdown();
      },
      (err: unknown) => {
        this.dialing = false;
        logger.warn({ event: "connect_failed", peer: address, err }, "Connect failed");
        this.waker.notify();
      }
    );
  }

  private readPeers(): Pending[] {
    const { logger } = this.options;
    const pending: Pending[] = [];

    this.peerSet = this.peerSet.filter((peer) => {
      const result = peer.tryRead();
      if (result.kind === "would_block") return true;
      if (result.kind === "end") {
        this.dropPeer(peer, "end");
        return false;
      }
      if (result.kind === "error") {
        logger.warn(
          { event: "read_failed", peer: peer.remoteAddress, err: result.error },
          "Dropping peer after read error"
        );
        peer.shutdown();
        this.dropPeer(peer, "error");
        return false;
      }

      // More frames may already be buffered behind this one.
      this.waker.notify();

      let message: Message;
      try {
        message = decodeFrame(result.frame);
      } catch (err) {
        if (!(err instanceof FloodError)) throw err;
        logger.warn(
          { event: "frame_rejected", peer: peer.remoteAddress, err },
          "Discarding malformed frame"
        );
        return true;
      }

      if (this.seen.contains(message)) {
        logger.debug(
          { event: "duplicate", peer: peer.remoteAddress, id: message.id },
          "Ignoring already seen message"
        );
        return true;
      }

      this.seen.push(message);
      this.emit("delivered", message, peer.remoteAddress);
      pending.push({ message, origin: peer.remoteAddress });
      return true;
    });

    return pending;
  }

  private flood(message: Message, origin: string | undefined): void {
    const { logger } = this.options;
    const before = new Set(this.peerSet);
    try {
      this.peerSet = propagate(this.peerSet, message, origin, logger);
    } catch (err) {
      // A decoded message can outgrow the frame once invalid bytes are replaced.
      if (!(err instanceof FloodError)) throw err;
      logger.warn({ event: "propagate_failed", id: message.id, err }, err.message);
      return;
    }

    const kept = new Set(this.peerSet);
    for (const peer of before) {
      if (!kept.has(peer)) this.dropPeer(peer, "error");
    }
  }

  private addPeer(connection: PeerConnection): void {
    connection.onReadable(() => this.waker.notify());
    this.peerSet.push(connection);
    this.options.logger.info(
      { event: "peer_added", peer: connection.remoteAddress },
      "New peer"
    );
    this.emit("peerAdded", connection.remoteAddress);
  }

  private dropPeer(peer: PeerConnection, reason: DropReason): void {
    this.options.logger.info(
      { event: "peer_dropped", peer: peer.remoteAddress, reason },
      "Peer disconnected"
    );
    this.emit("peerDropped", peer.remoteAddress, reason);
  }
}
