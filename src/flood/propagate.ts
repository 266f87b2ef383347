import { Logger } from "../logger";
import { PeerConnection } from "../net/connection";
import { encodeFrame, Message } from "./message";

/**
 * Floods `message` to every peer except those whose address matches `origin`.
 *
 * The frame is encoded once and written to each target independently. A peer
 * whose write fails is shut down and left out of the returned set; the other
 * writes still happen. Origin peers are appended after the written peers and
 * are never written to. With no origin every peer is a target.
 */
export function propagate(
  peers: readonly PeerConnection[],
  message: Message,
  origin: string | undefined,
  logger: Logger
): PeerConnection[] {
  const held: PeerConnection[] = [];
  const targets: PeerConnection[] = [];
  for (const peer of peers) {
    if (origin !== undefined && peer.remoteAddress === origin) {
      held.push(peer);
    } else {
      targets.push(peer);
    }
  }

  const frame = encodeFrame(message);

  const delivered = targets.filter((peer) => {
    const result = peer.write(frame);
    if (result.kind === "written" && result.bytes === frame.length) {
      logger.trace(
        { event: "frame_written", peer: peer.remoteAddress, id: message.id },
        "Frame written"
      );
      return true;
    }

    const err =
      result.kind === "error"
        ? result.error
        : new Error(`Short write: ${result.bytes} of ${frame.length} bytes`);
    logger.warn(
      { event: "write_failed", peer: peer.remoteAddress, id: message.id, err },
      "Dropping peer after failed write"
    );
    peer.shutdown();
    return false;
  });

  return [...delivered, ...held];
}
