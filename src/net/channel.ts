export type Receive<T> =
  | { kind: "item"; value: T }
  | { kind: "empty" }
  | { kind: "closed" };

/**
 * Hands values from a producer (acceptor, command reader) to the node loop.
 * The loop polls with `tryReceive` and never waits on the channel itself.
 * Items queued before `close()` are still delivered; `closed` is reported
 * only once the queue is empty.
 */
export class Channel<T> {
  private readonly items: T[] = [];
  private closed = false;
  private listener?: () => void;

  public send(value: T): boolean {
    if (this.closed) return false;
    this.items.push(value);
    this.listener?.();
    return true;
  }

  public tryReceive(): Receive<T> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return { kind: "item", value };
    }
    return this.closed ? { kind: "closed" } : { kind: "empty" };
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.listener?.();
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get size(): number {
    return this.items.length;
  }

  public onReadable(listener: () => void): void {
    this.listener = listener;
  }
}
