/**
 * Lets the node loop sleep until something is ready instead of spinning.
 * A `notify()` that arrives while nobody is waiting is remembered, so the
 * next `wait()` returns straight away.
 */
export class Waker {
  private pending = false;
  private wakeUp?: () => void;

  public notify(): void {
    if (this.wakeUp) {
      const wakeUp = this.wakeUp;
      this.wakeUp = undefined;
      wakeUp();
    } else {
      this.pending = true;
    }
  }

  public wait(timeoutMs: number): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = undefined;
        resolve();
      }, timeoutMs);
      this.wakeUp = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
