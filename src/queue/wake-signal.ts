/**
 * wake-signal.ts
 * Lets the processing loop sleep until there is work, without polling
 */

export class WakeSignal {
  private pending = false;
  private waiter?: () => void;

  /**
   * Resolves on the next notify(), or at once if a notify() arrived while nobody was waiting
   */
  wait(): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiter = () => {
        this.waiter = undefined;
        resolve();
      };
    });
  }

  notify(): void {
    if (this.waiter) {
      this.waiter();
    } else {
      this.pending = true;
    }
  }
}
