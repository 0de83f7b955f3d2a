/**
 * InputMailbox: single-slot hand-off between the HTTP side (producer) and
 * the engine waiting in `requestInput` (consumer).
 *
 * `put` fills the slot, replacing a value nobody has taken yet. `take`
 * resolves immediately when the slot is full, otherwise it waits for the
 * next `put`. There is no timeout: a consumer that is never fed stays
 * suspended.
 */

export const EXIT_SENTINEL = "exit";

export class InputMailbox {
  private slot: string | null = null;
  private waiter: ((value: string) => void) | null = null;

  get hasValue(): boolean {
    return this.slot !== null;
  }

  get isWaiting(): boolean {
    return this.waiter !== null;
  }

  put(value: string): void {
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(value);
      return;
    }
    if (this.slot !== null) {
      console.error(`[mailbox] replacing unread input (${this.slot.length} chars)`);
    }
    this.slot = value;
  }

  take(): Promise<string> {
    if (this.slot !== null) {
      const value = this.slot;
      this.slot = null;
      return Promise.resolve(value);
    }
    return new Promise<string>((resolve) => {
      this.waiter = resolve;
    });
  }
}
