/**
 * Holds a value behind a single exclusive-access owner.
 *
 * Every access is an attempt: when another holder has the cell, the caller
 * gets nothing back and is expected to skip its work for the current cycle.
 * There is no waiting and no queue.
 */
export interface Lease<T> {
  readonly value: T;
  set(next: T): void;
  release(): void;
}

export class ExclusiveCell<T> {
  private current: T;
  private held = false;

  constructor(initial: T) {
    this.current = initial;
  }

  tryAcquire(): Lease<T> | null {
    if (this.held) return null;
    this.held = true;

    let released = false;
    const read = () => this.current;
    const lease: Lease<T> = {
      get value() {
        return read();
      },
      set: (next: T) => {
        if (released) {
          throw new Error("Cannot write through a released lease.");
        }
        this.current = next;
      },
      release: () => {
        if (released) return;
        released = true;
        this.held = false;
      },
    };
    return lease;
  }

  tryRead(): T | null {
    return this.held ? null : this.current;
  }
}
