import { ObserverError, ObserverHandle } from "@promptline/core";

// ─── Observer capability ───────────────────────────────────────────────────────

export interface Observer<T> {
  onEvent(payload: T): void | Promise<void>;
}

export interface PublishOutcome {
  /** Observers that received the payload without failing synchronously */
  delivered: number;
  failures: ObserverError[];
}

export interface NotifierOptions {
  /** Where isolated observer failures are reported. Defaults to console.error. */
  onObserverError?: (error: ObserverError) => void;
}

// ─── Notifier ──────────────────────────────────────────────────────────────────
// One-to-many broadcast. No replay and no buffering: an observer only sees
// payloads published while it is subscribed.

export class Notifier<T> {
  private observers = new Map<number, { handle: ObserverHandle; observer: Observer<T> }>();
  private report: (error: ObserverError) => void;

  constructor(options: NotifierOptions = {}) {
    this.report =
      options.onObserverError ??
      ((error) => console.error(`[notifier] ${error.toDetailedString()}`));
  }

  subscribe(observer: Observer<T>): ObserverHandle {
    const handle = new ObserverHandle();
    this.observers.set(handle.token, { handle, observer });
    return handle;
  }

  /** Returns false when the handle was already removed. */
  unsubscribe(handle: ObserverHandle): boolean {
    return this.observers.delete(handle.token);
  }

  size(): number {
    return this.observers.size;
  }

  clear(): void {
    this.observers.clear();
  }

  publish(payload: T): PublishOutcome {
    // Subscriptions made or dropped during delivery apply to the next publish.
    const snapshot = Array.from(this.observers.values());
    const failures: ObserverError[] = [];
    let delivered = 0;

    for (const { handle, observer } of snapshot) {
      try {
        const pending = observer.onEvent(payload);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => this.report(new ObserverError(handle, err)));
        }
        delivered++;
      } catch (err) {
        const failure = new ObserverError(handle, err);
        failures.push(failure);
        this.report(failure);
      }
    }

    return { delivered, failures };
  }
}
