// ─── Observer handle ───────────────────────────────────────────────────────────
// Opaque subscription token. Carries no behavior; only the notifier that issued
// it can resolve it back to an observer.

let nextToken = 0;

export class ObserverHandle {
  readonly token: number;

  constructor() {
    this.token = ++nextToken;
  }

  toString(): string {
    return `ObserverHandle(${this.token})`;
  }
}
