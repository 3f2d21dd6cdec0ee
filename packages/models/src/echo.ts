// ─── Echo backend ──────────────────────────────────────────────────────────────
// Offline backend for local runs and demos. Native call: query(prompt).

export class EchoBackend {
  readonly name = "echo";

  constructor(private prefix = "Echo: ") {}

  query(prompt: string): string {
    return `${this.prefix}${prompt}`;
  }
}
