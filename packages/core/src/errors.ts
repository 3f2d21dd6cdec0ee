/**
 * Error taxonomy for the request pipeline.
 *
 * Every error carries a `code` for programmatic handling and chains the
 * original failure, exactly as it was thrown, through `cause`.
 *
 * ```typescript
 * try {
 *   await registry.invoke("m1", prompt);
 * } catch (err) {
 *   if (err instanceof BackendError) console.error(err.toDetailedString());
 * }
 * ```
 */

import type { ObserverHandle } from "./handle.js";

export class PipelineError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }

  /** Message plus the first link of the cause chain. */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.cause !== undefined) {
      result += `\n  Caused by: ${describeCause(this.cause)}`;
      if (this.cause instanceof PipelineError) {
        result += ` [${this.cause.code}]`;
      }
    }
    return result;
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

/** One-line text for whatever was thrown: an Error's message, a string, or JSON. */
export function describeCause(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      // circular or BigInt-bearing objects
      return String(value);
    }
  }
  return String(value);
}

// ─── Registry errors ───────────────────────────────────────────────────────────

export class DuplicateModelError extends PipelineError {
  constructor(readonly modelId: string) {
    super(`Model already registered: ${modelId}`, "DUPLICATE_MODEL");
  }
}

export class UnknownModelError extends PipelineError {
  constructor(readonly modelId: string) {
    super(`Unknown model: ${modelId}`, "UNKNOWN_MODEL");
  }
}

/** Backend-reported failure; the backend's own error is the `cause`. */
export class BackendError extends PipelineError {
  constructor(readonly modelId: string, cause: unknown) {
    super(`Backend for ${modelId} failed: ${describeCause(cause)}`, "BACKEND_FAILED", cause);
  }
}

// ─── Retrieval errors ──────────────────────────────────────────────────────────

export class RetrievalError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "RETRIEVAL_FAILED", cause);
  }
}

// ─── Build-time validation ─────────────────────────────────────────────────────

export class InvalidRequestError extends PipelineError {
  constructor(readonly issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`, "INVALID_REQUEST");
  }
}

// ─── Deadlines and cancellation ────────────────────────────────────────────────

export type TimeoutCode = "TIMEOUT" | "CANCELLED";

export class TimeoutError extends PipelineError {
  constructor(message: string, code: TimeoutCode = "TIMEOUT", cause?: unknown) {
    super(message, code, cause);
  }
}

// ─── Observer delivery ─────────────────────────────────────────────────────────

/** Reported by the notifier; never propagated to the publisher. */
export class ObserverError extends PipelineError {
  constructor(readonly handle: ObserverHandle, cause: unknown) {
    super(`Observer failed: ${describeCause(cause)}`, "OBSERVER_FAILED", cause);
  }
}

// ─── Configuration ─────────────────────────────────────────────────────────────

export class ConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_INVALID", cause);
  }
}
