/**
 * Tests for errors.ts — codes, names and cause chaining.
 */

import { describe, it, expect } from "vitest";
import {
  BackendError,
  ConfigError,
  DuplicateModelError,
  InvalidRequestError,
  ObserverError,
  PipelineError,
  RetrievalError,
  TimeoutError,
  UnknownModelError,
  isPipelineError,
} from "../src/errors.js";
import { ObserverHandle } from "../src/handle.js";

describe("error taxonomy", () => {
  it.each([
    [new DuplicateModelError("m1"), "DuplicateModelError", "DUPLICATE_MODEL"],
    [new UnknownModelError("m1"), "UnknownModelError", "UNKNOWN_MODEL"],
    [new BackendError("m1", new Error("x")), "BackendError", "BACKEND_FAILED"],
    [new RetrievalError("x"), "RetrievalError", "RETRIEVAL_FAILED"],
    [new InvalidRequestError(["x"]), "InvalidRequestError", "INVALID_REQUEST"],
    [new TimeoutError("x"), "TimeoutError", "TIMEOUT"],
    [new ObserverError(new ObserverHandle(), new Error("x")), "ObserverError", "OBSERVER_FAILED"],
    [new ConfigError("x"), "ConfigError", "CONFIG_INVALID"],
  ])("%s has its name and code", (error, name, code) => {
    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(isPipelineError(error)).toBe(true);
  });

  it("keeps a non-Error cause as thrown", () => {
    const err = new BackendError("m1", "socket hang up");
    expect(err.cause).toBe("socket hang up");
    expect(err.message).toBe("Backend for m1 failed: socket hang up");
  });

  it("describes a plain-object cause as JSON", () => {
    const native = { status: 429, body: "rate limited" };
    const err = new BackendError("m1", native);

    expect(err.cause).toBe(native);
    expect(err.message).toBe('Backend for m1 failed: {"status":429,"body":"rate limited"}');
    expect(err.toDetailedString()).toBe(
      'BackendError [BACKEND_FAILED]: Backend for m1 failed: {"status":429,"body":"rate limited"}\n' +
        '  Caused by: {"status":429,"body":"rate limited"}'
    );
  });

  it("includes the cause chain in the detailed string", () => {
    const inner = new UnknownModelError("m2");
    const outer = new RetrievalError("reranker failed", inner);

    expect(outer.toDetailedString()).toBe(
      "RetrievalError [RETRIEVAL_FAILED]: reranker failed\n  Caused by: Unknown model: m2 [UNKNOWN_MODEL]"
    );
  });

  it("omits the cause line when there is none", () => {
    expect(new ConfigError("bad").toDetailedString()).toBe("ConfigError [CONFIG_INVALID]: bad");
  });

  it("rejects plain errors in the type guard", () => {
    expect(isPipelineError(new Error("x"))).toBe(false);
    expect(isPipelineError("x")).toBe(false);
  });
});
