/**
 * Tests for retrieval/ — strategy context swapping and the bundled strategies.
 */

import { describe, it, expect } from "vitest";
import { RetrievalError, TimeoutError, type Document } from "@promptline/core";
import { StrategyContext } from "../src/retrieval/context.js";
import { StaticStrategy } from "../src/retrieval/static.js";
import { KeywordStrategy, tokenize } from "../src/retrieval/keyword.js";
import type { RetrievalStrategy } from "../src/retrieval/types.js";

/** Resolves only when release() is called. */
class GatedStrategy implements RetrievalStrategy {
  private release: (() => void) | undefined;
  private gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  constructor(readonly name: string, private documents: Document[]) {}

  async retrieve(): Promise<Document[]> {
    await this.gate;
    return this.documents;
  }

  open(): void {
    this.release?.();
  }
}

const corpus: Document[] = [
  { id: "basics", text: "Basics of TypeScript." },
  { id: "patterns", text: "Advanced TypeScript design patterns." },
  { id: "strategy", text: "Strategy pattern in depth." },
  { id: "cooking", text: "Slow-cooked beans." },
];

describe("StrategyContext", () => {
  it("keeps an in-flight retrieval on the strategy it started with", async () => {
    const a = new GatedStrategy("a", [{ id: "from-a", text: "A" }]);
    const b = new StaticStrategy([{ id: "from-b", text: "B" }]);
    const context = new StrategyContext(a);

    const inFlight = context.retrieve("query");
    context.setStrategy(b);
    const after = await context.retrieve("query");
    a.open();

    expect((await inFlight).map((d) => d.id)).toEqual(["from-a"]);
    expect(after.map((d) => d.id)).toEqual(["from-b"]);
    expect(context.getStrategy()).toBe(b);
  });

  it("treats an empty result as no context", async () => {
    const context = new StrategyContext(new StaticStrategy());
    expect(await context.retrieve("anything")).toEqual([]);
  });

  it("returns frozen documents", async () => {
    const context = new StrategyContext(new StaticStrategy([{ id: "d1", text: "t", score: 0.5 }]));
    const docs = await context.retrieve("q");

    expect(Object.isFrozen(docs)).toBe(true);
    expect(Object.isFrozen(docs[0])).toBe(true);
    expect(docs[0]).toEqual({ id: "d1", text: "t", score: 0.5 });
  });

  it("wraps a strategy failure in RetrievalError", async () => {
    const failing: RetrievalStrategy = {
      name: "index",
      retrieve: () => {
        throw new Error("index unavailable");
      },
    };
    const context = new StrategyContext(failing);

    const err = await context.retrieve("q").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalError);
    if (err instanceof RetrievalError) {
      expect(err.message).toBe('Strategy "index" failed to retrieve');
      expect(err.cause).toBeInstanceOf(Error);
    }
  });

  it("passes a RetrievalError through unchanged", async () => {
    const original = new RetrievalError("shard offline");
    const context = new StrategyContext({
      name: "sharded",
      retrieve: async () => {
        throw original;
      },
    });

    await expect(context.retrieve("q")).rejects.toBe(original);
  });

  it("rejects malformed documents", async () => {
    const context = new StrategyContext({
      name: "broken",
      retrieve: () => JSON.parse('[{"id":"ok","text":"fine"},{"id":7}]'),
    });

    await expect(context.retrieve("q")).rejects.toThrow(
      'Strategy "broken" returned an invalid document at position 1'
    );
  });

  it("fails with TimeoutError past the deadline", async () => {
    const slow = new GatedStrategy("slow", []);
    const context = new StrategyContext(slow);

    await expect(context.retrieve("q", { timeoutMs: 10 })).rejects.toBeInstanceOf(TimeoutError);
    slow.open();
  });
});

describe("KeywordStrategy", () => {
  it("ranks by share of query terms, ties in corpus order", () => {
    const strategy = new KeywordStrategy(corpus);
    const docs = strategy.retrieve("TypeScript design patterns");

    expect(docs).toEqual([
      { id: "patterns", text: "Advanced TypeScript design patterns.", score: 1 },
      { id: "basics", text: "Basics of TypeScript.", score: 1 / 3 },
    ]);
  });

  it("drops documents without a matching term", () => {
    const strategy = new KeywordStrategy(corpus);
    expect(strategy.retrieve("beans").map((d) => d.id)).toEqual(["cooking"]);
    expect(strategy.retrieve("rust")).toEqual([]);
  });

  it("truncates to topK", () => {
    const strategy = new KeywordStrategy(corpus, { topK: 1 });
    expect(strategy.retrieve("typescript").map((d) => d.id)).toEqual(["basics"]);
  });

  it.each([-1, 0, 1.5, Number.NaN])("rejects topK %s", (topK) => {
    expect(() => new KeywordStrategy(corpus, { topK })).toThrow(RangeError);
  });

  it("applies minScore", () => {
    const strategy = new KeywordStrategy(corpus, { minScore: 0.5 });
    expect(strategy.retrieve("typescript design patterns").map((d) => d.id)).toEqual(["patterns"]);
  });

  it("returns nothing for an empty query", () => {
    expect(new KeywordStrategy(corpus).retrieve("  ?! ")).toEqual([]);
  });

  it("is deterministic and leaves the query alone", () => {
    const strategy = new KeywordStrategy(corpus);
    const query = "Strategy pattern";

    expect(strategy.retrieve(query)).toEqual(strategy.retrieve(query));
    expect(query).toBe("Strategy pattern");
  });
});

describe("tokenize", () => {
  it("lower-cases and splits on non-alphanumerics", () => {
    expect(tokenize("Slow-cooked beans, 2 ways!")).toEqual(["slow", "cooked", "beans", "2", "ways"]);
  });
});
