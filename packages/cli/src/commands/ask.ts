import { Command, InvalidArgumentError } from "commander";
import { loadConfig, type Example } from "@promptline/core";
import { createPipeline } from "../app.js";
import { ResultLogObserver, StdoutObserver } from "../observers.js";
import { reportError } from "../report.js";

// ─── promptline ask "..." ──────────────────────────────────────────────────────

interface AskOptions {
  model?: string;
  strategy?: "none" | "keyword";
  corpus?: string;
  topK?: number;
  example: Example[];
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export function parseExample(value: string, previous: Example[] = []): Example[] {
  const separator = value.indexOf("=>");
  if (separator < 0) {
    throw new InvalidArgumentError('Expected "input=>output".');
  }
  const input = value.slice(0, separator).trim();
  const output = value.slice(separator + 2).trim();
  return [...previous, { input, output }];
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || Number.isNaN(n)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

function parseStrategy(value: string): "none" | "keyword" {
  if (value !== "none" && value !== "keyword") {
    throw new InvalidArgumentError('Expected "none" or "keyword".');
  }
  return value;
}

export function askCommand(): Command {
  return new Command("ask")
    .description("Run one query through retrieval, prompt building and the model")
    .argument("<query...>", "Query text")
    .option("--model <id>", "Registered model id (default from config)")
    .option("--strategy <name>", "Retrieval strategy: none or keyword", parseStrategy)
    .option("--corpus <path>", "JSON array of documents for keyword retrieval")
    .option("--top-k <n>", "Documents to retrieve", parsePositiveInt)
    .option("-e, --example <pair>", "Few-shot example as input=>output (repeatable)", parseExample, [])
    .option("-t, --temperature <n>", "Sampling temperature (0-2)", parseNumber)
    .option("--max-tokens <n>", "Maximum tokens to generate", parseNumber)
    .option("--timeout <ms>", "Abort the request after this many milliseconds", parseNumber)
    .option("--config <path>", "Config file to use")
    .option("--json", "Print the result as JSON")
    .option("-v, --verbose", "Log each pipeline stage and a result summary")
    .action(async (queryParts: string[], opts: AskOptions) => {
      try {
        const config = loadConfig({ path: opts.config });

        // Override config with CLI flags
        if (opts.strategy) config.retrieval.strategy = opts.strategy;
        if (opts.corpus) config.retrieval.corpusPath = opts.corpus;
        if (opts.topK !== undefined) config.retrieval.topK = opts.topK;
        if (opts.verbose) config.pipeline.debug = true;

        const pipeline = createPipeline(config);
        pipeline.notifier.subscribe(new StdoutObserver(opts.json));
        if (opts.verbose) {
          pipeline.notifier.subscribe(new ResultLogObserver());
        }

        await pipeline.handle(queryParts.join(" "), opts.model ?? config.pipeline.model, {
          examples: opts.example,
          temperature: opts.temperature,
          maxTokens: opts.maxTokens,
          timeoutMs: opts.timeout,
        });
      } catch (err) {
        reportError(err);
      }
    });
}
