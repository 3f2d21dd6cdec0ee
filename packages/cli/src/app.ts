import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, DocumentSchema, type Config, type Document } from "@promptline/core";
import {
  AdapterRegistry,
  KeywordStrategy,
  Notifier,
  Pipeline,
  StaticStrategy,
  StrategyContext,
  type RetrievalStrategy,
} from "@promptline/pipeline";
import { registerConfiguredModels } from "@promptline/models";

// ─── Pipeline assembly from config ─────────────────────────────────────────────

const CorpusSchema = z.array(DocumentSchema);

export function loadCorpus(path: string): Document[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Could not read corpus ${path}`, err);
  }
  const parsed = CorpusSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Corpus ${path} is not an array of documents`, parsed.error);
  }
  return parsed.data;
}

export function createStrategy(config: Config["retrieval"]): RetrievalStrategy {
  if (config.strategy === "keyword") {
    if (!config.corpusPath) {
      throw new ConfigError("Keyword retrieval needs a corpus path (--corpus or retrieval.corpusPath)");
    }
    return new KeywordStrategy(loadCorpus(config.corpusPath), { topK: config.topK });
  }
  return new StaticStrategy([]);
}

export function createPipeline(config: Config, env: NodeJS.ProcessEnv = process.env): Pipeline {
  const registry = new AdapterRegistry();
  registerConfiguredModels(registry, config.models, env);

  return new Pipeline({
    registry,
    strategies: new StrategyContext(createStrategy(config.retrieval)),
    notifier: new Notifier(),
    examples: config.pipeline.examples,
    defaults: config.pipeline,
  });
}
