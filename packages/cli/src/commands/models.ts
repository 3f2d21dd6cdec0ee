import { Command } from "commander";
import { loadConfig } from "@promptline/core";
import { AdapterRegistry } from "@promptline/pipeline";
import { registerConfiguredModels } from "@promptline/models";
import { reportError } from "../report.js";

// ─── promptline models ─────────────────────────────────────────────────────────

export function modelsCommand(): Command {
  return new Command("models")
    .description("List model ids available with the current configuration")
    .option("--config <path>", "Config file to use")
    .action((opts: { config?: string }) => {
      try {
        const config = loadConfig({ path: opts.config });
        const registry = new AdapterRegistry();
        for (const id of registerConfiguredModels(registry, config.models)) {
          const marker = id === config.pipeline.model ? " (default)" : "";
          console.log(`${id}${marker}`);
        }
      } catch (err) {
        reportError(err);
      }
    });
}
