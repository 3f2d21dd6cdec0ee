import { Command } from "commander";
import { ConfigSchema, getConfigPath, loadConfig, saveConfig, type Config } from "@promptline/core";
import { reportError } from "../report.js";

// ─── promptline config ─────────────────────────────────────────────────────────

// Keys shorter than this print as "…" with no prefix.
const MIN_KEY_LENGTH_FOR_PREFIX = 8;

function mask(key: string | undefined): string | undefined {
  if (!key) return key;
  return key.length >= MIN_KEY_LENGTH_FOR_PREFIX ? `${key.slice(0, 3)}…` : "…";
}

export function maskApiKeys(config: Config): Config {
  const keys = config.models.apiKeys;
  if (!keys) return config;
  return {
    ...config,
    models: {
      ...config.models,
      apiKeys: {
        anthropic: mask(keys.anthropic),
        openai: mask(keys.openai),
        deepseek: mask(keys.deepseek),
        zhipu: mask(keys.zhipu),
      },
    },
  };
}

export function configCommand(): Command {
  const cmd = new Command("config").description("Inspect or create the configuration file");

  cmd
    .command("show")
    .description("Print the resolved configuration (API keys masked)")
    .option("--config <path>", "Config file to use")
    .action((opts: { config?: string }) => {
      try {
        const config = loadConfig({ path: opts.config });
        console.log(JSON.stringify(maskApiKeys(config), null, 2));
      } catch (err) {
        reportError(err);
      }
    });

  cmd
    .command("init")
    .description("Write a config file with default values")
    .option("--path <path>", "Where to write it", getConfigPath())
    .action((opts: { path: string }) => {
      saveConfig(ConfigSchema.parse({}), opts.path);
      console.log(`✅ Wrote ${opts.path}`);
    });

  return cmd;
}
