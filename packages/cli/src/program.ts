import { Command } from "commander";
import { askCommand } from "./commands/ask.js";
import { modelsCommand } from "./commands/models.js";
import { configCommand } from "./commands/config.js";

export function createProgram(): Command {
  return new Command()
    .name("promptline")
    .description("Retrieval-augmented prompt pipeline for generative models")
    .version("0.1.0")
    .addCommand(askCommand())
    .addCommand(modelsCommand())
    .addCommand(configCommand());
}
