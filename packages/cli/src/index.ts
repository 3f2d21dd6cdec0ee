#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

await createProgram().parseAsync();
