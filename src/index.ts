#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { handleConnection, processRequest } from "./pipeline.js";
export type { PipelineOptions } from "./pipeline.js";
export { loadConfig, parseConfig } from "./config.js";
export { parseJobFile } from "./job-file.js";
export type * from "./types.js";
