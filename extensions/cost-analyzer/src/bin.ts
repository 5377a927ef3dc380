#!/usr/bin/env node
import { Command } from "commander";

import { registerCostAnalyzerCli } from "./cli.js";
import { formatErrorMessage } from "./errors.js";

const program = new Command()
  .name("cost-analyzer")
  .description("Cloud cost aggregation, anomaly detection and optimization planning")
  .version("0.1.0");

registerCostAnalyzerCli(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`error: ${formatErrorMessage(err)}\n`);
  process.exitCode = 1;
});
