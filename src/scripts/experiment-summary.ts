#!/usr/bin/env node
import process from "node:process";
import { runExperimentSummaryCli } from "./experiment-summary-cli.js";

process.exitCode = runExperimentSummaryCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr
});
