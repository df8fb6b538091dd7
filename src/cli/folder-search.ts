#!/usr/bin/env node
import { runCli } from "./main.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

const exitCode = await runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  signal: controller.signal,
});
process.exitCode = exitCode;
