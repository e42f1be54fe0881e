#!/usr/bin/env node
import { logger, Logger } from "@vscode/debugadapter";
import { dumpObjectFile } from "../objectDump";
import { LoggerDiagnostics } from "../logger";
import { parsePsyqObjectFromFile } from "../psyqObjParser";

const args = process.argv.slice(2);
const verbose = args.includes("--verbose");
const [filename] = args.filter((arg) => !arg.startsWith("--"));

if (!filename) {
  console.error("Usage: psyq-objdump <file.obj> [--verbose]");
  process.exit(1);
}

logger.init((e) => process.stderr.write(e.body.output));
logger.setup(
  verbose ? Logger.LogLevel.Verbose : Logger.LogLevel.Warn,
  false,
  false
);

parsePsyqObjectFromFile(filename, {
  diagnostics: new LoggerDiagnostics(logger),
  trace: verbose,
})
  .then((file) => {
    console.log(dumpObjectFile(file).join("\n"));
  })
  .catch((err) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
