#!/usr/bin/env node
import * as fs from "node:fs";
import { CliUsageError, HELP_TEXT, type CliArgs, parseArgs } from "./args.js";
import { startServer } from "./serve.js";

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    manifest &&
    typeof manifest === "object" &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

function parseArgsOrExit(argv: string[]): CliArgs {
  try {
    return parseArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const args = parseArgsOrExit(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(readVersion());
    return;
  }

  const { server, config, port } = await startServer(args);

  console.log(`\n  wire-server listening on http://${config.host}:${port}`);
  if (config.directory) {
    console.log(`  Files:   ${config.directory}`);
  }
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
