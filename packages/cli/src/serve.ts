import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type ServerConfig,
  type WebServer,
} from "@wire-server/engine";
import type { CliArgs } from "./args.js";

export interface RunningServer {
  server: WebServer;
  config: ServerConfig;
  port: number;
}

export function buildServerConfig(args: CliArgs): ServerConfig {
  return {
    ...defaultConfig(
      args.directory === undefined ? undefined : path.resolve(args.directory),
    ),
    port: args.port,
    host: args.host,
    quiet: args.quiet,
    logLevel: args.logLevel,
  };
}

export function cliLogger(args: CliArgs): Logger {
  return prefixedLogger(
    "wire-server",
    filteredLogger(args.logLevel, basicLogger()),
  );
}

/** Start a Node listener for parsed command line arguments. */
export async function startServer(
  args: CliArgs,
  logger: Logger = cliLogger(args),
): Promise<RunningServer> {
  const config = buildServerConfig(args);
  const server = createNodeServer({ config, logger });
  const port = await server.start();
  return { server, config, port };
}
