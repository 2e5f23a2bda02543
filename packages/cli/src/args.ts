import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  isLogLevel,
  type LogLevel,
} from "@wire-server/engine";

export interface CliArgs {
  directory?: string;
  port: number;
  host: string;
  quiet: boolean;
  logLevel: LogLevel;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith("-")) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    quiet: false,
    logLevel: "info",
    help: false,
    version: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--directory" || arg === "-d") {
      parsed.directory = requireValue(args, ++i, arg);
    } else if (arg === "--port" || arg === "-p") {
      const raw = requireValue(args, ++i, arg);
      const port = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
      if (Number.isNaN(port) || port > 65535) {
        throw new CliUsageError(`Invalid port number: ${raw}`);
      }
      parsed.port = port;
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = requireValue(args, ++i, arg);
    } else if (arg === "--log-level") {
      const level = requireValue(args, ++i, arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`Invalid log level: ${level}`);
      }
      parsed.logLevel = level;
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

export const HELP_TEXT = `
wire-server - minimal HTTP/1.1 server

Usage: wire-server [options]

Options:
  --directory, -d <path>  Directory served under /files/
  --port, -p <port>       Port to listen on (default: ${DEFAULT_PORT})
  --host, -H <host>       Host to bind (default: ${DEFAULT_HOST})
  --log-level <level>     debug, info, warn or error (default: info)
  --quiet, -q             Suppress request logging
  --version, -v           Show version
  --help, -h              Show this help
`;
