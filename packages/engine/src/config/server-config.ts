import type { LogLevel } from "../logging/logger.js";

export const DEFAULT_PORT = 4221;
export const DEFAULT_HOST = "127.0.0.1";

export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /**
   * Directory backing `/files/{name}`. Read-only after startup. When unset,
   * file reads answer 404 and file writes answer 500.
   */
  directory?: string;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Minimum level the CLI logger lets through. Default: 'info' */
  logLevel: LogLevel;
}

export function defaultConfig(directory?: string): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    directory,
    quiet: false,
    logLevel: "info",
  };
}
