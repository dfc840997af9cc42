import * as path from "path";

export interface AppConfig {
  host: string;
  port: number;
  contentFile: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_PORT = 5000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_DATA_DIR = "/data";
const DEFAULT_CONTENT_FILE = "content.txt";

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid PORT: ${raw}`);
  }
  return port;
}

/**
 * Reads configuration from the environment. `DATA_DIR` is expected to be a
 * mounted volume so the content file outlives the container.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = path.resolve(env.DATA_DIR || DEFAULT_DATA_DIR);
  return {
    host: env.HOST || DEFAULT_HOST,
    port: parsePort(env.PORT),
    contentFile: path.join(dataDir, env.CONTENT_FILE || DEFAULT_CONTENT_FILE),
  };
}
