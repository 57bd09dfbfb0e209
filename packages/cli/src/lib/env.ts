/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_FILE = "./data/pipeline.xlsx";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the pipeline file
 * Priority: CLI option > DEALBOOK_FILE env var > config file > default "./data/pipeline.xlsx"
 */
export function resolveFilePath(cliFile?: string, configFile?: string): string {
  const file = cliFile ?? process.env.DEALBOOK_FILE ?? configFile ?? DEFAULT_FILE;
  return path.resolve(expandTilde(file));
}

/**
 * Resolve the optional JSON config file
 * Priority: CLI option > DEALBOOK_CONFIG env var
 */
export function resolveConfigPath(cliConfig?: string): string | undefined {
  const config = cliConfig ?? process.env.DEALBOOK_CONFIG;
  return config ? path.resolve(expandTilde(config)) : undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.DEALBOOK_CLI_DEBUG === "1";
}
