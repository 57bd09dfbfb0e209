/**
 * Repository adapter for CLI
 * Resolves the file and settings, then opens the durable repository and service
 */

import {
  FileRepository,
  RecordService,
  createContext,
  loadConfigFile,
  parseStoreSettings,
  type DealContext,
} from "@dealbook/sdk";
import { resolveConfigPath, resolveFilePath } from "./env.js";

export type GlobalOptions = {
  file?: string;
  config?: string;
  quiet?: boolean;
}

export interface CliSession {
  filePath: string;
  repository: FileRepository;
  service: RecordService;
  context: DealContext;
}

/**
 * Open the pipeline file named by the global options. Nothing is read until a command asks.
 */
export async function openSession(options: GlobalOptions): Promise<CliSession> {
  const configPath = resolveConfigPath(options.config);
  const { filePath: configFile, ...settings } = configPath
    ? await loadConfigFile(configPath)
    : parseStoreSettings({});
  const filePath = resolveFilePath(options.file, configFile);
  const context = createContext();
  const repository = new FileRepository({ ...settings, filePath, context });
  const service = new RecordService(repository, context, repository.lookups);
  return { filePath, repository, service, context };
}
