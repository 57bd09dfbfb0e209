/**
 * Backup management commands for CLI
 */

import type { Command } from "commander";
import { openSession, type GlobalOptions } from "../lib/repository.js";
import { printJson, printLines, colorize } from "../lib/render.js";
import { CliError, EXIT_NOT_FOUND } from "../lib/errors.js";
import { confirm } from "../lib/prompt.js";
import { emitStoreMetrics, withTiming } from "../lib/telemetry.js";

/**
 * Register `list` and `restore` under the backups command group
 */
export function registerBackupCommands(backups: Command, program: Command): Command {
  backups.description("List or restore timestamped backups of the pipeline file").addHelpText(
    "after",
    `
Examples:
  $ dealbook backups list
  $ dealbook backups list --json
  $ dealbook --file ./data/pipeline.xlsx backups restore --force`
  );

  backups
    .command("list")
    .description("List backups, newest first")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.backups.list", async () => {
        const opts = program.opts<GlobalOptions>();
        const { filePath, repository } = await openSession(opts);

        const found = await repository.listBackups();

        if (options.json) {
          printJson(found);
        } else if (found.length > 0) {
          printLines(found.map((backup) => backup.name));
        } else if (!opts.quiet) {
          console.log(`No backups for ${filePath}`);
        }
      });
    });

  backups
    .command("restore")
    .description("Copy the newest backup over the pipeline file")
    .option("--force", "Restore without confirmation")
    .action(async (options: { force?: boolean }) => {
      await withTiming("cli.backups.restore", async () => {
        const opts = program.opts<GlobalOptions>();
        const { filePath, repository } = await openSession(opts);

        if (!options.force) {
          await confirm(`Overwrite ${filePath} with its newest backup? (y/N) `);
        }

        const restored = await repository.restoreFromBackup();
        if (!restored) {
          throw new CliError(`No backups to restore for ${filePath}`, { exitCode: EXIT_NOT_FOUND });
        }

        if (!opts.quiet) {
          console.log(colorize(`✓ Restored ${filePath} from ${restored.name}`, "green", process.stdout));
        }
        emitStoreMetrics(filePath);
      });
    });

  return backups;
}
