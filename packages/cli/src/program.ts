/**
 * Dealbook CLI program
 *
 * `buildProgram()` wires every command; `run()` parses argv in process and
 * returns the exit code instead of exiting, so tests can drive it directly.
 */

import { readFileSync } from "node:fs";
import * as path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { z } from "zod";
import {
  applyPatch,
  createRecord,
  findField,
  logger,
  type DealRecord,
  type LogEntry,
} from "@dealbook/sdk";
import { openSession, type GlobalOptions } from "./lib/repository.js";
import { parseNonNegativeInt, parseIsoDateArg, expectObject } from "./lib/arg.js";
import { readJsonInput, pathExists, writeStderr } from "./lib/io.js";
import { printJson, printLines, colorize, formatRecordLine, formatValidation } from "./lib/render.js";
import {
  CliError,
  EXIT_INTEGRITY,
  EXIT_NOT_FOUND,
  mapSdkErrorToExitCode,
  formatCliError,
} from "./lib/errors.js";
import { parseFilter } from "./lib/filter.js";
import { confirm } from "./lib/prompt.js";
import { emitStoreMetrics, withTiming } from "./lib/telemetry.js";
import { isVerbose } from "./lib/env.js";
import { registerBackupCommands } from "./commands/backups.js";

const PackageJson = z.object({ version: z.string() });

// Resolves from both src/ and dist/
const packageJson = PackageJson.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

interface InputOptions {
  input?: string;
  data?: string;
}

function stderrSink(entry: LogEntry, line: string): void {
  if (entry.level === "debug" && !process.env.DEALBOOK_DEBUG) {
    return;
  }
  const color = entry.level === "error" ? "red" : entry.level === "warn" ? "yellow" : undefined;
  writeStderr((color ? colorize(line, color, process.stderr) : line) + "\n");
}

/**
 * Build a full record from a JSON object keyed by column names.
 * The DealId key (or an alias) picks the id; everything else goes through the patch rules.
 */
function recordFromInput(input: Record<string, unknown>): DealRecord {
  let id = "";
  const fields: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    if (findField(key)?.kind === "id") {
      if (typeof value !== "string" && typeof value !== "number") {
        throw new InvalidArgumentError(`${key} must be a string`);
      }
      id = String(value).trim();
    } else {
      fields[key] = value;
    }
  }

  const { record, rejected } = applyPatch(createRecord({ id }), fields);
  if (rejected.length > 0) {
    const reasons = rejected.map((field) => `${field.field}: ${field.reason}`);
    throw new CliError(`Invalid record: ${reasons.join("; ")}`);
  }
  const missing = [
    record.accountName ? undefined : "AccountName",
    record.dealName ? undefined : "DealName",
  ].filter((name) => name !== undefined);
  if (missing.length > 0) {
    throw new CliError(`Invalid record: ${missing.join(" and ")} required`);
  }
  return record;
}

/**
 * Assemble the command tree
 */
export function buildProgram(): Command {
  const program = new Command();

  // Errors propagate to run() instead of exiting the process
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("dealbook")
    .description("Dealbook - durable spreadsheet store for a sales pipeline")
    .version(packageJson.version)
    .option("--file <path>", "Pipeline workbook (default: $DEALBOOK_FILE or ./data/pipeline.xlsx)")
    .option("--config <path>", "Store settings JSON file (default: $DEALBOOK_CONFIG)")
    .option("--quiet", "Suppress non-error output");

  program.hook("preAction", () => {
    const opts = program.opts<GlobalOptions>();
    logger.setSink(stderrSink);
    logger.setEnabled(!opts.quiet);
  });

  // Init command
  program
    .command("init")
    .description("Create an empty pipeline workbook at the current schema version")
    .action(async () => {
      await withTiming("cli.init", async () => {
        const opts = program.opts<GlobalOptions>();
        const { filePath, repository } = await openSession(opts);

        if (await pathExists(filePath)) {
          if (!opts.quiet) {
            console.log(`Store already exists at ${filePath}`);
          }
          return;
        }

        await repository.load();
        await repository.saveChanges();

        if (!opts.quiet) {
          console.log(`Initialized store at ${filePath}`);
        }
        emitStoreMetrics(filePath);
      });
    });

  // List command
  program
    .command("ls")
    .description("List record ids in file order")
    .option("--long", "Show id, stage, owner, amount and account per line")
    .option("--json", "Output as JSON array")
    .option("--limit <n>", "Maximum number of results", (val) => parseNonNegativeInt(val, "--limit"))
    .action(async (options: { long?: boolean; json?: boolean; limit?: number }) => {
      await withTiming("cli.ls", async () => {
        const opts = program.opts<GlobalOptions>();
        const { repository } = await openSession(opts);

        let records = await repository.getAll();

        if (options.limit !== undefined) {
          records = records.slice(0, options.limit);
        }

        if (options.json) {
          printJson(records.map((record) => record.id));
        } else if (options.long) {
          printLines(records.map(formatRecordLine));
        } else {
          printLines(records.map((record) => record.id));
        }
      });
    });

  // Get command
  program
    .command("get <id>")
    .description("Print one record as JSON")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (id: string, options: { raw?: boolean }) => {
      await withTiming("cli.get", async () => {
        const opts = program.opts<GlobalOptions>();
        const { repository } = await openSession(opts);

        const record = await repository.getById(id);

        if (!record) {
          throw new CliError(`Record not found: ${id}`, { exitCode: EXIT_NOT_FOUND });
        }

        printJson(record, { raw: options.raw });
      });
    });

  // Query command
  program
    .command("query")
    .description("Filter records with a JSON filter object")
    .option("--input <path>", "Read filter from JSON file")
    .option("--data <json>", "Inline JSON filter")
    .option("--as-of <date>", "Reference date for overdue and contact rules (default: today)", (val) =>
      parseIsoDateArg(val, "--as-of")
    )
    .option("--limit <n>", "Maximum results", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--ids", "Print matching ids only")
    .addHelpText(
      "after",
      `
Examples:
  $ dealbook query --data '{"stages":["Proposal","Negotiation"],"minAmount":1000}'
  $ dealbook query --data '{"hasOverdueNextStep":true}' --as-of 2025-03-15 --ids
  $ cat filter.json | dealbook query`
    )
    .action(
      async (options: InputOptions & { asOf?: string; limit?: number; ids?: boolean }) => {
        await withTiming("cli.query", async () => {
          const opts = program.opts<GlobalOptions>();
          const filter = parseFilter(await readJsonInput(options));

          const { repository, context } = await openSession(opts);
          let results = await repository.query(filter, options.asOf ?? context.clock.today());

          if (options.limit !== undefined) {
            results = results.slice(0, options.limit);
          }

          if (options.ids) {
            printLines(results.map((record) => record.id));
          } else {
            printJson(results);
          }
        });
      }
    );

  // Put command
  program
    .command("put")
    .description("Store a whole record (normalized); replaces any record with the same DealId")
    .option("--input <path>", "Read record from JSON file")
    .option("--data <json>", "Inline JSON record")
    .option("--json", "Print the stored record and normalization changes as JSON")
    .addHelpText(
      "after",
      `
Keys are column names (DealId, AccountName, Stage, Amount, ...). Derived
columns such as Region and WeightedAmount are filled in and cannot be set.
A missing DealId is generated.`
    )
    .action(async (options: InputOptions & { json?: boolean }) => {
      await withTiming("cli.put", async () => {
        const opts = program.opts<GlobalOptions>();
        const record = recordFromInput(expectObject(await readJsonInput(options), "Record"));

        const { filePath, service } = await openSession(opts);
        const result = await service.update(record);

        if (options.json) {
          printJson(result);
        } else if (!opts.quiet) {
          console.log(`Stored ${result.record.id}`);
        }
        emitStoreMetrics(filePath);
      });
    });

  // Patch command
  program
    .command("patch <id>")
    .description("Update some fields of a record; valid fields are saved even if others are rejected")
    .option("--input <path>", "Read fields from JSON file")
    .option("--data <json>", "Inline JSON fields")
    .action(async (id: string, options: InputOptions) => {
      await withTiming("cli.patch", async () => {
        const opts = program.opts<GlobalOptions>();
        const fields = expectObject(await readJsonInput(options), "Patch");

        const { filePath, service } = await openSession(opts);
        const result = await service.patch(id, fields);

        printJson(result);
        emitStoreMetrics(filePath);

        if (!result.success) {
          throw new CliError(result.error ?? `Patch failed: ${result.status}`, {
            exitCode: result.status === "not_found" ? EXIT_NOT_FOUND : undefined,
          });
        }
      });
    });

  // Remove command
  program
    .command("rm <id>")
    .description("Remove a record")
    .option("--force", "Force removal without confirmation")
    .action(async (id: string, options: { force?: boolean }) => {
      await withTiming("cli.rm", async () => {
        const opts = program.opts<GlobalOptions>();

        // Require confirmation unless --force
        if (!options.force) {
          await confirm(`Remove ${id}? (y/N) `);
        }

        const { filePath, service } = await openSession(opts);

        if (!(await service.remove(id))) {
          throw new CliError(`Record not found: ${id}`, { exitCode: EXIT_NOT_FOUND });
        }

        if (!opts.quiet) {
          console.log(`Removed ${id}`);
        }
        emitStoreMetrics(filePath);
      });
    });

  // Validate command
  program
    .command("validate")
    .description("Check the workbook without loading it into the store")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.validate", async () => {
        const opts = program.opts<GlobalOptions>();
        const { filePath, repository } = await openSession(opts);

        const result = await repository.validate();

        if (options.json) {
          printJson(result);
        } else {
          printLines(formatValidation(filePath, result));
        }

        if (!result.isValid) {
          throw new CliError("Validation failed", { exitCode: EXIT_INTEGRITY });
        }
        if (result.unsupportedVersion) {
          throw new CliError(`Unsupported schema version: ${result.schemaVersion ?? "unknown"}`, {
            exitCode: EXIT_INTEGRITY,
          });
        }
      });
    });

  // Export command
  program
    .command("export <path>")
    .description("Write all records to another workbook, optionally in an older schema layout")
    .option("--schema <version>", "Target schema version (default: current)")
    .action(async (target: string, options: { schema?: string }) => {
      await withTiming("cli.export", async () => {
        const opts = program.opts<GlobalOptions>();
        const { filePath, repository } = await openSession(opts);

        const targetPath = path.resolve(target);
        if (targetPath === filePath) {
          throw new InvalidArgumentError("Export target must differ from the store file");
        }

        const version = options.schema ?? repository.settings.currentVersion;
        await repository.exportTo(targetPath, version);
        const count = (await repository.getAll()).length;

        if (!opts.quiet) {
          console.log(`Exported ${count} record(s) to ${targetPath} (schema ${version})`);
        }
      });
    });

  registerBackupCommands(program.command("backups"), program);

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the matching command
 * @returns process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = buildProgram();

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed usage errors, help and version output
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }
    console.error(`Error: ${formatCliError(err, isVerbose())}`);
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setSink();
    logger.setEnabled(true);
  }
}
