/**
 * Interactive confirmation for destructive commands
 */

import { createInterface } from "node:readline/promises";
import { InvalidArgumentError } from "commander";
import { CliError } from "./errors.js";
import { isStdinTTY } from "./io.js";

/**
 * Ask a y/N question on stderr
 * @throws InvalidArgumentError when stdin is not interactive
 * @throws CliError unless the answer is "y"
 */
export async function confirm(question: string): Promise<void> {
  if (!isStdinTTY()) {
    throw new InvalidArgumentError("Use --force to confirm in non-interactive mode");
  }

  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = (await rl.question(question)).trim().toLowerCase();
    if (answer !== "y") {
      throw new CliError("Aborted by user");
    }
  } finally {
    rl.close();
  }
}
