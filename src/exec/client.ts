/**
 * External command runner using execa
 */

import { execa } from "execa";
import type { CommandExecutor, CommandResult, RunOptions } from "../types";

/** Exit code reported when the binary could not be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Run an argument vector and return the result. Non-zero exits, timeouts and
 * spawn failures are reported in the result instead of thrown.
 */
export async function runCommand(argv: string[], options: RunOptions = {}): Promise<CommandResult> {
  const [file, ...args] = argv;
  if (file === undefined || file === "") {
    throw new Error("Cannot run an empty command");
  }

  const result = await execa(file, args, {
    reject: false,
    stdin: "ignore",
    timeout: options.timeout,
  });

  const exited = typeof result.exitCode === "number";
  const interrupted = result.timedOut || result.signal !== undefined;
  const stdout = result.stdout ?? "";
  let stderr = result.stderr ?? "";
  let exitCode = result.exitCode;

  if (!exited) {
    exitCode = interrupted ? 1 : SPAWN_FAILURE_EXIT_CODE;
  }
  if ((!exited || result.timedOut) && result instanceof Error) {
    // spawn errors, signals and timeouts only show up in the message
    stderr = stderr === "" ? result.message : `${stderr}\n${result.message}`;
  }

  return {
    success: !result.failed && exitCode === 0,
    stdout,
    stderr,
    exitCode,
  };
}

export const execaExecutor: CommandExecutor = {
  run: runCommand,
};
