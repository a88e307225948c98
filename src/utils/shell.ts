/**
 * Display helpers for argument vectors. Nothing here builds a command that
 * gets executed.
 */

import type { CommandResult } from "../types";

const SAFE_WORD = /^[A-Za-z0-9_./:=@%+,-]+$/;

export function quoteArg(arg: string): string {
  if (SAFE_WORD.test(arg)) return arg;
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

export function quoteCommand(argv: string[]): string {
  return argv.map(quoteArg).join(" ");
}

function indent(text: string, prefix: string): string[] {
  return text.split("\n").map((line) => prefix + line);
}

/**
 * Lines of a failed-command log record
 */
export function formatCommandFailure(
  message: string,
  argv: string[],
  result: CommandResult,
): string[] {
  return [
    message,
    `  Command: ${quoteCommand(argv)}`,
    `  Exit code: ${result.exitCode}`,
    "  STDOUT:",
    ...indent(result.stdout, "    "),
    "  STDERR:",
    ...indent(result.stderr, "    "),
  ];
}
