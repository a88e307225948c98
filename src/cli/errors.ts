/**
 * Turn errors into messages and exit codes
 */

import {
  CommandFailedError,
  ConfigError,
  errorMessage,
  LockError,
  PolicyError,
  UsageError,
} from "../utils";
import { isParseArgsError } from "./args";
import { usageText } from "./help";
import { color } from "./ui";

/**
 * Print `error` to stderr and return the exit code. Usage and configuration
 * errors are followed by the usage text.
 */
export function reportError(error: unknown, verbosity = 0): number {
  if (error instanceof UsageError || error instanceof ConfigError || isParseArgsError(error)) {
    console.error(`${color.red("Error:")} ${error.message}\n`);
    console.error(usageText());
    return 1;
  }

  if (error instanceof PolicyError || error instanceof LockError || error instanceof CommandFailedError) {
    console.error(`${color.red("Error:")} ${error.message}`);
    return 1;
  }

  console.error(`${color.red("Fatal error:")} ${errorMessage(error)}`);
  if (verbosity >= 2 && error instanceof Error && error.stack) {
    console.error(color.dim(error.stack));
  }
  return 1;
}
