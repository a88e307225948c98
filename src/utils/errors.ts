/**
 * Error taxonomy
 */

import type { CommandResult } from "../types";

/**
 * Bad invocation; the CLI prints the usage text after the message
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Invalid configuration; reported like a usage error
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A request the configuration does not allow, such as an unknown retention class
 */
export class PolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyError";
  }
}

export class LockError extends Error {
  constructor(
    message: string,
    readonly lockfile: string,
  ) {
    super(message);
    this.name = "LockError";
  }
}

/**
 * An external command exited non-zero where that ends the run.
 * The failure record has already been logged when this is thrown.
 */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    readonly command: string[],
    readonly result: CommandResult,
  ) {
    super(message);
    this.name = "CommandFailedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
