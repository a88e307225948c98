export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Milliseconds; absent means wait forever */
  timeout?: number;
}

/**
 * Runs an argument vector directly, without a shell.
 */
export interface CommandExecutor {
  run(argv: string[], options?: RunOptions): Promise<CommandResult>;
}
