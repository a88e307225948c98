/**
 * Options shared by every verb
 */

export const GLOBAL_OPTIONS = {
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", multiple: true },
  help: { type: "boolean", short: "h", default: false },
} as const;

export const DRY_RUN_OPTION = {
  "dry-run": { type: "boolean", short: "n", default: false },
} as const;

/**
 * Number of `-v` flags
 */
export function countVerbose(verbose: boolean[] | undefined): number {
  return verbose?.filter(Boolean).length ?? 0;
}

/**
 * Errors thrown by `parseArgs` for unknown or malformed options
 */
export function isParseArgsError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  );
}
