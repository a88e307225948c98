import { parseArgs } from "node:util";
import { runSync } from "../../core";
import type { CommandExecutor } from "../../types";
import { withLock } from "../../utils";
import { countVerbose, DRY_RUN_OPTION, GLOBAL_OPTIONS } from "../args";
import { createRunContext } from "../context";
import { reportError } from "../errors";
import { color } from "../ui";

export async function syncCommand(args: string[], executor?: CommandExecutor): Promise<number> {
  let verbosity = 0;

  try {
    const { values, positionals } = parseArgs({
      args,
      options: { ...GLOBAL_OPTIONS, ...DRY_RUN_OPTION },
      allowPositionals: true,
    });

    if (values.help) {
      printHelp();
      return 0;
    }

    verbosity = countVerbose(values.verbose);
    const ctx = await createRunContext({
      config: values.config,
      verbosity,
      dryRun: values["dry-run"],
      executor,
    });

    const results = await withLock(ctx.config.lockfile, ctx.logger, () => runSync(ctx, positionals));

    const failed = results.filter((result) => !result.success);
    if (failed.length > 0) {
      ctx.logger.warn(
        `${failed.length} of ${results.length} source(s) failed: ${failed.map((r) => r.name).join(", ")}`,
      );
    } else {
      ctx.logger.info(`Synced ${results.length} source(s)`);
    }
    return 0;
  } catch (error) {
    return reportError(error, verbosity);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backupz sync")} - Pull data from the configured sources

${color.dim("USAGE:")}
  backupz sync -c <file> [OPTIONS] [<source>...]

${color.dim("OPTIONS:")}
  -c, --config <file>   Configuration file (required)
  -n, --dry-run         Log the sync commands without running them
  -v, --verbose         Be verbose (repeat for debug output)
  -h, --help            Show this help message

${color.dim("NOTES:")}
  Every named source must exist in the configuration; otherwise nothing runs.
  A failing source is logged and the remaining sources still sync; the run
  still exits 0. Check the log file for failed sources.

${color.dim("EXAMPLES:")}
  backupz sync -c /etc/backupz.json              # Sync every source
  backupz sync -c /etc/backupz.json web db       # Sync two sources
`);
}
