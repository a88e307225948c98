import { parseArgs } from "node:util";
import { rotateRetention } from "../../core";
import type { CommandExecutor, RotationStep } from "../../types";
import { UsageError, withLock } from "../../utils";
import { countVerbose, DRY_RUN_OPTION, GLOBAL_OPTIONS } from "../args";
import { createRunContext } from "../context";
import { reportError } from "../errors";
import { color } from "../ui";

export async function snapshotCommand(args: string[], executor?: CommandExecutor): Promise<number> {
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

    const [retention, ...extra] = positionals;
    if (retention === undefined) {
      throw new UsageError("Snapshot name not specified");
    }
    if (extra.length > 0) {
      throw new UsageError(`Unexpected arguments: ${extra.join(" ")}`);
    }

    verbosity = countVerbose(values.verbose);
    const ctx = await createRunContext({
      config: values.config,
      verbosity,
      dryRun: values["dry-run"],
      executor,
    });

    const result = await withLock(ctx.config.lockfile, ctx.logger, () =>
      rotateRetention(ctx, retention),
    );

    const created = result.steps.find(
      (step): step is Extract<RotationStep, { kind: "create" }> => step.kind === "create",
    );
    if (created && !result.dryRun) {
      ctx.logger.info(`Snapshot ${created.snapshot} created (${result.strategy})`);
    }
    return 0;
  } catch (error) {
    return reportError(error, verbosity);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backupz snapshot")} - Create a snapshot for a retention level

${color.dim("USAGE:")}
  backupz snapshot -c <file> [OPTIONS] <name>

${color.dim("OPTIONS:")}
  -c, --config <file>   Configuration file (required)
  -n, --dry-run         Log the rotation without running it
  -v, --verbose         Be verbose (repeat for debug output)
  -h, --help            Show this help message

${color.dim("STRATEGIES:")}
  generation   <name>.0 is the newest; older slots shift up and the slot
               at keep-1 is destroyed (default)
  timestamp    <name>:YYYY-MM-DDTHH:MM:SS; the oldest is destroyed once
               the level holds keep snapshots

  Without keep, snapshots of the level are kept forever.

${color.dim("EXAMPLES:")}
  backupz snapshot -c /etc/backupz.json daily
  backupz snapshot -c /etc/backupz.json -n weekly   # Preview the rotation
`);
}
