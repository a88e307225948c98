/**
 * Verb dispatch
 */

import type { CommandExecutor } from "../types";
import { listCommand } from "./commands/list";
import { sampleConfCommand } from "./commands/sample-conf";
import { snapshotCommand } from "./commands/snapshot";
import { syncCommand } from "./commands/sync";
import { printUsage, usageText } from "./help";
import { color, VERSION } from "./ui";

export function printVersion(): void {
  console.log(`${color.cyan("backupz")} ${color.dim(`v${VERSION}`)}`);
}

export async function main(args: string[], executor?: CommandExecutor): Promise<number> {
  if (args.length === 0) {
    console.error(`${color.red("Error:")} No verb given\n`);
    console.error(usageText());
    return 1;
  }

  const [command = "", ...commandArgs] = args;

  switch (command) {
    case "sync":
      return syncCommand(commandArgs, executor);

    case "snapshot":
      return snapshotCommand(commandArgs, executor);

    case "list":
      return listCommand(commandArgs, executor);

    case "sample-conf":
    case "sample_conf":
      return sampleConfCommand();

    case "-h":
    case "--help":
    case "help":
      printUsage();
      return 0;

    case "-V":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown verb: ${command}\n`);
      console.error(usageText());
      return 1;
  }
}
