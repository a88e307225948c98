/**
 * Usage text
 */

import { color } from "./ui";

export function usageText(): string {
  return `${color.bold("backupz")} - ZFS snapshot rotation and sync

${color.dim("USAGE:")}
  backupz <verb> [options]

${color.dim("VERBS:")}
  ${color.cyan("sync")}          Pull data from all the configured sources
  ${color.cyan("snapshot")}      Create a snapshot of the backup
  ${color.cyan("list")}          List snapshots, sources or retentions
  ${color.cyan("help")}          Display this help
  ${color.cyan("sample-conf")}   Show a sample configuration file
  ${color.cyan("version")}       Show version

${color.dim("GLOBAL OPTIONS:")}
  -c, --config <file>   Use the specified configuration file
  -v, --verbose         Be verbose (repeat for more verbosity)
  -h, --help            Show help for a verb

${color.dim("VERB OPTIONS:")}
  sync [<source>...]    Sync only the named sources (default: all)
      -n, --dry-run     Log the commands without running them

  snapshot <name>       Mandatory, the name of the retention level to create
      -n, --dry-run     Log the rotation without running it

  list [snapshots|sources|retentions]
      --format <fmt>    Output format: table, json (default: table)
`;
}

export function printUsage(): void {
  console.log(usageText());
}
