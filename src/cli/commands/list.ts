import { parseArgs } from "node:util";
import {
  collectSnapshotReport,
  parseListKind,
  type ReportSection,
  retentionRows,
  snapshotReportSections,
  sourceRows,
} from "../../core";
import type { CommandExecutor } from "../../types";
import { UsageError } from "../../utils";
import { countVerbose, GLOBAL_OPTIONS } from "../args";
import { createRunContext } from "../context";
import { reportError } from "../errors";
import { color, columnWidths, formatTableRow, formatTableSeparator, ui } from "../ui";

export async function listCommand(args: string[], executor?: CommandExecutor): Promise<number> {
  let verbosity = 0;

  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        ...GLOBAL_OPTIONS,
        format: { type: "string", default: "table" },
      },
      allowPositionals: true,
    });

    if (values.help) {
      printHelp();
      return 0;
    }

    const [kindArg, ...extra] = positionals;
    const kind = parseListKind(kindArg);
    if (extra.length > 0) {
      throw new UsageError(`Unexpected arguments: ${extra.join(" ")}`);
    }
    if (values.format !== "table" && values.format !== "json") {
      throw new UsageError(`Unknown format: ${values.format}`);
    }

    verbosity = countVerbose(values.verbose);
    const verbose = verbosity > 0;
    const ctx = await createRunContext({ config: values.config, verbosity, executor });
    const { config } = ctx;

    switch (kind) {
      case "sources":
        if (values.format === "json") {
          console.log(JSON.stringify(config.sources, null, 2));
        } else {
          printRows(["Source", "From", "To", "Type"], sourceRows(config, verbose), verbose);
        }
        return 0;

      case "retentions":
        if (values.format === "json") {
          console.log(JSON.stringify(config.retentions, null, 2));
        } else {
          printRows(["Retention", "Keep", "Strategy"], retentionRows(config, verbose), verbose);
        }
        return 0;

      case "snapshots": {
        const report = await collectSnapshotReport(ctx);
        if (values.format === "json") {
          console.log(JSON.stringify(report, null, 2));
          return 0;
        }

        ui.intro(`backupz list · ${config.dataset}`);
        for (const section of snapshotReportSections(report)) {
          printSection(section);
        }
        ui.outro(
          `${report.managed.length} managed, ${report.unmanaged.length} unmanaged snapshot(s)`,
        );
        return 0;
      }
    }
  } catch (error) {
    return reportError(error, verbosity);
  }
}

/**
 * One name per line, or a table when verbose
 */
function printRows(headers: string[], rows: string[][], verbose: boolean): void {
  if (!verbose) {
    for (const row of rows) {
      console.log(row[0] ?? "");
    }
    return;
  }

  const widths = columnWidths(headers, rows);
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));
  for (const row of rows) {
    console.log(formatTableRow(row, widths));
  }
}

function printSection(section: ReportSection): void {
  ui.step(`${section.title}:`);
  if (section.rows.length === 0) {
    ui.message(color.dim("(none)"));
    return;
  }

  const widths = columnWidths(section.headers, section.rows);
  console.log(formatTableRow(section.headers, widths));
  console.log(formatTableSeparator(widths));
  for (const row of section.rows) {
    console.log(formatTableRow(row, widths));
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backupz list")} - List snapshots, sources or retention levels

${color.dim("USAGE:")}
  backupz list -c <file> [OPTIONS] [snapshots|sources|retentions]

${color.dim("OPTIONS:")}
  -c, --config <file>     Configuration file (required)
      --format <format>   Output format: table, json (default: table)
  -v, --verbose           Show details (paths, types, keep counts)
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backupz list -c /etc/backupz.json                  # Pool usage and snapshots
  backupz list -c /etc/backupz.json -v sources       # Sources with paths and types
  backupz list -c /etc/backupz.json retentions       # Retention level names
  backupz list -c /etc/backupz.json --format json    # JSON for scripting
`);
}
