import { parseArgs } from "node:util";
import { parseTargetArg } from "../../config";
import { targetKey } from "../../core";
import { initDatabase, queryHistory } from "../../db";
import type { HistoryEntry, HistoryQuery } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { loadCommandConfig, reportCommandError } from "../context";
import { color, formatStatus, formatTableRow, formatTableSeparator, formatTimestamp, TABLE_WIDTHS, ui } from "../ui";

function parseDateOption(name: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`--${name} is not a valid date: ${value}`);
  }
  return date;
}

export async function historyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      target: { type: "string", short: "t" },
      from: { type: "string" },
      to: { type: "string" },
      limit: { type: "string", short: "n", default: "20" },
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  let query: HistoryQuery;
  try {
    query = {
      target: values.target ? targetKey(parseTargetArg(values.target)) : undefined,
      from: parseDateOption("from", values.from),
      to: parseDateOption("to", values.to),
      limit: parseInt(values.limit, 10) || 20,
    };
  } catch (error) {
    ui.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    await initDatabase(config.database.path);
    const entries = queryHistory(query);

    if (values.format === "json") {
      console.log(JSON.stringify(entries, null, 2));
      return 0;
    }

    ui.intro("backup-guard history");
    if (entries.length === 0) {
      ui.info("No jobs recorded");
      ui.outro("Done");
      return 0;
    }

    printTable(entries, values.verbose ?? false);
    ui.outro(`${entries.length} job(s) shown`);
    return 0;
  } catch (error) {
    return reportCommandError("History", error, values.verbose);
  }
}

function printTable(entries: HistoryEntry[], verbose: boolean): void {
  const widths = [TABLE_WIDTHS.started, TABLE_WIDTHS.target, TABLE_WIDTHS.status, 8, TABLE_WIDTHS.size, TABLE_WIDTHS.error];
  console.log(
    formatTableRow(["Started", "Target", "Status", "Took", "Size", "Error"].map((h) => color.bold(h)), widths),
  );
  console.log(formatTableSeparator(widths));

  for (const entry of entries) {
    // Pad before colouring so escape codes do not break alignment
    const status = formatStatus(entry.status) + " ".repeat(Math.max(0, TABLE_WIDTHS.status - entry.status.length));
    console.log(
      formatTableRow(
        [
          formatTimestamp(entry.started_at),
          entry.target,
          status,
          formatDuration(entry.duration_ms),
          entry.archive_size_bytes !== null ? formatBytes(entry.archive_size_bytes) : "-",
          entry.error_code ?? "",
        ],
        widths,
      ),
    );
    if (verbose) {
      if (entry.archive_name) console.log(color.dim(`    archive: ${entry.archive_name}`));
      if (entry.error_message) console.log(color.dim(`    error: ${entry.error_message}`));
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard history")} - Show recorded jobs

${color.dim("USAGE:")}
  backup-guard history [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
  -t, --target <target>   Only jobs for a workload, "all" or "config"
      --from <date>       Jobs started at or after this date (ISO 8601)
      --to <date>         Jobs started at or before this date (ISO 8601)
  -n, --limit <n>         Number of jobs to show (default: 20)
      --format <fmt>      table or json (default: table)
  -v, --verbose           Show archive names and error messages
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backup-guard history                     # Latest jobs
  backup-guard history -t nextcloud        # Jobs of one workload
  backup-guard history --from 2025-01-01 --format json
`);
}
