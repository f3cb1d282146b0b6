import { parseArgs } from "node:util";
import type { RetentionRecord, StorageType, Workload } from "../../types";
import { formatBytes } from "../../utils/format";
import { createCommandContext, reportCommandError } from "../context";
import { color, formatTableRow, formatTableSeparator, formatTimestamp, TABLE_WIDTHS, ui } from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      location: { type: "string", short: "l", default: "all" },
      workloads: { type: "boolean", short: "w", default: false },
      limit: { type: "string", short: "n" },
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

  try {
    const context = await createCommandContext(values);
    const { engine, config } = context;

    if (values.workloads) {
      const workloads = await engine.discovery.discover(config.docker.label);
      context.close();
      if (values.format === "json") {
        console.log(JSON.stringify(workloads, null, 2));
        return 0;
      }
      ui.intro("backup-guard workloads");
      printWorkloads(workloads);
      ui.outro(`${workloads.length} workload(s) eligible`);
      return 0;
    }

    const locations: StorageType[] =
      values.location === "local" ? ["local"] : values.location === "remote" ? ["remote"] : ["local", "remote"];

    let records: RetentionRecord[] = [];
    const problems: string[] = [];
    for (const location of locations) {
      if (location === "remote" && !engine.remote) continue;
      try {
        records.push(...(await engine.retention.listRecords(location)));
      } catch (err) {
        problems.push(`${location}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    context.close();

    records.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      records = records.slice(0, limit);
    }

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(JSON.stringify(records, null, 2));
      return problems.length > 0 ? 2 : 0;
    }

    ui.intro("backup-guard list");
    for (const problem of problems) {
      ui.warn(`Could not list ${problem}`);
    }

    if (records.length === 0) {
      ui.info("No archives found");
      ui.outro("Done");
      return problems.length > 0 ? 2 : 0;
    }

    printTable(records);
    const total = records.reduce((sum, r) => sum + r.sizeBytes, 0);
    ui.outro(`${records.length} archive(s), ${formatBytes(total)} total`);
    return problems.length > 0 ? 2 : 0;
  } catch (error) {
    return reportCommandError("List", error, values.verbose);
  }
}

function printTable(records: RetentionRecord[]): void {
  const widths = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.location, TABLE_WIDTHS.started, TABLE_WIDTHS.size];
  console.log(formatTableRow(["Archive", "Where", "Created", "Size"].map((h) => color.bold(h)), widths));
  console.log(formatTableSeparator(widths));
  for (const record of records) {
    console.log(
      formatTableRow(
        [record.name, record.location, formatTimestamp(record.timestamp), formatBytes(record.sizeBytes)],
        widths,
      ),
    );
  }
}

function printWorkloads(workloads: Workload[]): void {
  for (const workload of workloads) {
    ui.step(`${color.cyan(workload.name)} ${color.dim(`(${workload.containerNames.join(", ")})`)}`);
    for (const p of workload.paths) {
      ui.message(`  ${color.dim("•")} ${p}`);
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard list")} - List archives or eligible workloads

${color.dim("USAGE:")}
  backup-guard list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
  -l, --location <where>  local, remote or all (default: all)
  -w, --workloads         List eligible workloads instead of archives
  -n, --limit <n>         Show at most n archives
      --format <fmt>      table or json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backup-guard list                        # All archives, newest first
  backup-guard list -l remote -n 10        # Ten newest remote archives
  backup-guard list --workloads            # Containers labelled for backup
  backup-guard list --format json          # JSON output
`);
}
