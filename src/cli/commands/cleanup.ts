import { parseArgs } from "node:util";
import type { PruneResult, PruneScope } from "../../core";
import type { RetentionRecord } from "../../types";
import { formatBytes } from "../../utils/format";
import { createCommandContext, reportCommandError } from "../context";
import { color, formatSummary, formatTimestamp, ui } from "../ui";

const SCOPES: readonly PruneScope[] = ["local", "remote", "all"];

function parseScope(value: string): PruneScope | null {
  return SCOPES.find((s) => s === value) ?? null;
}

function describeRecord(record: RetentionRecord): string {
  return `${record.name} ${color.dim(`(${record.location}, ${formatTimestamp(record.timestamp)}, ${formatBytes(record.sizeBytes)})`)}`;
}

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      scope: { type: "string", short: "s", default: "all" },
      days: { type: "string", short: "d" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const scope = parseScope(values.scope);
  if (!scope) {
    ui.error(`Unknown scope: ${values.scope}. Use local, remote or all.`);
    return 1;
  }

  try {
    const context = await createCommandContext(values);
    const { retention } = context.engine;
    const days = values.days !== undefined ? Number(values.days) : context.config.retention.maxAgeDays;
    if (!Number.isFinite(days) || days < 0) {
      ui.error(`--days must be a non-negative number, got "${values.days}"`);
      return 1;
    }

    ui.intro("backup-guard cleanup");

    const preview = await retention.prune(scope, days, { dryRun: true });
    reportListingErrors(preview);

    if (preview.candidates.length === 0) {
      ui.success(`No archives older than ${days} day(s)`);
      ui.outro("Nothing to do");
      context.close();
      return 0;
    }

    ui.step(`Found ${preview.candidates.length} archive(s) older than ${days} day(s):`);
    for (const record of preview.candidates) {
      ui.message(`  ${color.dim("•")} ${describeRecord(record)}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      context.close();
      return 0;
    }

    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${preview.candidates.length} archive(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        context.close();
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Deleting old archives...");
    const result = await retention.prune(scope, days, { reason: "manual" });
    s.stop("Cleanup complete");

    for (const failure of result.failures) {
      ui.error(`  ${failure.record.name}: ${failure.error.message}`);
    }

    ui.note(
      formatSummary([
        { label: "Checked", value: result.checked },
        { label: "Deleted", value: result.deleted.length },
        { label: "Failed", value: result.failures.length },
        { label: "In use", value: result.skippedInFlight.length || null },
      ]),
      "Cleanup Summary",
    );

    context.close();
    if (result.failures.length > 0 || result.listingErrors.length > 0) {
      ui.outro("Cleanup finished with errors");
      return 2;
    }

    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    return reportCommandError("Cleanup", error, values.verbose);
  }
}

function reportListingErrors(result: PruneResult): void {
  for (const { location, message } of result.listingErrors) {
    ui.warn(`Could not list ${location} archives: ${message}`);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard cleanup")} - Delete archives older than the retention age

${color.dim("USAGE:")}
  backup-guard cleanup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
  -s, --scope <scope>     local, remote or all (default: all)
  -d, --days <n>          Maximum age in days (default: retention.maxAgeDays)
      --dry-run           Show what would be deleted without doing it
      --force             Skip confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("NOTES:")}
  Only files matching the archive naming pattern are considered. An archive
  is deleted when it is strictly older than the maximum age; archives of a
  running job are never deleted. Every deletion attempt is recorded in the
  deletion log.

${color.dim("EXAMPLES:")}
  backup-guard cleanup                     # Sweep local and remote (with confirmation)
  backup-guard cleanup -s local -d 3       # Local archives older than 3 days
  backup-guard cleanup --dry-run           # Preview what would be deleted
`);
}
