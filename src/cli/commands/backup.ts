import { parseArgs } from "node:util";
import { parseTargetArg } from "../../config";
import type { JobOutcome, JobTarget } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { type CommandContext, createCommandContext, reportCommandError } from "../context";
import { color, formatStatus, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      target: { type: "string", short: "t" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  let context: CommandContext | null = null;
  try {
    context = await createCommandContext(values);
    ui.intro("backup-guard backup");

    const targetArg = values.target ?? positionals[0];
    const target = targetArg ? parseTargetArg(targetArg) : await promptTarget(context);
    if (!target) {
      ui.cancel("Backup cancelled");
      return 1;
    }

    const handle = context.engine.scheduler.triggerNow(target);
    const s = ui.spinner();
    s.start(`Running job ${handle.job.id}...`);

    const cancelOnSignal = () => {
      if (handle.cancel()) {
        s.message("Cancelling before any container is stopped...");
      } else {
        s.message("Containers are already paused; waiting for the job to restart them...");
      }
    };
    process.on("SIGINT", cancelOnSignal);
    const outcome = await handle.done;
    process.off("SIGINT", cancelOnSignal);
    s.stop(`Job finished: ${formatStatus(outcome.status)}`);

    printOutcome(outcome);

    if (outcome.status === "success") {
      ui.outro("Backup complete!");
      return 0;
    }
    if (outcome.severity === "critical") {
      ui.error("A workload was left stopped; restart it manually");
    }
    ui.outro(outcome.status === "partial" ? "Backup finished with errors" : "Backup failed");
    return 2;
  } catch (error) {
    return reportCommandError("Backup", error, values.verbose);
  } finally {
    context?.close();
  }
}

async function promptTarget(context: CommandContext): Promise<JobTarget | null> {
  const workloads = await context.engine.discovery.discover(context.config.docker.label);
  const options = [
    { value: "all", label: "all", hint: "Every eligible workload" },
    ...workloads.map((w) => ({ value: w.name, label: w.name, hint: w.containerNames.join(", ") })),
  ];
  if (context.config.portainer) {
    options.push({ value: "config", label: "config", hint: "Configuration export only" });
  }

  const selected = await ui.select({ message: "Select a target", options });
  if (ui.isCancel(selected)) {
    return null;
  }
  return parseTargetArg(selected);
}

function printOutcome(outcome: JobOutcome): void {
  for (const workload of outcome.workloads) {
    const mark = workload.ok ? color.green("OK") : color.red(workload.errorCode ?? "FAILED");
    ui.message(`  [${mark}] ${workload.workload}${workload.errorMessage ? color.dim(` ${workload.errorMessage}`) : ""}`);
  }

  ui.note(
    formatSummary([
      { label: "Job ID", value: outcome.jobId },
      { label: "Target", value: outcome.target },
      { label: "Status", value: formatStatus(outcome.status) },
      { label: "Archive", value: outcome.archiveName },
      { label: "Size", value: outcome.archiveSizeBytes !== null ? formatBytes(outcome.archiveSizeBytes) : null },
      { label: "Duration", value: formatDuration(outcome.durationMs) },
      { label: "Remote", value: outcome.remotePath },
      { label: "Local copy", value: outcome.localPath },
      { label: "Pruned", value: outcome.prunedCount || null },
      { label: "Error", value: outcome.errorCode ? `${outcome.errorCode}: ${outcome.errorMessage ?? ""}` : null },
    ]),
    "Backup Summary",
  );
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard backup")} - Run a backup job now

${color.dim("USAGE:")}
  backup-guard backup [TARGET] [OPTIONS]

${color.dim("TARGET:")}
  <workload>              A single workload (compose project or container name)
  all                     Every eligible workload, plus the configuration export
  config                  Configuration export only
                          If omitted, you'll be prompted to select one.

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
  -t, --target <target>   Same as the positional TARGET
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("NOTES:")}
  Containers of a workload are stopped only while their data is copied and
  are always started again. Ctrl+C cancels the job only before the first
  container is stopped.

${color.dim("EXAMPLES:")}
  backup-guard backup                      # Interactive target selection
  backup-guard backup nextcloud            # Back up one workload
  backup-guard backup all                  # Full-system backup
`);
}
