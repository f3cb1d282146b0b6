import { parseArgs } from "node:util";
import { formatTimestamp } from "../ui/formatters";
import { createCommandContext, reportCommandError } from "../context";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
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
    const { scheduler } = context.engine;

    ui.intro("backup-guard scheduler");

    const triggers = scheduler.listTriggers();
    if (triggers.length === 0) {
      ui.warn("No schedules configured; only manual triggers will run");
      ui.info("Set SCHEDULE_ENABLE=true or add schedules to your config file");
    } else {
      ui.step("Configured schedules:");
      for (const t of triggers) {
        const nextRun = t.nextRun ? formatTimestamp(t.nextRun) : color.dim("disabled");
        ui.message(
          `  ${color.cyan(t.name.padEnd(12))} ${color.dim(t.key.padEnd(20))} ${color.dim(t.cron.padEnd(15))} ${color.dim("next:")} ${nextRun}`,
        );
      }
    }

    scheduler.start();
    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    await new Promise<void>((resolve) => {
      const shutdown = () => {
        ui.cancel("Shutting down, waiting for running jobs...");
        scheduler.stop();
        scheduler
          .idle()
          .then(resolve)
          .catch((err: unknown) => {
            ui.error(`Error while waiting for jobs: ${String(err)}`);
            resolve();
          });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    context.close();
    return 0;
  } catch (error) {
    return reportCommandError("Start", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  backup-guard start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Runs as a long-lived process and starts backup jobs according to the
  schedules in the config file, or the daily schedule enabled through
  SCHEDULE_ENABLE / SCHEDULE_TIME. A schedule whose target is still busy
  is skipped. Each job ends with a retention sweep.

${color.dim("SCHEDULE FORMAT:")}
  Standard cron format: minute hour day-of-month month day-of-week

  Examples:
    "0 3 * * *"     - Every day at 3:00 AM
    "30 1 * * 0"    - Every Sunday at 1:30 AM

${color.dim("EXAMPLES:")}
  backup-guard start                               # Start with default config
  backup-guard start -c /config/backup-guard.yaml  # Start with specific config
  SCHEDULE_ENABLE=true SCHEDULE_TIME=04:30 backup-guard start
`);
}
