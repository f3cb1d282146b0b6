import { parseArgs } from "node:util";
import { locateArchive, type VerifyResult, verifyArchive } from "../../core";
import { ConfigError, describeError } from "../../errors";
import { type CommandContext, createCommandContext, reportCommandError } from "../context";
import { color, formatSummary, ui } from "../ui";

interface VerifyReport {
  ref: string;
  result: VerifyResult | null;
  error: string | null;
}

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      all: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const context = await createCommandContext(values);
    const { config, engine } = context;
    const passphrase = config.archive.password;
    if (!passphrase) {
      throw new ConfigError("archive.password (BACKUP_PASSWORD) is required to verify archives");
    }

    ui.intro("backup-guard verify");

    let refs = positionals;
    if (refs.length === 0 && values.all) {
      refs = (await engine.retention.listRecords("local")).map((r) => r.path);
    } else if (refs.length === 0) {
      ui.error("Specify archive names or paths, or use --all to verify every local archive");
      context.close();
      return 1;
    }

    if (refs.length === 0) {
      ui.success("No archives to verify");
      ui.outro("Done");
      context.close();
      return 0;
    }

    const s = ui.spinner();
    s.start(`Verifying ${refs.length} archive(s)...`);
    const reports: VerifyReport[] = [];
    for (const ref of refs) {
      reports.push(await verifyOne(ref, passphrase, context));
    }
    s.stop("Verification complete");
    context.close();

    for (const report of reports) {
      if (report.result) {
        ui.success(`${report.ref} ${color.dim(`(${report.result.entries.length} entries)`)}`);
        if (values.verbose) {
          for (const entry of report.result.entries) {
            ui.message(`  ${color.dim("•")} ${entry}`);
          }
        }
      } else {
        ui.error(`${report.ref}: ${report.error}`);
      }
    }

    const failed = reports.filter((r) => r.result === null).length;
    ui.note(
      formatSummary([
        { label: "Verified", value: reports.length },
        { label: "Healthy", value: reports.length - failed },
        { label: "Failed", value: failed },
      ]),
      "Verification Summary",
    );

    if (failed > 0) {
      ui.outro("Verification found problems");
      return 2;
    }
    ui.outro("All archives are readable");
    return 0;
  } catch (error) {
    return reportCommandError("Verify", error, values.verbose);
  }
}

async function verifyOne(
  ref: string,
  passphrase: string,
  context: CommandContext,
): Promise<VerifyReport> {
  const { engine, config } = context;
  try {
    const located = await locateArchive(ref, { local: engine.local, remote: engine.remote, workDir: config.workDir });
    try {
      const result = await verifyArchive(located.path, passphrase, config.workDir);
      return { ref, result, error: null };
    } finally {
      await located.dispose();
    }
  } catch (err) {
    const { code, message } = describeError(err);
    return { ref, result: null, error: `${code}: ${message}` };
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard verify")} - Check that archives decrypt and list cleanly

${color.dim("USAGE:")}
  backup-guard verify [ARCHIVE...] [OPTIONS]

${color.dim("ARGUMENTS:")}
  ARCHIVE                 Archive file path or name. Names are looked up in the
                          local store first, then fetched from the remote.

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
      --all               Verify every archive in the local store
  -v, --verbose           List archive entries
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backup-guard verify guard_all_full_2025-01-31_030000_k3x9qa.tar.gz.enc
  backup-guard verify --all
`);
}
