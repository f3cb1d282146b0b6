import * as path from "node:path";
import { parseArgs } from "node:util";
import { locateArchive, restoreArchive } from "../../core";
import { ConfigError } from "../../errors";
import { type CommandContext, createCommandContext, reportCommandError } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      dest: { type: "string", short: "d" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const ref = positionals[0];
  if (!ref || !values.dest) {
    ui.error("Usage: backup-guard restore <archive> --dest <directory>");
    return 1;
  }

  let context: CommandContext | null = null;
  try {
    context = await createCommandContext(values);
    const { config, engine } = context;
    const passphrase = config.archive.password;
    if (!passphrase) {
      throw new ConfigError("archive.password (BACKUP_PASSWORD) is required to restore archives");
    }

    ui.intro("backup-guard restore");
    const destDir = path.resolve(values.dest);

    const s = ui.spinner();
    s.start(`Locating ${ref}...`);
    const located = await locateArchive(ref, { local: engine.local, remote: engine.remote, workDir: config.workDir });
    let entries: string[];
    try {
      s.message("Decrypting and extracting...");
      entries = await restoreArchive(located.path, passphrase, destDir);
    } finally {
      await located.dispose();
    }
    s.stop("Restore complete");

    ui.note(
      formatSummary([
        { label: "Archive", value: path.basename(located.path) },
        { label: "Source", value: located.source },
        { label: "Destination", value: destDir },
        { label: "Entries", value: entries.length },
      ]),
      "Restore Summary",
    );
    ui.info("Containers were not touched; stop them before moving restored data into place");
    ui.outro("Done");
    return 0;
  } catch (error) {
    return reportCommandError("Restore", error, values.verbose);
  } finally {
    context?.close();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backup-guard restore")} - Decrypt and extract an archive

${color.dim("USAGE:")}
  backup-guard restore <ARCHIVE> --dest <DIR> [OPTIONS]

${color.dim("ARGUMENTS:")}
  ARCHIVE                 Archive file path or name. Names are looked up in the
                          local store first, then fetched from the remote.

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backup-guard.config.yaml)
  -d, --dest <dir>        Directory to extract into (created if missing)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("LAYOUT:")}
  Each workload is extracted as <dest>/<workload>/<flattened source path>,
  e.g. <dest>/nextcloud/var_lib_docker_volumes_nextcloud%5Fdata_%5Fdata

${color.dim("EXAMPLES:")}
  backup-guard restore guard_nextcloud_project_2025-01-31_030000_k3x9qa.tar.gz.enc -d /tmp/restore
`);
}
