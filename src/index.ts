#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { historyCommand } from "./cli/commands/history";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { startCommand } from "./cli/commands/start";
import { verifyCommand } from "./cli/commands/verify";
import { NAME, VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Container volume backups`);

  p.note(
    `${color.cyan("start")}       Start the scheduler daemon
${color.cyan("backup")}      Run a backup job now
${color.cyan("cleanup")}     Delete archives older than the retention age
${color.cyan("list")}        List archives or eligible workloads
${color.cyan("history")}     Show recorded jobs
${color.cyan("restore")}     Decrypt and extract an archive
${color.cyan("verify")}      Check that archives decrypt and list cleanly`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `${NAME} start                     ${color.dim("# Start scheduler daemon")}
${NAME} backup nextcloud          ${color.dim("# Back up one workload")}
${NAME} backup all                ${color.dim("# Full-system backup")}
${NAME} cleanup --dry-run         ${color.dim("# Preview retention sweep")}
${NAME} history -t nextcloud      ${color.dim("# Jobs of one workload")}
${NAME} restore <archive> -d /tmp ${color.dim("# Restore into a directory")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan(`${NAME} <command> --help`)} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "history":
      return historyCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${NAME} --help`)} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(2);
  });
