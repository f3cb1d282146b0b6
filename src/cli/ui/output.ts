/**
 * Styled output and prompts
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;
export const NAME = "backup-guard";

export const ui = {
  intro: (title: string) => p.intro(color.bgCyan(color.black(` ${title} `))),
  outro: (message: string) => p.outro(color.green(message)),
  cancel: (message: string) => p.cancel(message),
  note: (message: string, title?: string) => p.note(message, title),
  info: (message: string) => p.log.info(message),
  success: (message: string) => p.log.success(message),
  warn: (message: string) => p.log.warn(message),
  error: (message: string) => p.log.error(message),
  step: (message: string) => p.log.step(message),
  message: (message: string) => p.log.message(message),
  spinner: p.spinner,
  confirm: p.confirm,
  select: p.select,
  isCancel: p.isCancel,
};
