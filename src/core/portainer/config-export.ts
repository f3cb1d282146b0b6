/**
 * Export of the configuration management backup (Portainer)
 */

import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { ConfigExportError, describeError } from "../../errors";
import type { PortainerConfig } from "../../types";
import { createLogger } from "../../utils/logger";
import type { FetchFn } from "../notify/sinks";

const log = createLogger("portainer");

export const CONFIG_EXPORT_FILE = "portainer-backup.tar.gz";
const EXPORT_TIMEOUT_MS = 120_000;

export interface ConfigExporter {
  exportConfig(destDir: string): Promise<string>;
}

export class PortainerExporter implements ConfigExporter {
  constructor(
    private readonly config: PortainerConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  /**
   * Download the backup blob into `destDir`; returns the written file path
   */
  async exportConfig(destDir: string): Promise<string> {
    const url = `${this.config.url.replace(/\/+$/, "")}/api/backup`;
    let body: Buffer;

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: { "X-API-Key": this.config.token, "Content-Type": "application/json" },
        body: JSON.stringify({ password: "" }),
        signal: AbortSignal.timeout(EXPORT_TIMEOUT_MS),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw new ConfigExportError(`Portainer export from ${url} failed: ${describeError(err).message}`, {
        cause: err,
      });
    }

    if (body.length === 0) {
      throw new ConfigExportError(`Portainer export from ${url} returned an empty body`);
    }

    await mkdir(destDir, { recursive: true });
    const filePath = path.join(destDir, CONFIG_EXPORT_FILE);
    await writeFile(filePath, body);
    log.info(`Exported configuration backup (${body.length} bytes)`);
    return filePath;
  }
}
