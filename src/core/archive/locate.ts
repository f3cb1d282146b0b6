/**
 * Find an archive by path or name, fetching it from the remote when needed
 */

import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { LocalArchiveStore } from "../../storage/local";
import type { RemoteStore } from "../../types";
import { createLogger } from "../../utils/logger";

const log = createLogger("archive");

export interface LocatedArchive {
  path: string;
  source: "path" | "local" | "remote";
  /** Removes a fetched copy; no-op for files that were already local */
  dispose(): Promise<void>;
}

export interface LocateDeps {
  local: LocalArchiveStore;
  remote: RemoteStore | null;
  /** Where remote archives are downloaded to */
  workDir: string;
}

const noop = async (): Promise<void> => {};

export async function locateArchive(ref: string, deps: LocateDeps): Promise<LocatedArchive> {
  if (existsSync(ref)) {
    return { path: path.resolve(ref), source: "path", dispose: noop };
  }

  const name = path.basename(ref);
  if (await deps.local.exists(name)) {
    return { path: deps.local.pathFor(name), source: "local", dispose: noop };
  }

  if (!deps.remote) {
    throw new Error(`Archive not found locally and no remote is configured: ${ref}`);
  }

  const fetchDir = path.join(deps.workDir, "fetch");
  await mkdir(fetchDir, { recursive: true });
  const target = path.join(fetchDir, name);
  log.info(`Fetching ${name} from ${deps.remote.description}`);
  await deps.remote.fetch(name, target);

  return {
    path: target,
    source: "remote",
    dispose: async () => {
      await rm(target, { force: true });
    },
  };
}
