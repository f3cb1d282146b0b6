/**
 * Storage module exports
 */

import type { GuardConfig, RemoteStore } from "../types";
import { LocalArchiveStore } from "./local";
import { RcloneRemoteStore } from "./rclone";

export { type LocalEntry, LocalArchiveStore } from "./local";
export {
  parseLsjsonOutput,
  type RcloneResult,
  RcloneRemoteStore,
  resolveRcloneConfigPath,
} from "./rclone";

export interface Stores {
  local: LocalArchiveStore;
  remote: RemoteStore | null;
}

/**
 * Create storage backends based on config
 */
export function createStores(config: GuardConfig): Stores {
  return {
    local: new LocalArchiveStore(config.local),
    remote: config.remote.enabled ? new RcloneRemoteStore(config.remote) : null,
  };
}
