import { DEFAULT_CONFIG } from "../src/config";
import type { GuardConfig } from "../src/types";

/**
 * Complete config for tests, rooted in a temp directory
 */
export function makeConfig(root: string, overrides: Partial<GuardConfig> = {}): GuardConfig {
  return {
    ...DEFAULT_CONFIG,
    version: "1.0",
    database: { path: `${root}/guard.db` },
    workDir: `${root}/work`,
    local: { path: `${root}/archives` },
    archive: { ...DEFAULT_CONFIG.archive, password: "test-secret" },
    remote: { ...DEFAULT_CONFIG.remote, enabled: false, retryDelay: 0 },
    docker: { ...DEFAULT_CONFIG.docker, hostRoot: "", restartRetryDelay: 0 },
    ...overrides,
  };
}
