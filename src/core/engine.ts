/**
 * Wires the engine components from a loaded config
 */

import * as path from "node:path";
import { appendHistory, logDeletion } from "../db";
import { type ContainerRuntime, DockerCliRuntime } from "../docker/runtime";
import { createStores, type LocalArchiveStore } from "../storage";
import type { GuardConfig, RemoteStore } from "../types";
import { ArchivePipeline } from "./archive";
import { WorkloadDiscovery } from "./discovery";
import { JobRunner, LockRegistry } from "./jobs";
import { createSinks, Notifier } from "./notify";
import { PortainerExporter } from "./portainer";
import { RetentionManager } from "./retention";
import { Scheduler, triggersFromConfig } from "./scheduler";
import { SnapshotController } from "./snapshot";
import { SyncManager } from "./sync";

export interface Engine {
  config: GuardConfig;
  locks: LockRegistry;
  local: LocalArchiveStore;
  remote: RemoteStore | null;
  discovery: WorkloadDiscovery;
  retention: RetentionManager;
  runner: JobRunner;
  scheduler: Scheduler;
}

export interface EngineOverrides {
  runtime?: ContainerRuntime;
  remote?: RemoteStore | null;
}

export function createEngine(config: GuardConfig, overrides: EngineOverrides = {}): Engine {
  const runtime = overrides.runtime ?? new DockerCliRuntime();
  const stores = createStores(config);
  const remote = overrides.remote !== undefined ? overrides.remote : stores.remote;
  const locks = new LockRegistry({ dir: path.join(config.workDir, "locks") });

  const discovery = new WorkloadDiscovery(runtime, config.docker);
  const retention = new RetentionManager({
    local: stores.local,
    remote,
    prefix: config.archive.prefix,
    isInFlight: (name) => locks.isInFlight(name),
    recordDeletion: logDeletion,
  });

  const runner = new JobRunner({
    locks,
    discovery,
    snapshot: new SnapshotController(runtime, config.docker),
    archive: new ArchivePipeline(config.archive),
    sync: remote ? new SyncManager(remote, config.remote) : null,
    retention,
    local: stores.local,
    history: { append: appendHistory },
    notifier: new Notifier(createSinks(config.notifications)),
    exporter: config.portainer ? new PortainerExporter(config.portainer) : null,
    settings: {
      label: config.docker.label,
      workDir: config.workDir,
      passphrase: config.archive.password,
      retentionDays: config.retention.maxAgeDays,
    },
  });

  const scheduler = new Scheduler(runner);
  for (const trigger of triggersFromConfig(config)) {
    scheduler.setTrigger(trigger);
  }

  return { config, locks, local: stores.local, remote, discovery, retention, runner, scheduler };
}
