/**
 * Snapshot controller
 *
 * Stops a workload's containers, copies its data into the staging area and
 * starts the containers again. Every container this controller stops is
 * started again before `snapshot` returns or throws.
 */

import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import { startContainerWithRetry } from "../../docker/client";
import type { ContainerRuntime } from "../../docker/runtime";
import {
  CopyError,
  describeError,
  ForceStopError,
  RestartFailedError,
  StopTimeoutError,
} from "../../errors";
import type { DockerConfig, SnapshotResult, SnapshotState, Workload } from "../../types";
import { createLogger } from "../../utils/logger";
import { flattenPath } from "../../utils/path";

const log = createLogger("snapshot");

export type PathCopier = (source: string, destination: string) => Promise<void>;

export type SnapshotOptions = Pick<DockerConfig, "stopTimeout" | "restartRetries" | "restartRetryDelay">;

export interface SnapshotHooks {
  /** Called once, right before the first container is stopped. Throwing aborts the snapshot. */
  onStopCommitted?: () => void;
}

/**
 * Recursive copy preserving ownership, permissions and timestamps
 */
export const copyPreserving: PathCopier = async (source, destination) => {
  const result = await execa("cp", ["-a", source, destination], { reject: false });
  if (result.exitCode !== 0) {
    throw new Error(String(result.stderr ?? "").trim() || `cp exited with code ${result.exitCode}`);
  }
};

export class SnapshotController {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: SnapshotOptions,
    private readonly copier: PathCopier = copyPreserving,
  ) {}

  async snapshot(workload: Workload, stagingRoot: string, hooks: SnapshotHooks = {}): Promise<SnapshotResult> {
    if (workload.paths.length === 0) {
      throw new CopyError(workload.name, "no volume or bind-mount paths to copy");
    }

    const states: SnapshotState[] = ["Running"];
    const stagingPath = path.join(stagingRoot, workload.name);
    const stopped: string[] = [];
    let copied = false;
    let resumed: string[] = [];
    let failure: unknown = null;

    try {
      await mkdir(stagingPath, { recursive: true });
      hooks.onStopCommitted?.();

      if (workload.autoRestart.length > 0) {
        const names = workload.autoRestart.map((id) => this.containerName(workload, id));
        log.warn(`Auto-restart containers of "${workload.name}" could come back during the copy: ${names.join(", ")}`);
      }

      states.push("Stopping");
      for (const containerId of workload.containerIds) {
        stopped.push(containerId);
        await this.stopContainer(containerId);
      }

      states.push("Copying");
      await this.copyPaths(workload, stagingPath);
      copied = true;
      resumed = await this.resumedContainers(workload);
    } catch (err) {
      failure = err;
    }

    // Release the paused scope
    states.push("Restarting");
    const notRestarted = await this.restart(stopped);
    if (notRestarted.length > 0) {
      states.push("RestartFailed");
      const names = notRestarted.map((id) => this.containerName(workload, id));
      const error = new RestartFailedError(
        workload.name,
        names,
        copied ? stagingPath : null,
        failure ?? undefined,
      );
      log.error(error.message);
      throw error;
    }
    states.push("Restarted");

    if (failure !== null) {
      throw failure;
    }

    log.info(`Snapshot of "${workload.name}" complete (${stopped.length} container(s) paused)`);
    return { workload: workload.name, stagingPath, stoppedContainers: stopped, resumedDuringCopy: resumed, states };
  }

  private async stopContainer(containerId: string): Promise<void> {
    const timeout = this.options.stopTimeout;
    const stopped = await this.runtime.stop(containerId, timeout);
    if (stopped && !(await this.runtime.isRunning(containerId))) {
      log.info(`Stopped container ${containerId}`);
      return;
    }

    log.warn(new StopTimeoutError(containerId, timeout).message);
    const killed = await this.runtime.kill(containerId);
    if (!killed || (await this.runtime.isRunning(containerId))) {
      throw new ForceStopError(containerId, killed ? "still running after kill" : undefined);
    }
    log.info(`Force-stopped container ${containerId}`);
  }

  /**
   * Auto-restart containers that are running again after the copy
   */
  private async resumedContainers(workload: Workload): Promise<string[]> {
    const resumed: string[] = [];
    for (const containerId of workload.autoRestart) {
      if (await this.runtime.isRunning(containerId)) {
        resumed.push(containerId);
      }
    }
    if (resumed.length > 0) {
      const names = resumed.map((id) => this.containerName(workload, id));
      log.warn(`Snapshot of "${workload.name}" may be inconsistent; restarted during the copy: ${names.join(", ")}`);
    }
    return resumed;
  }

  private async copyPaths(workload: Workload, stagingPath: string): Promise<void> {
    let copiedCount = 0;

    for (const source of workload.paths) {
      if (!existsSync(source)) {
        log.warn(`Path ${source} of "${workload.name}" does not exist, skipping`);
        continue;
      }

      const destination = path.join(stagingPath, flattenPath(source));
      try {
        await this.copier(source, destination);
      } catch (err) {
        throw new CopyError(workload.name, `${source}: ${describeError(err).message}`, err);
      }
      copiedCount++;
    }

    if (copiedCount === 0) {
      throw new CopyError(workload.name, "none of the declared paths exist");
    }
  }

  /**
   * Start every stopped container; returns the ids that could not be started
   */
  private async restart(containerIds: string[]): Promise<string[]> {
    const failed: string[] = [];
    const start = async (id: string): Promise<boolean> => {
      try {
        return await this.runtime.start(id);
      } catch (err) {
        log.error(`Start of ${id} threw`, err);
        return false;
      }
    };

    for (const containerId of containerIds) {
      const ok = await startContainerWithRetry(
        start,
        containerId,
        this.options.restartRetries,
        this.options.restartRetryDelay,
      );
      if (!ok) {
        failed.push(containerId);
      }
    }
    return failed;
  }

  private containerName(workload: Workload, containerId: string): string {
    const index = workload.containerIds.indexOf(containerId);
    return workload.containerNames[index] ?? containerId;
  }
}
