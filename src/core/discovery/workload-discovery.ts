/**
 * Workload discovery
 *
 * Lists running containers, keeps those opted in through the eligibility label
 * and groups them by compose project into workloads.
 */

import * as path from "node:path";
import type { ContainerRuntime } from "../../docker/runtime";
import { DiscoveryError } from "../../errors";
import type { ContainerInfo, DockerConfig, Workload } from "../../types";
import { createLogger } from "../../utils/logger";

const log = createLogger("discovery");

/** Named volumes live here on the host and are mounted read-through into the engine */
export const DOCKER_VOLUMES_ROOT = "/var/lib/docker/volumes";

const AUTO_RESTART_POLICIES = new Set(["always", "unless-stopped"]);

export function hasAutoRestartPolicy(container: ContainerInfo): boolean {
  return container.restartPolicy !== null && AUTO_RESTART_POLICIES.has(container.restartPolicy);
}

export type DiscoveryOptions = Pick<DockerConfig, "projectLabel" | "hostRoot" | "excludePaths">;

/**
 * Map a mount source on the host to the path readable from this process
 */
export function resolveHostPath(source: string, hostRoot: string): string {
  if (!hostRoot || source.startsWith(DOCKER_VOLUMES_ROOT)) {
    return source;
  }
  return path.join(hostRoot, source);
}

/**
 * Copyable paths of a container: bind and volume mounts minus excluded sources
 */
export function containerPaths(container: ContainerInfo, options: DiscoveryOptions): string[] {
  const excluded = new Set(options.excludePaths.map((p) => path.normalize(p)));
  const paths: string[] = [];

  for (const mount of container.mounts) {
    if (mount.type !== "bind" && mount.type !== "volume") continue;
    if (!mount.source) continue;
    if (excluded.has(path.normalize(mount.source))) {
      log.debug(`Skipping excluded mount ${mount.source} of ${container.name}`);
      continue;
    }
    paths.push(resolveHostPath(mount.source, options.hostRoot));
  }

  return paths;
}

/**
 * Group eligible containers into workloads, ordered by name
 */
export function groupWorkloads(containers: ContainerInfo[], options: DiscoveryOptions): Workload[] {
  const groups = new Map<string, Workload>();

  for (const container of containers) {
    const name = container.labels[options.projectLabel] || container.name;
    let workload = groups.get(name);
    if (!workload) {
      workload = { name, containerIds: [], containerNames: [], paths: [], autoRestart: [], enabled: true };
      groups.set(name, workload);
    }

    workload.containerIds.push(container.id);
    workload.containerNames.push(container.name);
    if (hasAutoRestartPolicy(container)) {
      workload.autoRestart.push(container.id);
    }
    for (const p of containerPaths(container, options)) {
      if (!workload.paths.includes(p)) {
        workload.paths.push(p);
      }
    }
  }

  return [...groups.values()].sort((a, b) => a.name.localeCompare(b.name));
}

export class WorkloadDiscovery {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: DiscoveryOptions,
  ) {}

  /**
   * Discover eligible workloads; only containers whose `label` is "true" qualify
   */
  async discover(label: string, projectFilter?: string): Promise<Workload[]> {
    if (!(await this.runtime.ping())) {
      throw new DiscoveryError("Container runtime is not reachable");
    }

    const containers = await this.runtime.listContainers(label, "true");
    if (containers === null) {
      throw new DiscoveryError(`Failed to list containers labelled ${label}=true`);
    }

    // The runtime filter is authoritative, but inspect data is re-checked
    const eligible = containers.filter(
      (c) => c.labels[label] === "true" && (c.state === "running" || c.state === "unknown"),
    );
    let workloads = groupWorkloads(eligible, this.options);

    if (projectFilter !== undefined) {
      workloads = workloads.filter((w) => w.name === projectFilter);
    }

    log.info(
      `Discovered ${workloads.length} workload(s)` +
        (workloads.length > 0 ? `: ${workloads.map((w) => w.name).join(", ")}` : ""),
    );
    return workloads;
  }
}
