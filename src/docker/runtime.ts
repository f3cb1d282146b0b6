/**
 * Container runtime contract and its docker CLI implementation
 */

import type { ContainerInfo } from "../types";
import {
  inspectContainers,
  isContainerRunning,
  isDockerAvailable,
  killContainer,
  listContainerIds,
  startContainer,
  stopContainer,
} from "./client";

export interface ContainerRuntime {
  ping(): Promise<boolean>;
  /** Running containers whose `label` equals `value`; null when the runtime cannot answer */
  listContainers(label: string, value: string): Promise<ContainerInfo[] | null>;
  stop(containerId: string, timeoutSeconds: number): Promise<boolean>;
  kill(containerId: string): Promise<boolean>;
  start(containerId: string): Promise<boolean>;
  isRunning(containerId: string): Promise<boolean>;
}

export class DockerCliRuntime implements ContainerRuntime {
  ping(): Promise<boolean> {
    return isDockerAvailable();
  }

  async listContainers(label: string, value: string): Promise<ContainerInfo[] | null> {
    const ids = await listContainerIds(label, value);
    if (ids === null) {
      return null;
    }
    return inspectContainers(ids);
  }

  stop(containerId: string, timeoutSeconds: number): Promise<boolean> {
    return stopContainer(containerId, timeoutSeconds);
  }

  kill(containerId: string): Promise<boolean> {
    return killContainer(containerId);
  }

  start(containerId: string): Promise<boolean> {
    return startContainer(containerId);
  }

  isRunning(containerId: string): Promise<boolean> {
    return isContainerRunning(containerId);
  }
}
