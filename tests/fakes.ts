import type { ContainerRuntime } from "../src/docker/runtime";
import type { ContainerInfo, RemoteEntry, RemoteStore } from "../src/types";

/**
 * In-memory container runtime that records every call
 */
export class FakeRuntime implements ContainerRuntime {
  reachable = true;
  containers: ContainerInfo[] | null = [];
  running = new Set<string>();
  /** Containers whose graceful stop fails */
  stubbornStop = new Set<string>();
  /** Containers that cannot be killed */
  unkillable = new Set<string>();
  /** Remaining start failures per container; Infinity never starts */
  startFailures = new Map<string, number>();
  calls: string[] = [];

  async ping(): Promise<boolean> {
    return this.reachable;
  }

  async listContainers(label: string, value: string): Promise<ContainerInfo[] | null> {
    this.calls.push(`list ${label}=${value}`);
    return this.containers;
  }

  async stop(containerId: string): Promise<boolean> {
    this.calls.push(`stop ${containerId}`);
    if (this.stubbornStop.has(containerId)) return false;
    this.running.delete(containerId);
    return true;
  }

  async kill(containerId: string): Promise<boolean> {
    this.calls.push(`kill ${containerId}`);
    if (this.unkillable.has(containerId)) return false;
    this.running.delete(containerId);
    return true;
  }

  async start(containerId: string): Promise<boolean> {
    this.calls.push(`start ${containerId}`);
    const remaining = this.startFailures.get(containerId) ?? 0;
    if (remaining > 0) {
      this.startFailures.set(containerId, remaining - 1);
      return false;
    }
    this.running.add(containerId);
    return true;
  }

  async isRunning(containerId: string): Promise<boolean> {
    return this.running.has(containerId);
  }

  callsFor(prefix: string): string[] {
    return this.calls.filter((c) => c.startsWith(prefix));
  }
}

export function container(
  id: string,
  overrides: Partial<ContainerInfo> = {},
): ContainerInfo {
  return {
    id,
    name: id,
    state: "running",
    labels: { "backup.enable": "true" },
    mounts: [],
    restartPolicy: null,
    ...overrides,
  };
}

interface StoredFile {
  content: Buffer;
  modTime: Date | null;
}

/**
 * Remote store backed by a map of path to content
 */
export class FakeRemote implements RemoteStore {
  readonly description = "fake:backups";
  files = new Map<string, StoredFile>();
  copyFailures = 0;
  listFailure: Error | null = null;
  deleteFailures = new Set<string>();
  /** Bytes dropped from every copied file, to simulate a truncated transfer */
  truncateBy = 0;
  copies: string[] = [];

  constructor(private readonly readLocal: (path: string) => Promise<Buffer>) {}

  async copy(localPath: string, remotePath: string): Promise<void> {
    this.copies.push(remotePath);
    if (this.copyFailures > 0) {
      this.copyFailures--;
      throw new Error("transfer interrupted");
    }
    const content = await this.readLocal(localPath);
    this.files.set(remotePath, {
      content: content.subarray(0, Math.max(0, content.length - this.truncateBy)),
      modTime: new Date(),
    });
  }

  async list(remotePath: string): Promise<RemoteEntry[]> {
    if (this.listFailure) throw this.listFailure;
    const prefix = remotePath === "" ? "" : `${remotePath.replace(/\/+$/, "")}/`;
    const entries: RemoteEntry[] = [];
    for (const [key, file] of this.files) {
      if (!key.startsWith(prefix)) continue;
      const name = key.slice(prefix.length);
      if (name.includes("/")) continue;
      entries.push({ name, size: file.content.length, modTime: file.modTime });
    }
    return entries;
  }

  async delete(remotePath: string): Promise<void> {
    if (this.deleteFailures.has(remotePath)) throw new Error("permission denied");
    if (!this.files.delete(remotePath)) throw new Error(`not found: ${remotePath}`);
  }

  async fetch(): Promise<void> {
    throw new Error("fetch is not supported by this fake");
  }

  put(remotePath: string, content: string, modTime: Date | null): void {
    this.files.set(remotePath, { content: Buffer.from(content), modTime });
  }
}
