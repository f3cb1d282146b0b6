/**
 * Workload and container type definitions
 */

export interface ContainerMount {
  type: string;
  source: string;
  destination: string;
}

/**
 * A running container as reported by the runtime
 */
export interface ContainerInfo {
  id: string;
  name: string;
  state: string;
  labels: Record<string, string>;
  mounts: ContainerMount[];
  restartPolicy: string | null;
}

/**
 * One or more containers backed up as a single unit
 */
export interface Workload {
  name: string;
  containerIds: string[];
  containerNames: string[];
  /** Resolved volume/bind-mount paths to copy */
  paths: string[];
  /** Containers whose restart policy (`always`, `unless-stopped`) can start them while stopped */
  autoRestart: string[];
  enabled: boolean;
}

export type SnapshotState =
  | "Running"
  | "Stopping"
  | "Copying"
  | "Restarting"
  | "Restarted"
  | "RestartFailed";

export interface SnapshotResult {
  workload: string;
  stagingPath: string;
  stoppedContainers: string[];
  /** Auto-restart containers found running again once the copy finished */
  resumedDuringCopy: string[];
  states: SnapshotState[];
}
