/**
 * Storage type definitions
 */

export type StorageType = "local" | "remote";

/**
 * One entry of a remote listing
 */
export interface RemoteEntry {
  name: string;
  size: number;
  modTime: Date | null;
}

/**
 * Remote sync tool contract
 */
export interface RemoteStore {
  readonly description: string;

  /** Copy a local file to a path on the remote */
  copy(localPath: string, remotePath: string): Promise<void>;

  /** List files directly under a remote directory */
  list(remotePath: string): Promise<RemoteEntry[]>;

  /** Delete a single file on the remote */
  delete(remotePath: string): Promise<void>;

  /** Download a remote file to a local path */
  fetch(remotePath: string, localPath: string): Promise<void>;
}

/**
 * A backup found in local storage or on the remote
 */
export interface RetentionRecord {
  location: StorageType;
  name: string;
  path: string;
  timestamp: Date;
  sizeBytes: number;
}
