/**
 * Error taxonomy for the backup engine.
 *
 * Every error carries a stable `code` (the class name) that is written to job
 * history and notifications, and a `severity`. `critical` is reserved for
 * failures that leave a workload stopped.
 */

export type ErrorSeverity = "error" | "critical";

export class GuardError extends Error {
  readonly code: string;
  readonly severity: ErrorSeverity;

  constructor(message: string, options?: { cause?: unknown; severity?: ErrorSeverity }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = new.target.name;
    this.severity = options?.severity ?? "error";
  }
}

/** Invalid or incomplete configuration. */
export class ConfigError extends GuardError {}

/** Container runtime unreachable. Fatal for the job; nothing has been touched. */
export class DiscoveryError extends GuardError {}

/** A manual target named a workload that discovery did not return. */
export class WorkloadNotFoundError extends GuardError {
  constructor(public readonly workload: string) {
    super(`No eligible workload named "${workload}" is running`);
  }
}

/** Graceful stop did not complete in time. Escalates to a force stop. */
export class StopTimeoutError extends GuardError {
  constructor(
    public readonly containerId: string,
    public readonly timeoutSeconds: number,
  ) {
    super(`Container ${containerId} did not stop within ${timeoutSeconds}s`);
  }
}

/** Force stop failed too; the workload's snapshot is aborted. */
export class ForceStopError extends GuardError {
  constructor(
    public readonly containerId: string,
    detail?: string,
  ) {
    super(`Failed to force-stop container ${containerId}${detail ? `: ${detail}` : ""}`);
  }
}

export class CopyError extends GuardError {
  constructor(
    public readonly workload: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Copy failed for workload "${workload}": ${message}`, { cause });
  }
}

/**
 * One or more containers stopped by the engine could not be started again.
 * `stagingPath` is set when the copy itself succeeded.
 */
export class RestartFailedError extends GuardError {
  constructor(
    public readonly workload: string,
    public readonly containers: string[],
    public readonly stagingPath: string | null,
    cause?: unknown,
  ) {
    super(
      `Workload "${workload}" left stopped: failed to restart ${containers.join(", ")}`,
      { cause, severity: "critical" },
    );
  }
}

export class CompressionError extends GuardError {}

export class EncryptionError extends GuardError {}

/** Wrong passphrase, truncated file or tampered ciphertext. */
export class DecryptionError extends GuardError {}

/** Transfer or remote verification failed after all retries. */
export class UploadError extends GuardError {
  constructor(
    message: string,
    public readonly localPath: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class PruneEntryError extends GuardError {
  constructor(
    public readonly entryPath: string,
    cause?: unknown,
  ) {
    super(`Failed to delete ${entryPath}: ${describeError(cause).message}`, { cause });
  }
}

export class ConfigExportError extends GuardError {}

export class JobAlreadyRunningError extends GuardError {
  constructor(
    public readonly target: string,
    public readonly heldBy: string,
  ) {
    super(`A job for "${heldBy}" is already running; rejected trigger for "${target}"`);
  }
}

export class JobCancelledError extends GuardError {
  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled before any container was stopped`);
  }
}

export interface ErrorDescription {
  code: string;
  message: string;
  severity: ErrorSeverity;
}

/**
 * Normalise any thrown value for history and notifications.
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof GuardError) {
    return { code: error.code, message: error.message, severity: error.severity };
  }
  if (error instanceof Error) {
    return { code: error.name || "Error", message: error.message, severity: "error" };
  }
  return { code: "Error", message: String(error), severity: "error" };
}
