/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Flatten an absolute path into a single directory name,
 * e.g. `/var/lib/docker/volumes/db/_data` -> `var_lib_docker_volumes_db_%5Fdata`.
 * `%` and `_` are escaped first, so distinct paths never share a name.
 */
export function flattenPath(sourcePath: string): string {
  const trimmed = sourcePath.replace(/^\/+|\/+$/g, "");
  if (trimmed === "") return "root";
  return trimmed.replace(/%/g, "%25").replace(/_/g, "%5F").replace(/\//g, "_");
}
