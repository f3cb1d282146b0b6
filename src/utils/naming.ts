/**
 * Archive naming utilities
 */

import type { JobKind } from "../types";
import { generateShortId } from "./crypto";

export const ARCHIVE_EXTENSION = ".tar.gz.enc";

// Pattern: prefix_target_kind_date_time_shortid.tar.gz.enc
export const ARCHIVE_NAME_PATTERN =
  /^([a-z]+)_([a-z0-9-]+)_(project|full|config)_(\d{4}-\d{2}-\d{2})_(\d{6})_([a-z0-9]+)\.tar\.gz\.enc$/;

export interface ParsedArchiveName {
  prefix: string;
  target: string;
  kind: JobKind;
  date: string;
  time: string;
  shortId: string;
  /** Creation time encoded in the name (UTC) */
  createdAt: Date;
}

/**
 * Reduce a workload name to the characters allowed in an archive name
 */
export function sanitizeTargetName(name: string): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
  return sanitized || "unnamed";
}

export function generateArchiveName(
  target: string,
  kind: JobKind,
  prefix: string = "guard",
  now: Date = new Date(),
): string {
  const iso = now.toISOString();
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 19).replace(/:/g, "");

  return `${prefix}_${sanitizeTargetName(target)}_${kind}_${date}_${time}_${generateShortId()}${ARCHIVE_EXTENSION}`;
}

function toKind(value: string): JobKind | null {
  return value === "project" || value === "full" || value === "config" ? value : null;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = ARCHIVE_NAME_PATTERN.exec(archiveName);
  if (!match) return null;

  const [, prefix, target, kindStr, date, time, shortId] = match;
  const kind = toKind(kindStr ?? "");
  if (!prefix || !target || !kind || !date || !time || !shortId) return null;

  const createdAt = new Date(
    `${date}T${time.slice(0, 2)}:${time.slice(2, 4)}:${time.slice(4, 6)}Z`,
  );
  if (Number.isNaN(createdAt.getTime())) return null;

  return { prefix, target, kind, date, time, shortId, createdAt };
}

export function isValidArchiveName(archiveName: string, expectedPrefix: string = "guard"): boolean {
  const parsed = parseArchiveName(archiveName);
  return parsed !== null && parsed.prefix === expectedPrefix;
}
