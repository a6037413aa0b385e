/**
 * Compressed dumps of the live shaping state.
 */

import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { gzip } from "node:zlib";

const gzipAsync = promisify(gzip);

export const BACKUP_PREFIX = "tierlink_";
export const BACKUP_SUFFIX = ".txt.gz";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `tierlink_YYYYMMDD_HHMMSS.txt.gz` in UTC; names sort chronologically */
export function backupFileName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${BACKUP_PREFIX}${date}_${time}${BACKUP_SUFFIX}`;
}

export interface BackupResult {
  readonly path: string;
  /** Older backups deleted to stay within the limit */
  readonly removed: readonly string[];
}

export async function writeBackup(directory: string, content: string, at: Date, keep: number): Promise<BackupResult> {
  await mkdir(directory, { recursive: true });
  const path = join(directory, backupFileName(at));
  await writeFile(path, await gzipAsync(Buffer.from(content, "utf-8")));

  const backups = (await readdir(directory))
    .filter((name) => name.startsWith(BACKUP_PREFIX) && name.endsWith(BACKUP_SUFFIX))
    .sort()
    .reverse();
  const removed = backups.slice(keep).map((name) => join(directory, name));
  for (const stale of removed) {
    await rm(stale, { force: true });
  }

  return { path, removed };
}
