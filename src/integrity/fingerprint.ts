import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../logging";
import { errnoCode } from "../fs/util";

/**
 * Latest file modification time (ms since epoch) seen across a tree.
 * Only equality against the previous value matters.
 */
export type Fingerprint = number;

/** Fingerprint of a tree with no readable files. */
export const EMPTY_FINGERPRINT: Fingerprint = 0;

export interface FingerprintOptions {
  logger?: Logger;
}

export interface ScanStats {
  fingerprint: Fingerprint;
  files: number;
  skipped: number;
  durationMs: number;
}

/**
 * Walk `root` top-down and return the newest file mtime.
 *
 * Paths in `ignored` are compared exactly against each entry's absolute path;
 * a matching directory is pruned without being read. Directory mtimes are not
 * counted. Entries that disappear or can't be read mid-scan are skipped.
 * Symlinked directories are not followed.
 */
export async function scanTree(
  root: string,
  ignored: ReadonlySet<string>,
  options: FingerprintOptions = {},
): Promise<ScanStats> {
  const log = options.logger;
  const startTime = Date.now();
  const stats = { newest: EMPTY_FINGERPRINT, files: 0, skipped: 0 };

  const visit = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      stats.skipped++;
      log?.debug(`Skipping unreadable directory ${dir} (${errnoCode(err) ?? String(err)})`);
      return;
    }

    const subdirs: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (ignored.has(fullPath)) {
        continue;
      }

      if (entry.isDirectory()) {
        subdirs.push(fullPath);
        continue;
      }

      try {
        const st = await fs.stat(fullPath);
        if (!st.isFile()) continue;
        stats.files++;
        if (st.mtimeMs > stats.newest) {
          stats.newest = st.mtimeMs;
        }
      } catch (err) {
        // deleted between readdir and stat, or a dangling link
        stats.skipped++;
        log?.debug(`Skipping ${fullPath} (${errnoCode(err) ?? String(err)})`);
      }
    }

    for (const sub of subdirs) {
      await visit(sub);
    }
  };

  const absRoot = path.resolve(root);
  if (!ignored.has(absRoot)) {
    await visit(absRoot);
  }

  const durationMs = Date.now() - startTime;
  log?.debug(
    `Scanned ${stats.files} files under ${absRoot} in ${durationMs}ms`,
  );

  return {
    fingerprint: stats.newest,
    files: stats.files,
    skipped: stats.skipped,
    durationMs,
  };
}

export async function computeFingerprint(
  root: string,
  ignored: ReadonlySet<string>,
  options: FingerprintOptions = {},
): Promise<Fingerprint> {
  const { fingerprint } = await scanTree(root, ignored, options);
  return fingerprint;
}
