import * as path from "node:path";

export const CONFIG_FILENAME = "lazyserve.json";

export function resolveCwd(cwdOption?: string): string {
  if (cwdOption) {
    return path.resolve(cwdOption);
  }
  return process.cwd();
}

export function getConfigPath(cwd: string, override?: string): string {
  return override ? path.resolve(cwd, override) : path.join(cwd, CONFIG_FILENAME);
}

/**
 * Canonical absolute form used for ignore matching. Trailing separators are
 * dropped so `dist/` and `dist` name the same directory.
 */
export function canonicalPath(p: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, p);
}

export function canonicalIgnoreSet(
  paths: readonly string[],
  cwd: string = process.cwd(),
): Set<string> {
  return new Set(paths.map((p) => canonicalPath(p, cwd)));
}
