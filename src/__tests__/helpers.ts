import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import type { Logger } from "../logging";

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export async function makeTempDir(prefix = "lazyserve-test-"): Promise<string> {
  // realpath so exact-match ignore paths line up on macOS's /var -> /private/var
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write a file and pin its mtime to `seconds` since the epoch. */
export async function writeFileAt(
  filePath: string,
  content: string,
  seconds: number,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  await fs.utimes(filePath, seconds, seconds);
}
