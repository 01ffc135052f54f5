import * as fs from "node:fs/promises";
import { FileReadError } from "../errors";

/**
 * Check if a path exists and is a directory.
 * Uses fs.stat() to verify the path is a directory, not a file.
 */
export async function dirExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Result type for tryReadFile.
 * - status: "ok" with content for successful reads
 * - status: "not_found" when file doesn't exist (ENOENT)
 * - status: "error" with FileReadError for permission/I/O errors
 */
export type FileReadResult =
  | { status: "ok"; content: string }
  | { status: "not_found" }
  | { status: "error"; error: FileReadError };

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Attempt to read a file with proper error categorization.
 * Unlike fs.readFile, this distinguishes between "file not found" (expected)
 * and permission/I/O errors (unexpected, should be reported).
 */
export async function tryReadFile(filePath: string): Promise<FileReadResult> {
  try {
    const content = await fs.readFile(filePath, "utf-8");
    return { status: "ok", content };
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return { status: "not_found" };
    }
    return {
      status: "error",
      error: new FileReadError(
        filePath,
        err instanceof Error ? err : new Error(String(err)),
      ),
    };
  }
}
