/**
 * Shared filesystem helpers used across CLI modules.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

export const DEFAULT_PORT = 3417;

function isMissingPath(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/** null when the file does not exist; other read errors propagate */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingPath(error)) return null;
    throw error;
  }
}

export async function mkdirp(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/** Write a file, creating parent directories first */
export async function writeFileEnsured(filePath: string, content: string, mode?: number): Promise<void> {
  await mkdirp(path.dirname(filePath));
  await fs.writeFile(filePath, content, mode === undefined ? "utf-8" : { encoding: "utf-8", mode });
}

/** Copy a directory tree, returning the copied file paths relative to `src` */
export async function copyDirRecursive(src: string, dest: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await fs.readdir(src, { withFileTypes: true });
  await mkdirp(dest);
  for (const entry of entries) {
    const srcPath = path.join(src, entry.name);
    const destPath = path.join(dest, entry.name);
    if (entry.isDirectory()) {
      const nested = await copyDirRecursive(srcPath, destPath);
      files.push(...nested.map(f => path.join(entry.name, f)));
    } else if (entry.isFile()) {
      await fs.copyFile(srcPath, destPath);
      files.push(entry.name);
    }
  }
  return files;
}
