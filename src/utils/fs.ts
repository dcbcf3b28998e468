import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, resolve, relative, isAbsolute } from "node:path";

/**
 * Throws when `targetPath` resolves outside `baseDir`
 * (e.g. an output name of `../../etc/passwd`).
 */
export function validatePathWithinBase(targetPath: string, baseDir: string): void {
  const resolvedTarget = resolve(targetPath);
  const resolvedBase = resolve(baseDir);
  const relativePath = relative(resolvedBase, resolvedTarget);

  if (relativePath === "" || relativePath.startsWith("..") || isAbsolute(relativePath)) {
    throw new Error(`Path traversal detected: ${targetPath} is outside ${baseDir}`);
  }
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Writes the whole file in one call; parent directories are created first. */
export async function writeText(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, content, "utf8");
}

export async function writeJson(path: string, data: unknown): Promise<void> {
  await writeText(path, `${JSON.stringify(data, null, 2)}\n`);
}
