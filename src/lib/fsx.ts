import { promises as fs } from "node:fs";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeFileOnce(filePath: string, payload: Buffer): Promise<boolean> {
  if (await exists(filePath)) return false;
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, payload);
  return true;
}

export async function listFilesRecursive(root: string): Promise<string[]> {
  const out: string[] = [];

  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else {
        out.push(fullPath);
      }
    }
  }

  if (await exists(root)) {
    await walk(root);
  }
  return out;
}

export function toPosix(relPath: string): string {
  return relPath.replace(/\\/g, "/");
}
