import path from "node:path";
import { ensureDir } from "../lib/fsx";

export interface Layout {
  root: string;
  blobsRoot: string;
  uploadsRoot: string;
  stagingRoot: string;
}

export function resolveLayout(dataRoot: string): Layout {
  return {
    root: dataRoot,
    blobsRoot: path.join(dataRoot, "blobs"),
    uploadsRoot: path.join(dataRoot, ".uploads"),
    stagingRoot: path.join(dataRoot, "staging")
  };
}

export async function ensureLayout(layout: Layout): Promise<void> {
  await Promise.all([
    ensureDir(layout.root),
    ensureDir(layout.blobsRoot),
    ensureDir(layout.uploadsRoot),
    ensureDir(layout.stagingRoot)
  ]);
}
