import path from "node:path";
import { sha256 } from "../lib/hash";
import { toPosix, writeFileOnce } from "../lib/fsx";
import { Layout } from "./layout";

function extFromMime(mimeType?: string): string {
  if (!mimeType) return "";
  if (mimeType.includes("png")) return ".png";
  if (mimeType.includes("jpeg") || mimeType.includes("jpg")) return ".jpg";
  if (mimeType.includes("webp")) return ".webp";
  if (mimeType.includes("gif")) return ".gif";
  if (mimeType.includes("pdf")) return ".pdf";
  if (mimeType.includes("json")) return ".json";
  if (mimeType.includes("text")) return ".txt";
  return "";
}

export interface BlobInput {
  content: Buffer;
  filename?: string;
  mime_type?: string;
}

/** Content-addressed storage for artifact bytes; identical content lands on the same path. */
export class BlobStore {
  constructor(private readonly layout: Layout) {}

  async put(input: BlobInput): Promise<string> {
    const hash = sha256(input.content);
    const ext = (input.filename ? path.extname(input.filename) : "") || extFromMime(input.mime_type);
    const absPath = path.join(this.layout.blobsRoot, "sha256", hash.slice(0, 2), hash.slice(2, 4), `${hash}${ext}`);
    await writeFileOnce(absPath, input.content);
    return toPosix(path.relative(this.layout.root, absPath));
  }
}
