import path from "node:path";
import { promises as fs } from "node:fs";
import { listFilesRecursive, toPosix } from "../lib/fsx";
import { ProviderArtifact, ProviderConversationDetail, ProviderMessage } from "./adapter";

export interface JsonDoc {
  absPath: string;
  relPath: string;
  value: unknown;
}

export interface ExportParseResult {
  provider: string;
  conversations: ProviderConversationDetail[];
  warnings: string[];
}

export async function loadJsonDocuments(extractedRoot: string, files?: string[]): Promise<JsonDoc[]> {
  const all = files ?? (await listFilesRecursive(extractedRoot));
  const jsonFiles = all.filter((filePath) => filePath.toLowerCase().endsWith(".json"));
  const docs: JsonDoc[] = [];

  for (const filePath of jsonFiles) {
    let value: unknown;
    try {
      value = JSON.parse(await fs.readFile(filePath, "utf-8"));
    } catch {
      // Malformed files are skipped; parsers warn when nothing usable is left.
      continue;
    }
    docs.push({
      absPath: filePath,
      relPath: toPosix(path.relative(extractedRoot, filePath)),
      value
    });
  }

  return docs;
}

export function textFromUnknown(input: unknown): string {
  if (typeof input === "string") return input;
  if (typeof input === "number" || typeof input === "boolean") return String(input);
  if (Array.isArray(input)) {
    return input.map((item) => textFromUnknown(item)).filter(Boolean).join("\n");
  }
  const candidate = getObject(input);
  if (candidate) {
    if (typeof candidate.text === "string") return candidate.text;
    if (typeof candidate.value === "string") return candidate.value;
    if (typeof candidate.content === "string") return candidate.content;
    if (Array.isArray(candidate.parts)) return textFromUnknown(candidate.parts);
  }
  return "";
}

export function toIsoOrUndefined(value: unknown): string | undefined {
  if (typeof value === "number") {
    const millis = value > 1e12 ? value : value * 1000;
    return new Date(millis).toISOString();
  }
  if (typeof value === "string" && value.trim()) {
    if (/^\d+(\.\d+)?$/.test(value.trim())) {
      const asNum = Number(value);
      const millis = asNum > 1e12 ? asNum : asNum * 1000;
      return new Date(millis).toISOString();
    }
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }
  return undefined;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getObject(value: unknown): Record<string, unknown> | undefined {
  return isObject(value) ? value : undefined;
}

export function getArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function getString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function isRecord(value: Record<string, unknown> | undefined): value is Record<string, unknown> {
  return value !== undefined;
}

export function artifactTypeFor(mimeType?: string, declared?: string): string {
  const kind = declared?.toLowerCase();
  if (kind && ["file", "image", "canvas", "code"].includes(kind)) return kind;
  if (mimeType?.startsWith("image/")) return "image";
  return "file";
}

export interface MessageDraft {
  key: string;
  message: Omit<ProviderMessage, "sequence_index">;
  artifacts: Omit<ProviderArtifact, "message_sequence_index">[];
}

/**
 * Orders drafts chronologically (undated and tied drafts keep their source order) and assigns
 * contiguous sequence indices, linking each draft's artifacts to its message.
 */
export function sequenceDrafts(drafts: MessageDraft[]): { messages: ProviderMessage[]; artifacts: ProviderArtifact[] } {
  const ordered = drafts
    .map((draft, position) => ({ draft, position }))
    .sort((a, b) => {
      const at = a.draft.message.created_at ? new Date(a.draft.message.created_at).getTime() : Number.NaN;
      const bt = b.draft.message.created_at ? new Date(b.draft.message.created_at).getTime() : Number.NaN;
      if (!Number.isNaN(at) && !Number.isNaN(bt) && at !== bt) return at - bt;
      return a.position - b.position;
    });

  const messages: ProviderMessage[] = [];
  const artifacts: ProviderArtifact[] = [];
  ordered.forEach(({ draft }, index) => {
    messages.push({ ...draft.message, sequence_index: index });
    for (const artifact of draft.artifacts) {
      artifacts.push({ ...artifact, message_sequence_index: index });
    }
  });
  return { messages, artifacts };
}

/** Finds a file shipped inside the export, by relative path or by a basename prefix. */
export class ExportFiles {
  private constructor(
    private readonly root: string,
    private readonly files: string[]
  ) {}

  static async scan(root: string): Promise<ExportFiles> {
    return new ExportFiles(root, await listFilesRecursive(root));
  }

  get all(): string[] {
    return this.files;
  }

  find(relPath?: string, basenamePrefix?: string): string | undefined {
    if (relPath) {
      const wanted = toPosix(path.normalize(relPath)).replace(/^\/+/, "");
      const hit = this.files.find((file) => toPosix(path.relative(this.root, file)) === wanted);
      if (hit) return hit;
    }
    if (basenamePrefix) {
      return this.files.find((file) => path.basename(file).startsWith(basenamePrefix));
    }
    return undefined;
  }

  async read(absPath: string): Promise<Buffer> {
    return fs.readFile(absPath);
  }
}
