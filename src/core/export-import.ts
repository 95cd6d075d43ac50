import path from "node:path";
import { promises as fs } from "node:fs";
import AdmZip from "adm-zip";
import { ValidationError, errorMessage } from "../lib/errors";
import { ensureDir } from "../lib/fsx";
import { Logger } from "../lib/logger";
import { parseProviderExport } from "../providers";
import { ExportAdapter } from "../providers/export-source";
import { Catalog } from "./catalog";
import { DateRange } from "./import-run";
import { ImportJobs } from "./import-jobs";

export interface ExportImportRequest {
  providerId: string;
  packagePath: string;
  originalFileName?: string;
  range?: DateRange;
}

export interface ExportImportResult {
  jobId: string;
  conversationsFound: number;
  warnings: string[];
}

function sanitizeFileName(name?: string): string {
  if (!name) return "upload.zip";
  return name.replace(/[^a-zA-Z0-9_.-]/g, "_");
}

function stagingName(date: Date): string {
  const stamp = date.toISOString().replace(/[-:TZ.]/g, "").slice(0, 14);
  const random = Math.random().toString(36).slice(2, 8);
  return `pkg_${stamp}_${random}`;
}

/** Unpacks an uploaded export into a fresh directory under `stagingRoot` and returns it. */
export async function stagePackage(packagePath: string, originalFileName: string | undefined, stagingRoot: string): Promise<string> {
  const fileName = sanitizeFileName(originalFileName || path.basename(packagePath));
  const ext = path.extname(fileName).toLowerCase();
  const extractedRoot = path.join(stagingRoot, stagingName(new Date()));
  await ensureDir(extractedRoot);

  if (ext === ".zip") {
    const zip = new AdmZip(packagePath);
    zip.extractAllTo(extractedRoot, true);
  } else if (ext === ".json") {
    await fs.copyFile(packagePath, path.join(extractedRoot, fileName));
  } else {
    await fs.rm(extractedRoot, { recursive: true, force: true });
    throw new ValidationError("Unsupported package format. Please upload a .zip or .json export.");
  }

  return extractedRoot;
}

export class ExportImporter {
  constructor(
    private readonly catalog: Catalog,
    private readonly imports: ImportJobs,
    private readonly stagingRoot: string,
    private readonly logger: Logger
  ) {}

  async importPackage(request: ExportImportRequest): Promise<ExportImportResult> {
    const provider = this.catalog.requireProvider(request.providerId);
    const extractedRoot = await stagePackage(request.packagePath, request.originalFileName, this.stagingRoot);

    try {
      const parsed = await parseProviderExport(provider.name, extractedRoot);
      const adapter = new ExportAdapter(provider.name, parsed.conversations);
      const jobId = this.imports.createExportJob(provider.id, adapter, request.range);
      this.logger.info(
        { jobId, provider: provider.name, conversations: adapter.size, warnings: parsed.warnings.length },
        "export.package.queued"
      );
      return { jobId, conversationsFound: adapter.size, warnings: parsed.warnings };
    } finally {
      await fs.rm(extractedRoot, { recursive: true, force: true }).catch((error: unknown) => {
        this.logger.warn({ extractedRoot, err: errorMessage(error) }, "export.package.cleanup_failed");
      });
    }
  }
}
