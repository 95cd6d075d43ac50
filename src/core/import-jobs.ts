import { NotFoundError, ValidationError } from "../lib/errors";
import { ConversationProviderAdapter } from "../providers/adapter";
import { ImportJobRecord } from "../types/schema";
import { Catalog } from "./catalog";
import { DateRange, ImportController } from "./import-run";
import { JobStatusStore } from "./job-status";

export interface CreateImportJobInput {
  provider_id: string;
  api_key_id: string;
  from_date?: Date;
  to_date?: Date;
}

function checkRange(range: DateRange): void {
  if (range.fromDate && range.toDate && range.fromDate.getTime() > range.toDate.getTime()) {
    throw new ValidationError("from_date must not be after to_date");
  }
}

/** The trigger surface the HTTP layer calls: validate, start, and read back job runs. */
export class ImportJobs {
  constructor(
    private readonly catalog: Catalog,
    private readonly controller: ImportController,
    private readonly status: JobStatusStore
  ) {}

  createImportJob(input: CreateImportJobInput): string {
    const range: DateRange = { fromDate: input.from_date, toDate: input.to_date };
    checkRange(range);

    const apiKey = this.catalog.getApiKey(input.api_key_id);
    if (!apiKey) throw new NotFoundError("API key not found");
    if (!apiKey.is_active) throw new ValidationError("API key is not active");

    this.catalog.requireProvider(input.provider_id);
    if (apiKey.provider_id !== input.provider_id) {
      throw new ValidationError("API key does not belong to the requested provider");
    }

    return this.controller.start(input.provider_id, input.api_key_id, range);
  }

  createExportJob(providerId: string, adapter: ConversationProviderAdapter, range: DateRange = {}): string {
    checkRange(range);
    this.catalog.requireProvider(providerId);
    return this.controller.startExport(providerId, adapter, range);
  }

  getJobRun(id: string): ImportJobRecord {
    const job = this.status.get(id);
    if (!job) throw new NotFoundError("Import job not found");
    return job;
  }

  listJobRuns(providerId?: string): ImportJobRecord[] {
    return this.status.list(providerId);
  }
}
