import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import { promises as fs } from "node:fs";
import { z, ZodError } from "zod";
import { AppConfig, loadConfig } from "./config";
import { Catalog } from "./core/catalog";
import { BlobStore } from "./core/blobs";
import { ConversationStore } from "./core/conversations";
import { ExportImporter } from "./core/export-import";
import { ImportController } from "./core/import-run";
import { ImportJobs } from "./core/import-jobs";
import { JobStatusStore } from "./core/job-status";
import { ensureLayout, Layout, resolveLayout } from "./core/layout";
import { PersistenceWriter } from "./core/persist";
import { RunQueue } from "./core/run-queue";
import { Db, openDatabase } from "./db/database";
import { errorMessage, NotFoundError, ValidationError } from "./lib/errors";
import { createLogger, Logger } from "./lib/logger";
import { CredentialVault } from "./lib/vault";
import { createDefaultRegistry } from "./providers";
import { ProviderRegistry } from "./providers/registry";

export interface Services {
  layout: Layout;
  logger: Logger;
  catalog: Catalog;
  registry: ProviderRegistry;
  conversations: ConversationStore;
  imports: ImportJobs;
  exports: ExportImporter;
  queue: RunQueue;
}

export interface ServiceOptions {
  db: Db;
  layout: Layout;
  encryptionKey: string;
  maxConcurrentRuns: number;
  logger: Logger;
  registry?: ProviderRegistry;
}

export function buildServices(options: ServiceOptions): Services {
  const { db, layout, logger } = options;
  const vault = new CredentialVault(options.encryptionKey);
  const registry = options.registry ?? createDefaultRegistry();
  const catalog = new Catalog(db, vault);
  const writer = new PersistenceWriter(db, new BlobStore(layout));
  const queue = new RunQueue({ concurrency: options.maxConcurrentRuns, logger: logger.child({ component: "run-queue" }) });
  const controller = new ImportController({
    db,
    catalog,
    vault,
    registry,
    writer,
    queue,
    logger: logger.child({ component: "import" })
  });
  const imports = new ImportJobs(catalog, controller, new JobStatusStore(db));

  return {
    layout,
    logger,
    catalog,
    registry,
    conversations: new ConversationStore(db, catalog, writer),
    imports,
    exports: new ExportImporter(catalog, imports, layout.stagingRoot, logger.child({ component: "export" })),
    queue
  };
}

const ApiKeyCreate = z.object({
  provider_id: z.string().min(1),
  label: z.string().min(1),
  api_key_value: z.string().min(1)
});

const ApiKeyUpdate = z.object({
  label: z.string().min(1).optional(),
  is_active: z.boolean().optional()
});

const ImportJobCreate = z.object({
  provider_id: z.string().min(1),
  api_key_id: z.string().min(1),
  from_date: z.coerce.date().optional(),
  to_date: z.coerce.date().optional()
});

const ExportUpload = z.object({
  provider_id: z.string().min(1),
  from_date: z.coerce.date().optional(),
  to_date: z.coerce.date().optional()
});

const ManualConversation = z.object({
  provider_id: z.string().min(1),
  title: z.string().optional(),
  started_at: z.string().datetime({ offset: true }).optional(),
  notes: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  messages: z
    .array(
      z.object({
        role: z.string().min(1).default("user"),
        content: z.string(),
        created_at: z.string().datetime({ offset: true }).optional(),
        metadata: z.record(z.unknown()).optional()
      })
    )
    .min(1)
});

const ProjectCreate = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional()
});

const ProjectUpdate = z.object({
  name: z.string().min(1).optional(),
  description: z.string().nullable().optional()
});

const ProviderNotesUpdate = z.object({
  notes: z.string().nullable()
});

function optionalQuery(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

type Handler = (req: Request, res: Response) => unknown;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export function createApp(services: Services): express.Express {
  const { catalog, conversations, imports, registry, logger } = services;
  const app = express();
  const upload = multer({ dest: services.layout.uploadsRoot });

  app.use(express.json({ limit: "10mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, queue: { pending: services.queue.pending, active: services.queue.active } });
  });

  app.get(
    "/api/providers",
    route((_req, res) => {
      res.json(catalog.listProviders().map((provider) => ({ ...provider, has_adapter: registry.has(provider.name) })));
    })
  );

  app.patch(
    "/api/providers/:id",
    route((req, res) => {
      const body = ProviderNotesUpdate.parse(req.body);
      res.json(catalog.updateProviderNotes(req.params.id, body.notes));
    })
  );

  app.get(
    "/api/api-keys",
    route((req, res) => {
      res.json(catalog.listApiKeys(optionalQuery(req.query.provider_id)));
    })
  );

  app.post(
    "/api/api-keys",
    route((req, res) => {
      res.status(201).json(catalog.createApiKey(ApiKeyCreate.parse(req.body)));
    })
  );

  app.patch(
    "/api/api-keys/:id",
    route((req, res) => {
      res.json(catalog.updateApiKey(req.params.id, ApiKeyUpdate.parse(req.body)));
    })
  );

  app.delete(
    "/api/api-keys/:id",
    route((req, res) => {
      catalog.deleteApiKey(req.params.id);
      res.json({ message: "API key deleted successfully" });
    })
  );

  app.get(
    "/api/import-jobs",
    route((req, res) => {
      res.json(imports.listJobRuns(optionalQuery(req.query.provider_id)));
    })
  );

  app.get(
    "/api/import-jobs/:id",
    route((req, res) => {
      res.json(imports.getJobRun(req.params.id));
    })
  );

  app.post(
    "/api/import-jobs",
    route((req, res) => {
      const jobId = imports.createImportJob(ImportJobCreate.parse(req.body));
      res.status(202).json(imports.getJobRun(jobId));
    })
  );

  app.post(
    "/api/import-jobs/export",
    upload.single("package"),
    route(async (req, res) => {
      const file = req.file;
      if (!file) throw new ValidationError("Missing package upload field: package");

      try {
        const body = ExportUpload.parse(req.body);
        const result = await services.exports.importPackage({
          providerId: body.provider_id,
          packagePath: file.path,
          originalFileName: file.originalname,
          range: { fromDate: body.from_date, toDate: body.to_date }
        });
        res.status(202).json({ ...result, job: imports.getJobRun(result.jobId) });
      } finally {
        await fs.unlink(file.path).catch((error: unknown) => {
          logger.warn({ path: file.path, err: errorMessage(error) }, "upload.cleanup_failed");
        });
      }
    })
  );

  app.get(
    "/api/conversations",
    route((req, res) => {
      res.json(
        conversations.list({
          providerId: optionalQuery(req.query.provider_id),
          projectId: optionalQuery(req.query.project_id)
        })
      );
    })
  );

  app.post(
    "/api/conversations/manual",
    route(async (req, res) => {
      const { provider_id: providerId, ...input } = ManualConversation.parse(req.body);
      res.status(201).json(await conversations.createManual(providerId, input));
    })
  );

  app.get(
    "/api/conversations/:id",
    route((req, res) => {
      res.json(conversations.get(req.params.id));
    })
  );

  app.delete(
    "/api/conversations/:id",
    route((req, res) => {
      conversations.delete(req.params.id);
      res.json({ message: "Conversation deleted successfully" });
    })
  );

  app.post(
    "/api/conversations/:id/projects/:projectId",
    route((req, res) => {
      conversations.assignProject(req.params.id, req.params.projectId);
      res.json({ message: "Project assigned" });
    })
  );

  app.delete(
    "/api/conversations/:id/projects/:projectId",
    route((req, res) => {
      conversations.unassignProject(req.params.id, req.params.projectId);
      res.json({ message: "Project removed" });
    })
  );

  app.get(
    "/api/projects",
    route((_req, res) => {
      res.json(catalog.listProjects());
    })
  );

  app.post(
    "/api/projects",
    route((req, res) => {
      const body = ProjectCreate.parse(req.body);
      res.status(201).json(catalog.createProject(body.name, body.description));
    })
  );

  app.patch(
    "/api/projects/:id",
    route((req, res) => {
      res.json(catalog.updateProject(req.params.id, ProjectUpdate.parse(req.body)));
    })
  );

  app.delete(
    "/api/projects/:id",
    route((req, res) => {
      catalog.deleteProject(req.params.id);
      res.json({ message: "Project deleted successfully" });
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: "Invalid request", issues: error.issues });
      return;
    }
    if (error instanceof NotFoundError || error instanceof ValidationError) {
      res.status(error.status).json({ error: error.message });
      return;
    }
    logger.error({ err: errorMessage(error) }, "http.request_failed");
    res.status(500).json({ error: errorMessage(error) });
  });

  return app;
}

async function main(config: AppConfig = loadConfig()): Promise<void> {
  const logger = createLogger(config.logLevel);
  const layout = resolveLayout(config.dataRoot);
  await ensureLayout(layout);

  const services = buildServices({
    db: openDatabase(config.databasePath),
    layout,
    encryptionKey: config.encryptionKey,
    maxConcurrentRuns: config.maxConcurrentRuns,
    logger
  });

  createApp(services).listen(config.port, config.host, () => {
    logger.info({ host: config.host, port: config.port, dataRoot: layout.root }, "server.listening");
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(errorMessage(error));
    process.exit(1);
  });
}
