import { randomUUID } from "node:crypto";
import { Db } from "../db/database";
import { NotFoundError, ValidationError } from "../lib/errors";
import { CredentialVault } from "../lib/vault";
import { nowIso } from "../lib/time";
import { ApiKeyRecord, ProjectRecord, ProviderRecord, StoredApiKey } from "../types/schema";

interface ApiKeyRow {
  id: string;
  provider_id: string;
  label: string;
  key_encrypted: string;
  is_active: number;
  created_at: string;
  last_used_at: string | null;
}

function toStoredApiKey(row: ApiKeyRow): StoredApiKey {
  return { ...row, is_active: row.is_active === 1 };
}

function toPublicApiKey(row: ApiKeyRow): ApiKeyRecord {
  return {
    id: row.id,
    provider_id: row.provider_id,
    label: row.label,
    is_active: row.is_active === 1,
    created_at: row.created_at,
    last_used_at: row.last_used_at
  };
}

export interface NewApiKey {
  provider_id: string;
  label: string;
  api_key_value: string;
}

export interface ApiKeyPatch {
  label?: string;
  is_active?: boolean;
}

export interface ProjectPatch {
  name?: string;
  description?: string | null;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/** Providers, credentials and projects: the records the import pipeline reads but never owns. */
export class Catalog {
  constructor(
    private readonly db: Db,
    private readonly vault: CredentialVault
  ) {}

  listProviders(): ProviderRecord[] {
    return this.db.prepare<[], ProviderRecord>("SELECT * FROM providers ORDER BY name").all();
  }

  getProvider(id: string): ProviderRecord | undefined {
    return this.db.prepare<[string], ProviderRecord>("SELECT * FROM providers WHERE id = ?").get(id);
  }

  getProviderByName(name: string): ProviderRecord | undefined {
    return this.db.prepare<[string], ProviderRecord>("SELECT * FROM providers WHERE name = ?").get(name);
  }

  requireProvider(id: string): ProviderRecord {
    const provider = this.getProvider(id);
    if (!provider) throw new NotFoundError("Provider not found");
    return provider;
  }

  updateProviderNotes(id: string, notes: string | null): ProviderRecord {
    this.requireProvider(id);
    this.db.prepare("UPDATE providers SET notes = ? WHERE id = ?").run(notes, id);
    return this.requireProvider(id);
  }

  listApiKeys(providerId?: string): ApiKeyRecord[] {
    const rows = providerId
      ? this.db
          .prepare<[string], ApiKeyRow>("SELECT * FROM api_keys WHERE provider_id = ? ORDER BY created_at DESC")
          .all(providerId)
      : this.db.prepare<[], ApiKeyRow>("SELECT * FROM api_keys ORDER BY created_at DESC").all();
    return rows.map(toPublicApiKey);
  }

  getApiKey(id: string): ApiKeyRecord | undefined {
    const row = this.findApiKeyRow(id);
    return row ? toPublicApiKey(row) : undefined;
  }

  /** Includes the ciphertext; for the import controller only. */
  getStoredApiKey(id: string): StoredApiKey | undefined {
    const row = this.findApiKeyRow(id);
    return row ? toStoredApiKey(row) : undefined;
  }

  createApiKey(input: NewApiKey): ApiKeyRecord {
    this.requireProvider(input.provider_id);
    const row: ApiKeyRow = {
      id: randomUUID(),
      provider_id: input.provider_id,
      label: input.label,
      key_encrypted: this.vault.encrypt(input.api_key_value),
      is_active: 1,
      created_at: nowIso(),
      last_used_at: null
    };
    this.db
      .prepare(
        `INSERT INTO api_keys (id, provider_id, label, key_encrypted, is_active, created_at, last_used_at)
         VALUES (@id, @provider_id, @label, @key_encrypted, @is_active, @created_at, @last_used_at)`
      )
      .run(row);
    return toPublicApiKey(row);
  }

  updateApiKey(id: string, patch: ApiKeyPatch): ApiKeyRecord {
    const current = this.findApiKeyRow(id);
    if (!current) throw new NotFoundError("API key not found");
    this.db
      .prepare("UPDATE api_keys SET label = ?, is_active = ? WHERE id = ?")
      .run(patch.label ?? current.label, patch.is_active === undefined ? current.is_active : Number(patch.is_active), id);
    const updated = this.findApiKeyRow(id);
    if (!updated) throw new NotFoundError("API key not found");
    return toPublicApiKey(updated);
  }

  deleteApiKey(id: string): void {
    const result = this.db.prepare("DELETE FROM api_keys WHERE id = ?").run(id);
    if (result.changes === 0) throw new NotFoundError("API key not found");
  }

  touchApiKey(id: string, at: string): void {
    this.db.prepare("UPDATE api_keys SET last_used_at = ? WHERE id = ?").run(at, id);
  }

  listProjects(): ProjectRecord[] {
    return this.db.prepare<[], ProjectRecord>("SELECT * FROM projects ORDER BY name").all();
  }

  getProject(id: string): ProjectRecord | undefined {
    return this.db.prepare<[string], ProjectRecord>("SELECT * FROM projects WHERE id = ?").get(id);
  }

  createProject(name: string, description?: string | null): ProjectRecord {
    const project: ProjectRecord = {
      id: randomUUID(),
      name,
      description: description ?? null,
      created_at: nowIso()
    };
    try {
      this.db
        .prepare("INSERT INTO projects (id, name, description, created_at) VALUES (@id, @name, @description, @created_at)")
        .run(project);
    } catch (error) {
      if (isUniqueViolation(error)) throw new ValidationError(`Project "${name}" already exists`);
      throw error;
    }
    return project;
  }

  updateProject(id: string, patch: ProjectPatch): ProjectRecord {
    const current = this.getProject(id);
    if (!current) throw new NotFoundError("Project not found");
    const next: ProjectRecord = {
      ...current,
      name: patch.name ?? current.name,
      description: patch.description === undefined ? current.description : patch.description
    };
    try {
      this.db.prepare("UPDATE projects SET name = @name, description = @description WHERE id = @id").run(next);
    } catch (error) {
      if (isUniqueViolation(error)) throw new ValidationError(`Project "${next.name}" already exists`);
      throw error;
    }
    return next;
  }

  deleteProject(id: string): void {
    const result = this.db.prepare("DELETE FROM projects WHERE id = ?").run(id);
    if (result.changes === 0) throw new NotFoundError("Project not found");
  }

  private findApiKeyRow(id: string): ApiKeyRow | undefined {
    return this.db.prepare<[string], ApiKeyRow>("SELECT * FROM api_keys WHERE id = ?").get(id);
  }
}
