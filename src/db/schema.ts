export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS providers (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  display_name TEXT NOT NULL,
  base_api_url TEXT,
  schema_version TEXT,
  notes TEXT
);

CREATE TABLE IF NOT EXISTS api_keys (
  id TEXT PRIMARY KEY,
  provider_id TEXT NOT NULL REFERENCES providers(id),
  label TEXT NOT NULL,
  key_encrypted TEXT NOT NULL,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  last_used_at TEXT
);

CREATE TABLE IF NOT EXISTS projects (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  description TEXT,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS import_jobs (
  id TEXT PRIMARY KEY,
  provider_id TEXT NOT NULL REFERENCES providers(id),
  api_key_id TEXT REFERENCES api_keys(id) ON DELETE SET NULL,
  origin TEXT NOT NULL DEFAULT 'api' CHECK (origin IN ('api', 'export')),
  started_at TEXT NOT NULL,
  finished_at TEXT,
  status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'success', 'partial', 'failed')),
  requested_range TEXT,
  summary TEXT,
  error_details TEXT,
  error_count INTEGER NOT NULL DEFAULT 0,
  conversations_imported INTEGER NOT NULL DEFAULT 0,
  conversations_skipped INTEGER NOT NULL DEFAULT 0,
  messages_imported INTEGER NOT NULL DEFAULT 0,
  artifacts_imported INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_import_job_status ON import_jobs(status);
CREATE INDEX IF NOT EXISTS idx_import_job_provider ON import_jobs(provider_id, started_at);

CREATE TABLE IF NOT EXISTS conversations (
  id TEXT PRIMARY KEY,
  provider_id TEXT NOT NULL REFERENCES providers(id),
  provider_conversation_id TEXT,
  title TEXT,
  started_at TEXT,
  ended_at TEXT,
  origin TEXT NOT NULL DEFAULT 'api' CHECK (origin IN ('api', 'export', 'manual')),
  import_job_id TEXT REFERENCES import_jobs(id) ON DELETE SET NULL,
  import_notes TEXT,
  archived INTEGER NOT NULL DEFAULT 0,
  raw_metadata TEXT,
  CONSTRAINT uq_provider_conversation UNIQUE (provider_id, provider_conversation_id)
);
CREATE INDEX IF NOT EXISTS idx_conversation_started_at ON conversations(started_at);
CREATE INDEX IF NOT EXISTS idx_conversation_provider ON conversations(provider_id);

CREATE TABLE IF NOT EXISTS conversation_projects (
  conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
  project_id TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  PRIMARY KEY (conversation_id, project_id)
);

CREATE TABLE IF NOT EXISTS messages (
  id TEXT PRIMARY KEY,
  conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
  provider_message_id TEXT,
  role TEXT NOT NULL,
  created_at TEXT,
  sequence_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  raw_metadata TEXT,
  CONSTRAINT uq_message_sequence UNIQUE (conversation_id, sequence_index)
);

CREATE TABLE IF NOT EXISTS artifacts (
  id TEXT PRIMARY KEY,
  conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
  message_id TEXT REFERENCES messages(id) ON DELETE SET NULL,
  artifact_type TEXT NOT NULL,
  provider_artifact_id TEXT,
  filename TEXT,
  mime_type TEXT,
  storage_path TEXT,
  download_status TEXT NOT NULL DEFAULT 'pending'
    CHECK (download_status IN ('pending', 'success', 'not_supported', 'error')),
  download_error TEXT,
  notes TEXT,
  raw_metadata TEXT
);
CREATE INDEX IF NOT EXISTS idx_artifact_conversation ON artifacts(conversation_id);

CREATE TABLE IF NOT EXISTS conversation_edits (
  id TEXT PRIMARY KEY,
  conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
  label TEXT NOT NULL,
  edited_markdown TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL,
  notes TEXT,
  base_conversation_hash TEXT
);
`;

export const DEFAULT_PROVIDERS = [
  {
    name: "openai",
    display_name: "OpenAI / ChatGPT",
    base_api_url: "https://api.openai.com/v1",
    notes: "OpenAI ChatGPT provider"
  },
  {
    name: "anthropic",
    display_name: "Anthropic / Claude",
    base_api_url: "https://api.anthropic.com/v1",
    notes: "Anthropic Claude provider"
  }
];
