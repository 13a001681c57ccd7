export const RECORDS_DDL = `
  CREATE TABLE IF NOT EXISTS records (
    id TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    title TEXT NOT NULL DEFAULT '',
    channel_id TEXT,
    channel_name TEXT NOT NULL DEFAULT '',
    channel_url TEXT NOT NULL DEFAULT '',
    watched_at TEXT,
    metadata_seen_at TEXT,
    transcript_text TEXT,
    transcript_status TEXT NOT NULL DEFAULT 'MISSING',
    status TEXT NOT NULL,
    skip_reason TEXT,
    error_kind TEXT,
    error_detail TEXT,
    claimed_at TEXT,
    claim_token TEXT,
    attempts INTEGER NOT NULL DEFAULT 0,
    model_used TEXT,
    schema_version TEXT,
    prompt_version TEXT,
    input_tokens INTEGER,
    output_tokens INTEGER,
    estimated_cost REAL,
    safety_score INTEGER,
    primary_genre TEXT,
    is_slop INTEGER,
    is_brainrot INTEGER,
    is_short INTEGER,
    analysis_payload TEXT,
    analyzed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (status IN ('PENDING', 'IN_PROGRESS', 'ANALYZED', 'ERROR', 'SKIPPED')),
    CHECK (transcript_status IN ('MISSING', 'FETCHED', 'UNAVAILABLE')),
    CHECK ((status = 'ANALYZED') = (analysis_payload IS NOT NULL)),
    CHECK ((status = 'ERROR') = (error_detail IS NOT NULL)),
    CHECK ((status = 'IN_PROGRESS') = (claimed_at IS NOT NULL))
  );

  CREATE INDEX IF NOT EXISTS idx_records_status_watched ON records(status, watched_at);
  CREATE INDEX IF NOT EXISTS idx_records_channel ON records(channel_name);
`;

export type RecordRow = {
  id: string;
  url: string;
  title: string;
  channel_id: string | null;
  channel_name: string;
  channel_url: string;
  watched_at: string | null;
  metadata_seen_at: string | null;
  transcript_text: string | null;
  transcript_status: string;
  status: string;
  skip_reason: string | null;
  error_kind: string | null;
  error_detail: string | null;
  claimed_at: string | null;
  claim_token: string | null;
  attempts: number;
  model_used: string | null;
  schema_version: string | null;
  prompt_version: string | null;
  input_tokens: number | null;
  output_tokens: number | null;
  estimated_cost: number | null;
  safety_score: number | null;
  primary_genre: string | null;
  is_slop: number | null;
  is_brainrot: number | null;
  is_short: number | null;
  analysis_payload: string | null;
  analyzed_at: string | null;
  created_at: string;
  updated_at: string;
};
