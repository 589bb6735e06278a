import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "File records keyed by location and checksum algorithm",
  up: `
CREATE TABLE file_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    location TEXT NOT NULL,
    location_key TEXT NOT NULL,
    algorithm TEXT NOT NULL,
    checksum TEXT NOT NULL,
    size INTEGER,
    session_id TEXT,
    hostname TEXT,
    recorded_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE (location_key, algorithm)
);

CREATE INDEX idx_file_records_session ON file_records(session_id) WHERE session_id IS NOT NULL;
CREATE INDEX idx_file_records_checksum ON file_records(checksum);
CREATE INDEX idx_file_records_size ON file_records(size);
`,
};
