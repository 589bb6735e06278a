/**
 * Database record type definitions
 */

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}

export interface RawFileRecordRow {
  id: number;
  location: string;
  location_key: string;
  algorithm: string;
  checksum: string;
  size: number | null;
  session_id: string | null;
  hostname: string | null;
  recorded_at: string;
}

export type AddResult = "inserted" | "updated" | "unchanged" | "skipped";
