/**
 * Database schema for HISTORY_BACKEND=postgres
 * Embedded rather than read from disk so serverless bundles carry it
 */
export const HISTORY_SCHEMA_SQL = `
-- Job History Table
-- One row per store id holding the serialized set of seen dedupe keys
CREATE TABLE IF NOT EXISTS job_history (
  store_id VARCHAR(100) PRIMARY KEY,
  keys TEXT NOT NULL,
  created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
  updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);
`;
