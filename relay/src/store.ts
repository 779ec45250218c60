import Database from "better-sqlite3";
import { z } from "zod";
import type { RelayJob, RelayJobStatus } from "./types.js";

export interface Store {
  createJob(job: RelayJob): void;
  getJob(requestId: string): RelayJob | undefined;
  updateJob(requestId: string, updates: Partial<RelayJob>): void;
  getJobsByStatus(statuses: RelayJobStatus[], limit: number): RelayJob[];
  countByStatus(): Record<string, number>;
  close(): void;
}

const CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS relay_jobs (
  request_id          TEXT PRIMARY KEY,
  account             TEXT NOT NULL,
  storage_key         TEXT NOT NULL,
  block_id            TEXT NOT NULL,

  status              TEXT NOT NULL DEFAULT 'processing',
  reply               TEXT,
  verify_tx_hash      TEXT,
  error               TEXT,
  attempts            INTEGER NOT NULL DEFAULT 0,

  created_at          TEXT NOT NULL,
  served_at           TEXT,
  updated_at          TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_status ON relay_jobs(status);
CREATE INDEX IF NOT EXISTS idx_created_at ON relay_jobs(created_at);
`;

const rowSchema = z.object({
  request_id: z.string(),
  account: z.string(),
  storage_key: z.string(),
  block_id: z.string(),
  status: z.enum(["processing", "served", "failed"]),
  reply: z.string().nullable(),
  verify_tx_hash: z.string().nullable(),
  error: z.string().nullable(),
  attempts: z.number().int(),
  created_at: z.string(),
  served_at: z.string().nullable(),
  updated_at: z.string(),
});

const countRowSchema = z.object({ status: z.string(), cnt: z.number() });

function rowToJob(row: unknown): RelayJob {
  const r = rowSchema.parse(row);
  return {
    requestId: r.request_id,
    account: r.account,
    key: r.storage_key,
    blockId: r.block_id,
    status: r.status,
    reply: r.reply,
    verifyTxHash: r.verify_tx_hash,
    error: r.error,
    attempts: r.attempts,
    createdAt: r.created_at,
    servedAt: r.served_at,
    updatedAt: r.updated_at,
  };
}

// Columns updateJob may touch, keyed by RelayJob field
const COLUMN_MAP: Partial<Record<keyof RelayJob, string>> = {
  account: "account",
  key: "storage_key",
  blockId: "block_id",
  status: "status",
  reply: "reply",
  verifyTxHash: "verify_tx_hash",
  error: "error",
  attempts: "attempts",
  servedAt: "served_at",
};

/** Relay journal. Pass ":memory:" for a throwaway database. */
export function createStore(dbPath: string): Store {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(CREATE_TABLE);

  const insertStmt = db.prepare(`
    INSERT INTO relay_jobs (
      request_id, account, storage_key, block_id,
      status, reply, verify_tx_hash, error, attempts,
      created_at, served_at, updated_at
    ) VALUES (
      @requestId, @account, @key, @blockId,
      @status, @reply, @verifyTxHash, @error, @attempts,
      @createdAt, @servedAt, @updatedAt
    )
  `);

  const getStmt = db.prepare("SELECT * FROM relay_jobs WHERE request_id = ?");

  const countStmt = db.prepare(
    "SELECT status, COUNT(*) as cnt FROM relay_jobs GROUP BY status",
  );

  return {
    createJob(job: RelayJob): void {
      insertStmt.run({ ...job });
    },

    getJob(requestId: string): RelayJob | undefined {
      const row: unknown = getStmt.get(requestId);
      return row ? rowToJob(row) : undefined;
    },

    updateJob(requestId: string, updates: Partial<RelayJob>): void {
      const sets: string[] = ["updated_at = @updated_at"];
      const params: Record<string, unknown> = {
        updated_at: new Date().toISOString(),
        request_id: requestId,
      };

      // Build SET clause dynamically from provided fields
      const values: Record<string, unknown> = { ...updates };
      for (const [field, col] of Object.entries(COLUMN_MAP)) {
        if (col && field in values) {
          sets.push(`${col} = @${field}`);
          params[field] = values[field];
        }
      }

      const sql = `UPDATE relay_jobs SET ${sets.join(", ")} WHERE request_id = @request_id`;
      db.prepare(sql).run(params);
    },

    getJobsByStatus(statuses: RelayJobStatus[], limit: number): RelayJob[] {
      if (statuses.length === 0) return [];
      const placeholders = statuses.map(() => "?").join(", ");
      const sql = `SELECT * FROM relay_jobs WHERE status IN (${placeholders}) ORDER BY created_at ASC LIMIT ?`;
      const rows: unknown[] = db.prepare(sql).all(...statuses, limit);
      return rows.map(rowToJob);
    },

    countByStatus(): Record<string, number> {
      const result: Record<string, number> = {};
      for (const row of countStmt.all()) {
        const { status, cnt } = countRowSchema.parse(row);
        result[status] = cnt;
      }
      return result;
    },

    close(): void {
      db.close();
    },
  };
}
