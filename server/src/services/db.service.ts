import sqlite3 from "sqlite3";
import logger from "../utils/logger";
import { RUN_STATUSES, RunRecord, RunStatus } from "../models/run.model";

interface RunRow {
  run_key: string;
  file_id: string;
  manifest_key: string;
  status: string;
  tags: string;
  published_keys: string;
  error: string | null;
  created_at: string;
  updated_at: string;
}

export interface NewRun {
  runKey: string;
  fileId: string;
  manifestKey: string;
  tags: Record<string, string>;
}

export interface RunClaims {
  /** Records the run unless the key is already known. True when newly claimed. */
  claimRun(run: NewRun): Promise<boolean>;
  releaseRun(runKey: string): Promise<void>;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    logger.warn("Unreadable JSON column in runs table", { raw, error: String(error) });
    return null;
  }
}

function toStringList(raw: string): string[] {
  const value = parseJson(raw);
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

function toTags(raw: string): Record<string, string> {
  const value = parseJson(raw);
  const tags: Record<string, string> = {};
  if (typeof value === "object" && value !== null) {
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === "string") tags[key] = item;
    }
  }
  return tags;
}

function toStatus(raw: string): RunStatus {
  const status = RUN_STATUSES.find((candidate) => candidate === raw);
  if (status === undefined) {
    throw new Error(`Unknown run status in runs table: ${raw}`);
  }
  return status;
}

function toRecord(row: RunRow): RunRecord {
  return {
    runKey: row.run_key,
    fileId: row.file_id,
    manifestKey: row.manifest_key,
    status: toStatus(row.status),
    tags: toTags(row.tags),
    publishedKeys: toStringList(row.published_keys),
    error: row.error ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Run history in sqlite. The run key is the primary key, so a manifest row
 * seen on every sensor tick is only ever queued once.
 */
export class RunStore implements RunClaims {
  private db: sqlite3.Database;

  constructor(private readonly dbPath: string) {
    this.db = new (sqlite3.verbose().Database)(dbPath, (err) => {
      if (err) {
        logger.error("Could not connect to database", err);
      } else {
        logger.info(`Connected to database at ${dbPath}`);
      }
    });
  }

  private exec(sql: string, params: unknown[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve(this.changes);
      });
    });
  }

  async init(): Promise<void> {
    await this.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_key TEXT PRIMARY KEY,
        file_id TEXT NOT NULL,
        manifest_key TEXT NOT NULL,
        status TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '{}',
        published_keys TEXT NOT NULL DEFAULT '[]',
        error TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    await this.exec("CREATE INDEX IF NOT EXISTS idx_runs_file ON runs(file_id)");
    await this.exec("CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status)");
  }

  async claimRun(run: NewRun): Promise<boolean> {
    const now = new Date().toISOString();
    const changes = await this.exec(
      `
        INSERT OR IGNORE INTO runs (
          run_key, file_id, manifest_key, status, tags, created_at, updated_at
        ) VALUES (?, ?, ?, 'queued', ?, ?, ?)
      `,
      [run.runKey, run.fileId, run.manifestKey, JSON.stringify(run.tags), now, now],
    );
    return changes > 0;
  }

  /** Forget a claim whose run request never reached the queue. */
  async releaseRun(runKey: string): Promise<void> {
    await this.exec("DELETE FROM runs WHERE run_key = ? AND status = 'queued'", [runKey]);
  }

  /** @returns false when no run has this key */
  async updateRunStatus(
    runKey: string,
    status: RunStatus,
    meta?: { publishedKeys?: string[]; error?: string },
  ): Promise<boolean> {
    let sql = "UPDATE runs SET status = ?, updated_at = ?";
    const params: unknown[] = [status, new Date().toISOString()];

    if (meta?.publishedKeys !== undefined) {
      sql += ", published_keys = ?";
      params.push(JSON.stringify(meta.publishedKeys));
    }
    if (meta?.error !== undefined) {
      sql += ", error = ?";
      params.push(meta.error);
    }

    sql += " WHERE run_key = ?";
    params.push(runKey);

    return (await this.exec(sql, params)) > 0;
  }

  getRunByFileId(fileId: string): Promise<RunRecord | null> {
    return new Promise((resolve, reject) => {
      this.db.get(
        "SELECT * FROM runs WHERE file_id = ? ORDER BY created_at DESC LIMIT 1",
        [fileId],
        (err: Error | null, row: RunRow | undefined) => {
          if (err) {
            reject(err);
            return;
          }
          try {
            resolve(row ? toRecord(row) : null);
          } catch (error) {
            reject(error);
          }
        },
      );
    });
  }

  listRuns(status?: RunStatus): Promise<RunRecord[]> {
    const where = status ? "WHERE status = ?" : "";
    const params = status ? [status] : [];

    return new Promise((resolve, reject) => {
      this.db.all(
        `SELECT * FROM runs ${where} ORDER BY created_at DESC, run_key ASC`,
        params,
        (err: Error | null, rows: RunRow[]) => {
          if (err) {
            reject(err);
            return;
          }
          try {
            resolve(rows.map(toRecord));
          } catch (error) {
            reject(error);
          }
        },
      );
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) reject(err);
        else {
          logger.info(`Closed database at ${this.dbPath}`);
          resolve();
        }
      });
    });
  }
}
