import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { assertValid, validateAuditRecord } from "../schemas/validators";
import type { AuditQuery, AuditReceipt, AuditRecord, AuditRecorder } from "./types";

export type SqliteAuditRecorderConfig = {
  dbPath: string;
  // Daily JSONL mirror (<logDir>/audit-YYYY-MM-DD.jsonl); omitted means SQLite only.
  logDir?: string;
};

type AuditRow = { record_json: string };

function initDb(dbPath: string) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(`
    CREATE TABLE IF NOT EXISTS promotion_audit (
      id TEXT PRIMARY KEY,
      recorded_at TEXT NOT NULL,
      model_name TEXT NOT NULL,
      candidate_version INTEGER NOT NULL,
      champion_version INTEGER,
      decision TEXT NOT NULL,
      record_json TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_promotion_audit_model ON promotion_audit(model_name, decision);
    CREATE INDEX IF NOT EXISTS idx_promotion_audit_ts ON promotion_audit(recorded_at);
  `);
  return db;
}

export class SqliteAuditRecorder implements AuditRecorder {
  private db: Database.Database;
  private logDir: string | null;

  constructor(config: SqliteAuditRecorderConfig) {
    this.db = initDb(config.dbPath);
    this.logDir = config.logDir ?? null;
    if (this.logDir) fs.mkdirSync(this.logDir, { recursive: true });
  }

  async record(entry: AuditRecord): Promise<AuditReceipt> {
    assertValid(validateAuditRecord, entry, "AuditRecord");
    const json = JSON.stringify(entry);
    this.db
      .prepare(
        `INSERT INTO promotion_audit (id, recorded_at, model_name, candidate_version, champion_version, decision, record_json)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.id,
        entry.recorded_at,
        entry.model_name,
        entry.candidate_version,
        entry.champion_version,
        entry.decision,
        json
      );

    if (this.logDir) {
      const logPath = path.join(this.logDir, `audit-${entry.recorded_at.slice(0, 10)}.jsonl`);
      fs.appendFileSync(logPath, `${json}\n`);
    }
    return { record_id: entry.id, location: `sqlite:${this.db.name}#${entry.id}` };
  }

  query(filter: AuditQuery = {}): AuditRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.model_name) {
      clauses.push("model_name = ?");
      params.push(filter.model_name);
    }
    if (filter.decision) {
      clauses.push("decision = ?");
      params.push(filter.decision);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    params.push(filter.limit ?? 100);

    const rows = this.db
      .prepare<Array<string | number>, AuditRow>(
        `SELECT record_json FROM promotion_audit ${where} ORDER BY recorded_at DESC, rowid DESC LIMIT ?`
      )
      .all(...params);

    return rows.map((row) => {
      const parsed: unknown = JSON.parse(row.record_json);
      assertValid(validateAuditRecord, parsed, "AuditRecord");
      return parsed;
    });
  }

  close(): void {
    this.db.close();
  }
}
