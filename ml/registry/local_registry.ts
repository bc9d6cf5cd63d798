import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { PromotionRunError, RegistryRequestError, RegistryUnavailableError } from "../errors";
import type { Predictor } from "../evals/predictor";
import { loadLocalPredictor } from "./artifact_store";
import { isModelStage } from "./types";
import type { ModelVersion, RegistryClient } from "./types";

export type LocalRegistryConfig = {
  dbPath: string;
  alias: string;
};

type VersionRow = {
  name: string;
  version: number;
  stage: string;
  source: string;
};

type TagRow = { version: number; key: string; value: string };
type AliasRow = { alias: string; version: number };

function openDb(dbPath: string): Database.Database {
  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS model_versions (
        name TEXT NOT NULL,
        version INTEGER NOT NULL,
        stage TEXT NOT NULL DEFAULT 'None',
        source TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (name, version)
      );
      CREATE TABLE IF NOT EXISTS model_version_tags (
        name TEXT NOT NULL,
        version INTEGER NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (name, version, key)
      );
      CREATE TABLE IF NOT EXISTS model_aliases (
        name TEXT NOT NULL,
        alias TEXT NOT NULL,
        version INTEGER NOT NULL,
        PRIMARY KEY (name, alias)
      );
    `);
    return db;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryUnavailableError(`Cannot open local registry at ${dbPath}: ${reason}`, error);
  }
}

/**
 * Model registry kept in a SQLite file. The production pointer is an alias
 * row; `promote` moves it and rewrites stages inside one transaction, so a
 * reader never sees two Production versions.
 */
export class LocalRegistryClient implements RegistryClient {
  private readonly db: Database.Database;
  readonly alias: string;

  constructor(config: LocalRegistryConfig) {
    this.db = openDb(config.dbPath);
    this.alias = config.alias;
  }

  registerVersion(name: string, source: string, tags: Record<string, string> = {}): ModelVersion {
    return this.guard("registerVersion", () => this.insertVersion(name, source, tags));
  }

  async listVersions(name: string): Promise<ModelVersion[]> {
    return this.guard("listVersions", () => {
      const rows = this.db
        .prepare<[string], VersionRow>("SELECT name, version, stage, source FROM model_versions WHERE name = ?")
        .all(name);
      const tags = this.db
        .prepare<[string], TagRow>("SELECT version, key, value FROM model_version_tags WHERE name = ?")
        .all(name);
      const aliases = this.db
        .prepare<[string], AliasRow>("SELECT alias, version FROM model_aliases WHERE name = ?")
        .all(name);
      return rows.map((row) => this.toModelVersion(row, tags, aliases));
    });
  }

  async resolveChampion(name: string): Promise<ModelVersion | null> {
    return this.guard("resolveChampion", () => {
      const pointer = this.db
        .prepare<[string, string], { version: number }>("SELECT version FROM model_aliases WHERE name = ? AND alias = ?")
        .get(name, this.alias);
      return pointer ? this.getVersion(name, pointer.version) : null;
    });
  }

  async loadPredictor(version: ModelVersion): Promise<Predictor> {
    const source =
      version.source ?? this.guard("loadPredictor", () => this.getVersion(version.name, version.version).source);
    if (!source) {
      throw new RegistryRequestError(`No artifact source recorded for ${version.name} v${version.version}`, 404);
    }
    return loadLocalPredictor(source);
  }

  async promote(name: string, version: number): Promise<void> {
    this.guard("promote", () => this.swapPointer(name, version));
  }

  async tag(name: string, version: number, key: string, value: string): Promise<void> {
    this.guard("tag", () => {
      this.db
        .prepare(
          `INSERT INTO model_version_tags (name, version, key, value) VALUES (?, ?, ?, ?)
           ON CONFLICT(name, version, key) DO UPDATE SET value = excluded.value`
        )
        .run(name, version, key, value);
    });
  }

  close(): void {
    this.db.close();
  }

  /** Driver failures (busy, read-only, closed handle) surface as an unavailable registry. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof PromotionRunError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new RegistryUnavailableError(`Local registry ${operation} failed: ${reason}`, error);
    }
  }

  private insertVersion(name: string, source: string, tags: Record<string, string>): ModelVersion {
    const register = this.db.transaction(() => {
      const row = this.db
        .prepare<[string], { latest: number | null }>("SELECT MAX(version) AS latest FROM model_versions WHERE name = ?")
        .get(name);
      const version = (row?.latest ?? 0) + 1;
      this.db
        .prepare("INSERT INTO model_versions (name, version, stage, source, created_at) VALUES (?, ?, 'None', ?, ?)")
        .run(name, version, source, new Date().toISOString());
      const insertTag = this.db.prepare(
        "INSERT INTO model_version_tags (name, version, key, value) VALUES (?, ?, ?, ?)"
      );
      for (const [key, value] of Object.entries(tags)) {
        insertTag.run(name, version, key, value);
      }
      return version;
    });
    const version = register();
    return this.getVersion(name, version);
  }

  private swapPointer(name: string, version: number): void {
    const swap = this.db.transaction(() => {
      const exists = this.db
        .prepare<[string, number], { version: number }>("SELECT version FROM model_versions WHERE name = ? AND version = ?")
        .get(name, version);
      if (!exists) {
        throw new RegistryRequestError(`Unknown model version ${name} v${version}`, 404);
      }
      this.db
        .prepare(
          `INSERT INTO model_aliases (name, alias, version) VALUES (?, ?, ?)
           ON CONFLICT(name, alias) DO UPDATE SET version = excluded.version`
        )
        .run(name, this.alias, version);
      this.db
        .prepare("UPDATE model_versions SET stage = 'Archived' WHERE name = ? AND stage = 'Production' AND version != ?")
        .run(name, version);
      this.db.prepare("UPDATE model_versions SET stage = 'Production' WHERE name = ? AND version = ?").run(name, version);
    });
    swap.immediate();
  }

  private getVersion(name: string, version: number): ModelVersion {
    const row = this.db
      .prepare<[string, number], VersionRow>(
        "SELECT name, version, stage, source FROM model_versions WHERE name = ? AND version = ?"
      )
      .get(name, version);
    if (!row) {
      throw new RegistryRequestError(`Unknown model version ${name} v${version}`, 404);
    }
    const tags = this.db
      .prepare<[string, number], TagRow>("SELECT version, key, value FROM model_version_tags WHERE name = ? AND version = ?")
      .all(name, version);
    const aliases = this.db
      .prepare<[string, number], AliasRow>("SELECT alias, version FROM model_aliases WHERE name = ? AND version = ?")
      .all(name, version);
    return this.toModelVersion(row, tags, aliases);
  }

  private toModelVersion(row: VersionRow, tags: TagRow[], aliases: AliasRow[]): ModelVersion {
    return {
      name: row.name,
      version: row.version,
      stage: isModelStage(row.stage) ? row.stage : "None",
      aliases: aliases.filter((a) => a.version === row.version).map((a) => a.alias),
      tags: Object.fromEntries(tags.filter((t) => t.version === row.version).map((t) => [t.key, t.value])),
      source: row.source,
    };
  }
}
