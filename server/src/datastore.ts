import Database from "better-sqlite3";
import { StorageUnavailable, errorMessage } from "./errors";
import type { AnnotationRecord } from "./types";

export interface AnnotationStore {
  /** Inserts or replaces the record keyed by its image identifier. */
  upsert(record: AnnotationRecord): void;
  get(imageIdentifier: string): AnnotationRecord | undefined;
  listAll(): AnnotationRecord[];
  close(): void;
}

interface AnnotationRow {
  image_identifier: string;
  rating: number;
  marked: number;
  username: string;
  timestamp: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS annotation (
    image_identifier TEXT PRIMARY KEY,
    rating INTEGER NOT NULL DEFAULT 0,
    marked INTEGER NOT NULL DEFAULT 0,
    username TEXT NOT NULL,
    timestamp TEXT NOT NULL
  )
`;

const UPSERT = `
  INSERT INTO annotation (image_identifier, rating, marked, username, timestamp)
  VALUES (@image_identifier, @rating, @marked, @username, @timestamp)
  ON CONFLICT(image_identifier) DO UPDATE SET
    rating = excluded.rating,
    marked = excluded.marked,
    username = excluded.username,
    timestamp = excluded.timestamp
`;

function toRecord(row: AnnotationRow): AnnotationRecord {
  return {
    image_identifier: row.image_identifier,
    rating: row.rating,
    marked: row.marked !== 0,
    username: row.username,
    timestamp: row.timestamp,
  };
}

function toRow(record: AnnotationRecord): AnnotationRow {
  return { ...record, marked: record.marked ? 1 : 0 };
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new StorageUnavailable(`Failed to ${operation}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * SQLite-backed store. better-sqlite3 runs every statement synchronously in
 * autocommit mode, so a write is on disk before `upsert` returns.
 */
export class SqliteAnnotationStore implements AnnotationStore {
  private readonly db: Database.Database;
  private readonly upsertStmt: Database.Statement<[AnnotationRow]>;
  private readonly getStmt: Database.Statement<[string], AnnotationRow>;
  private readonly listStmt: Database.Statement<[], AnnotationRow>;

  constructor(filename: string) {
    this.db = guard(`open database ${filename}`, () => {
      const db = new Database(filename);
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = FULL");
      db.exec(SCHEMA);
      return db;
    });
    this.upsertStmt = this.db.prepare<[AnnotationRow]>(UPSERT);
    this.getStmt = this.db.prepare<[string], AnnotationRow>(
      "SELECT * FROM annotation WHERE image_identifier = ?",
    );
    this.listStmt = this.db.prepare<[], AnnotationRow>(
      "SELECT * FROM annotation ORDER BY image_identifier",
    );
  }

  upsert(record: AnnotationRecord): void {
    guard("save annotation", () => this.upsertStmt.run(toRow(record)));
  }

  get(imageIdentifier: string): AnnotationRecord | undefined {
    const row = guard("read annotation", () => this.getStmt.get(imageIdentifier));
    return row ? toRecord(row) : undefined;
  }

  listAll(): AnnotationRecord[] {
    return guard("list annotations", () => this.listStmt.all()).map(toRecord);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
