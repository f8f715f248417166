import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS clinics (
    clinic_id TEXT PRIMARY KEY,
    clinic_json TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS actors (
    actor_id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    clinic_id TEXT,
    actor_json TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS pets (
    pet_id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    pet_json TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS actor_keys (
    owner_type TEXT NOT NULL,
    owner_id TEXT NOT NULL,
    algorithm TEXT NOT NULL,
    public_key_hex TEXT NOT NULL,
    sealed_private_key TEXT NOT NULL,
    PRIMARY KEY (owner_type, owner_id)
  );
  CREATE TABLE IF NOT EXISTS medical_records (
    record_id TEXT PRIMARY KEY,
    pet_id TEXT NOT NULL,
    type TEXT NOT NULL,
    is_rabies INTEGER NOT NULL,
    signed INTEGER NOT NULL,
    immutable INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    record_json TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_records_pet_type_created
  ON medical_records(pet_id, type, created_at DESC);
  CREATE TABLE IF NOT EXISTS certificates (
    certificate_id TEXT PRIMARY KEY,
    record_id TEXT NOT NULL UNIQUE,
    certificate_number TEXT NOT NULL UNIQUE,
    pet_id TEXT NOT NULL,
    created_at TEXT NOT NULL,
    certificate_json TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_certificates_pet_created
  ON certificates(pet_id, created_at DESC);
`;

export class SqliteDatabase {
  readonly db: Database.Database;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
  }

  /** Runs `work` in one SQLite transaction; a throw rolls every write back. */
  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  close(): void {
    this.db.close();
  }
}

export function isUniqueViolation(err: unknown, column: string): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === "SQLITE_CONSTRAINT_UNIQUE" &&
    err.message.includes(column)
  );
}
