import type Database from "better-sqlite3";
import { SIGNATURE_ALGORITHM, withOpenedKey } from "@vhc/shared";
import type { KeyRef, KeyStore } from "../ports.js";
import type { SqliteDatabase } from "./database.js";

interface KeyRow {
  algorithm: string;
  public_key_hex: string;
  sealed_private_key: string;
}

export class KeyNotFoundError extends Error {
  constructor(ref: KeyRef) {
    super(`no signing key registered for ${ref.ownerType} ${ref.ownerId}`);
    this.name = "KeyNotFoundError";
  }
}

export class SqliteKeyStore implements KeyStore {
  private readonly getStmt: Database.Statement<[string, string], KeyRow>;
  private readonly putStmt: Database.Statement<[string, string, string, string, string]>;

  constructor({ db }: SqliteDatabase) {
    this.getStmt = db.prepare<[string, string], KeyRow>(`
      SELECT algorithm, public_key_hex, sealed_private_key
      FROM actor_keys
      WHERE owner_type = ? AND owner_id = ?
      LIMIT 1
    `);
    this.putStmt = db.prepare<[string, string, string, string, string]>(`
      INSERT INTO actor_keys (owner_type, owner_id, algorithm, public_key_hex, sealed_private_key)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(owner_type, owner_id) DO UPDATE SET
        algorithm = excluded.algorithm,
        public_key_hex = excluded.public_key_hex,
        sealed_private_key = excluded.sealed_private_key
    `);
  }

  register(ref: KeyRef, publicKeyHex: string, sealedPrivateKey: string): void {
    this.putStmt.run(ref.ownerType, ref.ownerId, SIGNATURE_ALGORITHM, publicKeyHex, sealedPrivateKey);
  }

  async withPrivateKey<T>(
    ref: KeyRef,
    password: string,
    use: (privateKey: Uint8Array) => Promise<T>,
  ): Promise<T> {
    const row = this.getStmt.get(ref.ownerType, ref.ownerId);
    if (!row) {
      throw new KeyNotFoundError(ref);
    }
    if (row.algorithm !== SIGNATURE_ALGORITHM) {
      throw new Error(`unsupported key algorithm '${row.algorithm}'`);
    }
    return withOpenedKey(row.sealed_private_key, password, use);
  }

  findPublicKeyHex(ref: KeyRef): string | null {
    return this.getStmt.get(ref.ownerType, ref.ownerId)?.public_key_hex ?? null;
  }
}
