import type Database from "better-sqlite3";
import type { Certificate } from "@vhc/shared";
import type { SqliteDatabase } from "./database.js";

export interface CertificateStore {
  insert(certificate: Certificate): void;
  get(certificateId: string): Certificate | null;
  getByNumber(certificateNumber: string): Certificate | null;
  existsForRecord(recordId: string): boolean;
  listByPet(petId: string): Certificate[];
}

interface Row {
  certificate_json: string;
}

function parse(row: Row): Certificate {
  return JSON.parse(row.certificate_json) as Certificate;
}

/**
 * Certificates are written once. There is no update statement: the
 * cryptographic fields are never recomputed.
 */
export class SqliteCertificateStore implements CertificateStore {
  private readonly insertStmt: Database.Statement<[string, string, string, string, string, string]>;
  private readonly getStmt: Database.Statement<[string], Row>;
  private readonly getByNumberStmt: Database.Statement<[string], Row>;
  private readonly existsForRecordStmt: Database.Statement<[string], { found: number }>;
  private readonly listByPetStmt: Database.Statement<[string], Row>;

  constructor({ db }: SqliteDatabase) {
    this.insertStmt = db.prepare<[string, string, string, string, string, string]>(`
      INSERT INTO certificates
        (certificate_id, record_id, certificate_number, pet_id, created_at, certificate_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.getStmt = db.prepare<[string], Row>(`
      SELECT certificate_json
      FROM certificates
      WHERE certificate_id = ?
      LIMIT 1
    `);

    this.getByNumberStmt = db.prepare<[string], Row>(`
      SELECT certificate_json
      FROM certificates
      WHERE certificate_number = ?
      LIMIT 1
    `);

    this.existsForRecordStmt = db.prepare<[string], { found: number }>(`
      SELECT 1 AS found
      FROM certificates
      WHERE record_id = ?
      LIMIT 1
    `);

    this.listByPetStmt = db.prepare<[string], Row>(`
      SELECT certificate_json
      FROM certificates
      WHERE pet_id = ?
      ORDER BY created_at DESC, certificate_id DESC
    `);
  }

  insert(certificate: Certificate): void {
    this.insertStmt.run(
      certificate.id,
      certificate.recordId,
      certificate.certificateNumber,
      certificate.petId,
      certificate.createdAt,
      JSON.stringify(certificate),
    );
  }

  get(certificateId: string): Certificate | null {
    const row = this.getStmt.get(certificateId);
    return row ? parse(row) : null;
  }

  getByNumber(certificateNumber: string): Certificate | null {
    const row = this.getByNumberStmt.get(certificateNumber);
    return row ? parse(row) : null;
  }

  existsForRecord(recordId: string): boolean {
    return this.existsForRecordStmt.get(recordId) !== undefined;
  }

  listByPet(petId: string): Certificate[] {
    return this.listByPetStmt.all(petId).map(parse);
  }
}
