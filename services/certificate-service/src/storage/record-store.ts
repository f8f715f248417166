import type Database from "better-sqlite3";
import type { MedicalRecord } from "@vhc/shared";
import type { SqliteDatabase } from "./database.js";

interface RecordRow {
  record_json: string;
}

type RecordColumns = [string, string, string, number, number, number, string, string];

export interface RecordStore {
  insert(record: MedicalRecord): void;
  save(record: MedicalRecord): void;
  get(recordId: string): MedicalRecord | null;
  delete(recordId: string): void;
  listByPet(petId: string): MedicalRecord[];
  /** Signed rabies VACCINE records, newest first. */
  listSignedRabiesVaccines(petId: string): MedicalRecord[];
  /** Signed ANNUAL_CHECK records created at or after `sinceIso`, newest first. */
  listSignedCheckupsSince(petId: string, sinceIso: string): MedicalRecord[];
}

function parse(row: RecordRow): MedicalRecord {
  return JSON.parse(row.record_json) as MedicalRecord;
}

function columns(record: MedicalRecord): RecordColumns {
  return [
    record.id,
    record.petId,
    record.type,
    record.vaccine?.isRabies ? 1 : 0,
    record.signature ? 1 : 0,
    record.immutable ? 1 : 0,
    record.createdAt,
    JSON.stringify(record),
  ];
}

export class SqliteRecordStore implements RecordStore {
  private readonly insertStmt: Database.Statement<RecordColumns>;
  private readonly saveStmt: Database.Statement<RecordColumns>;
  private readonly getStmt: Database.Statement<[string], RecordRow>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly listByPetStmt: Database.Statement<[string], RecordRow>;
  private readonly listRabiesStmt: Database.Statement<[string], RecordRow>;
  private readonly listCheckupsStmt: Database.Statement<[string, string], RecordRow>;

  constructor({ db }: SqliteDatabase) {
    this.insertStmt = db.prepare<RecordColumns>(`
      INSERT INTO medical_records
        (record_id, pet_id, type, is_rabies, signed, immutable, created_at, record_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.saveStmt = db.prepare<RecordColumns>(`
      INSERT INTO medical_records
        (record_id, pet_id, type, is_rabies, signed, immutable, created_at, record_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(record_id) DO UPDATE SET
        type = excluded.type,
        is_rabies = excluded.is_rabies,
        signed = excluded.signed,
        immutable = excluded.immutable,
        record_json = excluded.record_json
    `);

    this.getStmt = db.prepare<[string], RecordRow>(`
      SELECT record_json
      FROM medical_records
      WHERE record_id = ?
      LIMIT 1
    `);

    this.deleteStmt = db.prepare<[string]>("DELETE FROM medical_records WHERE record_id = ?");

    this.listByPetStmt = db.prepare<[string], RecordRow>(`
      SELECT record_json
      FROM medical_records
      WHERE pet_id = ?
      ORDER BY created_at DESC, record_id DESC
    `);

    this.listRabiesStmt = db.prepare<[string], RecordRow>(`
      SELECT record_json
      FROM medical_records
      WHERE pet_id = ? AND type = 'VACCINE' AND is_rabies = 1 AND signed = 1
      ORDER BY created_at DESC, record_id DESC
    `);

    this.listCheckupsStmt = db.prepare<[string, string], RecordRow>(`
      SELECT record_json
      FROM medical_records
      WHERE pet_id = ? AND type = 'ANNUAL_CHECK' AND signed = 1 AND created_at >= ?
      ORDER BY created_at DESC, record_id DESC
    `);
  }

  insert(record: MedicalRecord): void {
    this.insertStmt.run(...columns(record));
  }

  save(record: MedicalRecord): void {
    this.saveStmt.run(...columns(record));
  }

  get(recordId: string): MedicalRecord | null {
    const row = this.getStmt.get(recordId);
    return row ? parse(row) : null;
  }

  delete(recordId: string): void {
    this.deleteStmt.run(recordId);
  }

  listByPet(petId: string): MedicalRecord[] {
    return this.listByPetStmt.all(petId).map(parse);
  }

  listSignedRabiesVaccines(petId: string): MedicalRecord[] {
    return this.listRabiesStmt.all(petId).map(parse);
  }

  listSignedCheckupsSince(petId: string, sinceIso: string): MedicalRecord[] {
    return this.listCheckupsStmt.all(petId, sinceIso).map(parse);
  }
}
