import type Database from "better-sqlite3";
import type { Actor, Clinic, Pet } from "@vhc/shared";
import type { PetDirectory, StaffDirectory } from "../ports.js";
import type { SqliteDatabase } from "./database.js";

interface JsonRow {
  json: string;
}

/**
 * Read side of the clinic/user/pet directories. Their CRUD lives in other
 * services; the upserts exist to seed a local database.
 */
export class SqliteDirectoryStore implements PetDirectory, StaffDirectory {
  private readonly getClinicStmt: Database.Statement<[string], JsonRow>;
  private readonly getActorStmt: Database.Statement<[string], JsonRow>;
  private readonly getPetStmt: Database.Statement<[string], JsonRow>;
  private readonly upsertClinicStmt: Database.Statement<[string, string]>;
  private readonly upsertActorStmt: Database.Statement<[string, string, string | null, string]>;
  private readonly upsertPetStmt: Database.Statement<[string, string, string]>;

  constructor({ db }: SqliteDatabase) {
    this.getClinicStmt = db.prepare<[string], JsonRow>(
      "SELECT clinic_json AS json FROM clinics WHERE clinic_id = ? LIMIT 1",
    );
    this.getActorStmt = db.prepare<[string], JsonRow>(
      "SELECT actor_json AS json FROM actors WHERE actor_id = ? LIMIT 1",
    );
    this.getPetStmt = db.prepare<[string], JsonRow>(
      "SELECT pet_json AS json FROM pets WHERE pet_id = ? LIMIT 1",
    );
    this.upsertClinicStmt = db.prepare<[string, string]>(`
      INSERT INTO clinics (clinic_id, clinic_json) VALUES (?, ?)
      ON CONFLICT(clinic_id) DO UPDATE SET clinic_json = excluded.clinic_json
    `);
    this.upsertActorStmt = db.prepare<[string, string, string | null, string]>(`
      INSERT INTO actors (actor_id, kind, clinic_id, actor_json) VALUES (?, ?, ?, ?)
      ON CONFLICT(actor_id) DO UPDATE SET
        kind = excluded.kind,
        clinic_id = excluded.clinic_id,
        actor_json = excluded.actor_json
    `);
    this.upsertPetStmt = db.prepare<[string, string, string]>(`
      INSERT INTO pets (pet_id, owner_id, pet_json) VALUES (?, ?, ?)
      ON CONFLICT(pet_id) DO UPDATE SET
        owner_id = excluded.owner_id,
        pet_json = excluded.pet_json
    `);
  }

  findClinic(clinicId: string): Clinic | null {
    const row = this.getClinicStmt.get(clinicId);
    if (!row) return null;
    return JSON.parse(row.json) as Clinic;
  }

  findActor(actorId: string): Actor | null {
    const row = this.getActorStmt.get(actorId);
    if (!row) return null;
    return JSON.parse(row.json) as Actor;
  }

  findPet(petId: string): Pet | null {
    const row = this.getPetStmt.get(petId);
    if (!row) return null;
    return JSON.parse(row.json) as Pet;
  }

  clinicIdsOfVets(vetIds: string[]): string[] {
    const clinicIds: string[] = [];
    for (const vetId of vetIds) {
      const actor = this.findActor(vetId);
      if (actor?.kind === "VET") clinicIds.push(actor.clinicId);
    }
    return clinicIds;
  }

  upsertClinic(clinic: Clinic): void {
    this.upsertClinicStmt.run(clinic.id, JSON.stringify(clinic));
  }

  upsertActor(actor: Actor): void {
    const clinicId = actor.kind === "OWNER" ? null : actor.clinicId;
    this.upsertActorStmt.run(actor.id, actor.kind, clinicId, JSON.stringify(actor));
  }

  upsertPet(pet: Pet): void {
    this.upsertPetStmt.run(pet.id, pet.ownerId, JSON.stringify(pet));
  }
}
