import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import {
  type AdminActor,
  type Clinic,
  type DomainEvent,
  generateSealedKeyPair,
  type MedicalRecord,
  type OwnerActor,
  type Pet,
  type VetActor,
} from "@vhc/shared";
import { PetAccessGate } from "../auth/pet-access.js";
import { CertificateIssuer, type CertificateIssuerDeps } from "../certificates/certificate-issuer.js";
import { CertificateService } from "../certificates/certificate-service.js";
import { EligibilityValidator } from "../certificates/eligibility.js";
import { HashingService } from "../certificates/hashing.js";
import { SigningService } from "../certificates/signing.js";
import type { EventSink, EventWriteStatus } from "../ports.js";
import { RecordService } from "../records/record-service.js";
import { SqliteCertificateStore } from "../storage/certificate-store.js";
import { SqliteDatabase } from "../storage/database.js";
import { SqliteDirectoryStore } from "../storage/directory-store.js";
import { SqliteKeyStore } from "../storage/key-store.js";
import { SqliteRecordStore } from "../storage/record-store.js";

export const NOW = new Date("2026-06-15T12:00:00.000Z");
export const VET_PASSWORD = "test-secret";
export const CLINIC_PASSWORD = "test-clinic-secret";

export const silentLogger = pino({ level: "silent" });

/** Stands in for the broker: keeps every event in memory. */
export class RecordingEventSink implements EventSink {
  readonly events: DomainEvent[] = [];

  constructor(private readonly status: EventWriteStatus = "RECORDED") {}

  async publish(event: DomainEvent): Promise<EventWriteStatus> {
    this.events.push(event);
    return this.status;
  }
}

export function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "vhc-cert-service-"));
  return {
    dir,
    dbPath: join(dir, "certificates.db"),
  };
}

export const clinic: Clinic = {
  id: "clinic-1",
  name: "Northside Animal Clinic",
  address: "12 Harbour Road",
  city: "Porto",
  country: "PT",
};

export const otherClinic: Clinic = {
  id: "clinic-2",
  name: "Riverside Vets",
  address: "3 Mill Lane",
  city: "Braga",
  country: "PT",
};

export const owner: OwnerActor = { kind: "OWNER", id: "owner-1", username: "ana", displayName: "Ana Costa" };
export const vet: VetActor = {
  kind: "VET",
  id: "vet-1",
  username: "dr.rui",
  displayName: "Dr. Rui Sousa",
  clinicId: clinic.id,
  licenseNumber: "LIC-1001",
};
export const peerVet: VetActor = {
  kind: "VET",
  id: "vet-3",
  username: "dr.ines",
  displayName: "Dr. Ines Pinto",
  clinicId: clinic.id,
  licenseNumber: "LIC-1003",
};
export const admin: AdminActor = {
  kind: "ADMIN",
  id: "admin-1",
  username: "front.desk",
  displayName: "Front Desk",
  clinicId: clinic.id,
};
export const foreignVet: VetActor = {
  kind: "VET",
  id: "vet-2",
  username: "dr.joao",
  displayName: "Dr. Joao Lima",
  clinicId: otherClinic.id,
  licenseNumber: "LIC-2002",
};

export const pet: Pet = {
  id: "pet-1",
  name: "Bolt",
  species: "Dog",
  breed: "Border Collie",
  birthDate: "2021-04-02",
  gender: "MALE",
  color: "Black and white",
  microchip: "900000000000001",
  ownerId: owner.id,
  status: "ACTIVE",
  pendingClinicId: null,
  associatedVetIds: [vet.id],
};

export const pendingPet: Pet = {
  ...pet,
  id: "pet-2",
  name: "Mia",
  species: "Cat",
  breed: "Siamese",
  microchip: null,
  status: "PENDING",
  pendingClinicId: clinic.id,
  associatedVetIds: [],
};

export function rabiesRecord(overrides: Partial<MedicalRecord> = {}): MedicalRecord {
  return {
    id: "rec-rabies",
    petId: pet.id,
    creatorId: vet.id,
    createdInClinicId: clinic.id,
    type: "VACCINE",
    description: null,
    vaccine: {
      name: "Rabisin",
      validityMonths: 12,
      laboratory: "Lab One",
      batchNumber: "B-77",
      isRabies: true,
    },
    signature: { signerId: vet.id, value: "c2lnbmF0dXJl" },
    immutable: false,
    createdAt: "2025-12-15T09:00:00.000Z",
    ...overrides,
  };
}

export function checkupRecord(overrides: Partial<MedicalRecord> = {}): MedicalRecord {
  return {
    id: "rec-checkup",
    petId: pet.id,
    creatorId: vet.id,
    createdInClinicId: clinic.id,
    type: "ANNUAL_CHECK",
    description: "Healthy, weight stable",
    vaccine: null,
    signature: { signerId: vet.id, value: "c2lnbmF0dXJl" },
    immutable: false,
    createdAt: "2026-04-15T09:00:00.000Z",
    ...overrides,
  };
}

export interface Harness {
  dir: string;
  database: SqliteDatabase;
  directory: SqliteDirectoryStore;
  records: SqliteRecordStore;
  certificates: SqliteCertificateStore;
  keys: SqliteKeyStore;
  events: RecordingEventSink;
  issuerDeps: CertificateIssuerDeps;
  issuer: CertificateIssuer;
  certificateService: CertificateService;
  recordService: RecordService;
  close(): void;
}

/**
 * A seeded database with two clinics, their vets, an owner and two pets, and
 * sealed signing keys for both vets and both clinics.
 */
export async function createHarness(events = new RecordingEventSink()): Promise<Harness> {
  const temp = createTempDbPath();
  const database = new SqliteDatabase(temp.dbPath);
  const directory = new SqliteDirectoryStore(database);
  const records = new SqliteRecordStore(database);
  const certificates = new SqliteCertificateStore(database);
  const keys = new SqliteKeyStore(database);

  for (const item of [clinic, otherClinic]) directory.upsertClinic(item);
  for (const actor of [owner, vet, peerVet, admin, foreignVet]) directory.upsertActor(actor);
  for (const item of [pet, pendingPet]) directory.upsertPet(item);

  for (const vetId of [vet.id, peerVet.id, foreignVet.id]) {
    const pair = await generateSealedKeyPair(VET_PASSWORD, { scryptLogN: 10 });
    keys.register({ ownerType: "VET", ownerId: vetId }, pair.publicKeyHex, pair.sealedPrivateKey);
  }
  for (const clinicId of [clinic.id, otherClinic.id]) {
    const pair = await generateSealedKeyPair(CLINIC_PASSWORD, { scryptLogN: 10 });
    keys.register({ ownerType: "CLINIC", ownerId: clinicId }, pair.publicKeyHex, pair.sealedPrivateKey);
  }

  const log = silentLogger;
  const authorization = new PetAccessGate(directory, log);
  const hashing = new HashingService();
  const signing = new SigningService(keys, log);
  const now = () => NOW;
  const issuerDeps: CertificateIssuerDeps = {
    unitOfWork: database,
    records,
    certificates,
    pets: directory,
    staff: directory,
    authorization,
    eligibility: new EligibilityValidator(records, log),
    hashing,
    signing,
    events,
    log,
    now,
  };

  return {
    dir: temp.dir,
    database,
    directory,
    records,
    certificates,
    keys,
    events,
    issuerDeps,
    issuer: new CertificateIssuer(issuerDeps),
    certificateService: new CertificateService({
      certificates,
      pets: directory,
      staff: directory,
      authorization,
      hashing,
      signing,
      log,
    }),
    recordService: new RecordService({
      records,
      pets: directory,
      staff: directory,
      authorization,
      hashing,
      signing,
      events,
      log,
      now,
    }),
    close() {
      database.close();
      rmSync(temp.dir, { recursive: true, force: true });
    },
  };
}
