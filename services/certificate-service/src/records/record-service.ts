import { randomUUID } from "node:crypto";
import {
  type Actor,
  canSignRecords,
  clinicOf,
  type CreateRecordRequest,
  type MedicalRecord,
  type Pet,
  type UpdateRecordRequest,
  type VetActor,
} from "@vhc/shared";
import type { HashingService } from "../certificates/hashing.js";
import type { SigningService } from "../certificates/signing.js";
import { AccessDeniedError, InvalidRequestError, NotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AuthorizationGate, EventSink, PetDirectory, StaffDirectory } from "../ports.js";
import type { RecordStore } from "../storage/record-store.js";
import { assertCanDelete, assertCanUpdate, signRecord } from "./record-lifecycle.js";

export interface RecordServiceDeps {
  records: RecordStore;
  pets: PetDirectory;
  staff: StaffDirectory;
  authorization: AuthorizationGate;
  hashing: HashingService;
  signing: SigningService;
  events: EventSink;
  log: Logger;
  now?: () => Date;
}

/** The content a vet's record signature covers. */
export function signableRecordContent(record: MedicalRecord, vet: VetActor): Record<string, unknown> {
  return {
    petId: record.petId,
    vetId: vet.id,
    clinicId: vet.clinicId,
    licenseNumber: vet.licenseNumber,
    type: record.type,
    description: record.description,
    vaccine: record.vaccine,
  };
}

export class RecordService {
  private readonly now: () => Date;

  constructor(private readonly deps: RecordServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private findActor(actorId: string): Actor {
    const actor = this.deps.staff.findActor(actorId);
    if (!actor) throw new NotFoundError("User", actorId);
    return actor;
  }

  private findPet(petId: string): Pet {
    const pet = this.deps.pets.findPet(petId);
    if (!pet) throw new NotFoundError("Pet", petId);
    return pet;
  }

  private findRecord(recordId: string): MedicalRecord {
    const record = this.deps.records.get(recordId);
    if (!record) throw new NotFoundError("Record", recordId);
    return record;
  }

  async createRecord(creatorId: string, request: CreateRecordRequest): Promise<MedicalRecord> {
    const creator = this.findActor(creatorId);
    const pet = this.findPet(request.petId);
    this.deps.authorization.verifyPetAccess(creator, pet, "create record for");

    if (request.type === "VACCINE" && !request.vaccine) {
      throw new InvalidRequestError("Vaccine details are required for VACCINE records");
    }
    if (request.type !== "VACCINE" && request.vaccine) {
      throw new InvalidRequestError("Vaccine details are only allowed on VACCINE records");
    }

    let record: MedicalRecord = {
      id: randomUUID(),
      petId: pet.id,
      creatorId: creator.id,
      createdInClinicId: clinicOf(creator),
      type: request.type,
      description: request.description?.trim() || null,
      vaccine: request.vaccine ?? null,
      signature: null,
      immutable: false,
      createdAt: this.now().toISOString(),
    };

    if (request.vetPassword !== undefined) {
      if (!canSignRecords(creator)) {
        throw new AccessDeniedError(`User ${creator.id} is not a veterinarian and cannot sign records`);
      }
      const digest = this.deps.hashing.hashPayload(signableRecordContent(record, creator)).hash;
      const value = await this.deps.signing.sign(
        { ownerType: "VET", ownerId: creator.id },
        request.vetPassword,
        digest,
      );
      record = signRecord(record, { signerId: creator.id, value });
    }

    this.deps.records.insert(record);
    this.deps.log.info(
      { recordId: record.id, petId: pet.id, creatorId: creator.id, signed: record.signature !== null },
      "medical record created",
    );
    await this.deps.events.publish({
      type: "RECORD_CREATED",
      occurredAt: record.createdAt,
      recordId: record.id,
      petId: pet.id,
      creatorId: creator.id,
      signed: record.signature !== null,
    });
    return record;
  }

  listRecords(petId: string, requesterId: string): MedicalRecord[] {
    const pet = this.findPet(petId);
    this.deps.authorization.verifyPetAccess(this.findActor(requesterId), pet, "view records for");
    return this.deps.records.listByPet(pet.id);
  }

  getRecord(recordId: string, requesterId: string): MedicalRecord {
    const record = this.findRecord(recordId);
    this.deps.authorization.verifyPetAccess(this.findActor(requesterId), this.findPet(record.petId), "view record for");
    return record;
  }

  updateRecord(recordId: string, change: UpdateRecordRequest, requesterId: string): MedicalRecord {
    const record = this.findRecord(recordId);
    const requester = this.findActor(requesterId);
    assertCanUpdate(record, requester, change);

    let updated = record;
    if (change.type !== undefined && change.type !== record.type) {
      updated = { ...updated, type: change.type };
    }
    if (change.description !== undefined) {
      const description = change.description.trim() || null;
      if (description !== record.description) {
        updated = { ...updated, description };
      }
    }
    if (updated === record) {
      this.deps.log.info({ recordId }, "no effective changes, record update skipped");
      return record;
    }
    this.deps.records.save(updated);
    this.deps.log.info({ recordId, requesterId }, "medical record updated");
    return updated;
  }

  async deleteRecord(recordId: string, requesterId: string): Promise<void> {
    const record = this.findRecord(recordId);
    const requester = this.findActor(requesterId);
    assertCanDelete(record, requester);

    this.deps.records.delete(record.id);
    this.deps.log.info({ recordId, requesterId }, "medical record deleted");
    await this.deps.events.publish({
      type: "RECORD_DELETED",
      occurredAt: this.now().toISOString(),
      recordId: record.id,
      petId: record.petId,
      deletedBy: requester.id,
    });
  }
}
