import { type Actor, clinicOf, type MedicalRecord, type RecordSignature, type RecordType } from "@vhc/shared";
import {
  AccessDeniedError,
  RecordImmutableError,
  RecordSignedError,
  RecordTypeImmutableError,
} from "../errors.js";

export type RecordState = "CREATED" | "SIGNED" | "IMMUTABLE";

export type LifecycleDenial = "Immutable" | "ImmutableType" | "Signed" | "AccessDenied";

export type LifecycleDecision =
  | { allowed: true }
  | { allowed: false; reason: LifecycleDenial };

export interface RecordChange {
  type?: RecordType;
  description?: string;
}

const ALLOW: LifecycleDecision = { allowed: true };

function deny(reason: LifecycleDenial): LifecycleDecision {
  return { allowed: false, reason };
}

export function recordState(record: MedicalRecord): RecordState {
  if (record.immutable) return "IMMUTABLE";
  return record.signature ? "SIGNED" : "CREATED";
}

/**
 * CREATED -> SIGNED. Only used while a record is being created: a stored
 * record is never signed after the fact.
 */
export function signRecord(record: MedicalRecord, signature: RecordSignature): MedicalRecord {
  if (recordState(record) !== "CREATED") {
    throw new Error(`record ${record.id} cannot be signed from state ${recordState(record)}`);
  }
  return { ...record, signature };
}

/** CREATED | SIGNED -> IMMUTABLE, once, when a certificate is persisted. */
export function markImmutable(record: MedicalRecord): MedicalRecord {
  if (recordState(record) === "IMMUTABLE") {
    throw new Error(`record ${record.id} is already immutable`);
  }
  return { ...record, immutable: true };
}

function isCreatorOrClinicPeer(record: MedicalRecord, actor: Actor): boolean {
  if (actor.id === record.creatorId) return true;
  const actorClinic = clinicOf(actor);
  return actorClinic !== null && actorClinic === record.createdInClinicId;
}

function isSigner(record: MedicalRecord, actor: Actor): boolean {
  return record.signature !== null && record.signature.signerId === actor.id;
}

export function canUpdate(
  record: MedicalRecord,
  actor: Actor,
  change: RecordChange = {},
): LifecycleDecision {
  if (record.immutable) return deny("Immutable");
  if (record.type === "VACCINE") return deny("ImmutableType");
  if (record.signature) return deny("Signed");
  if (change.type === "VACCINE") return deny("ImmutableType");
  return isCreatorOrClinicPeer(record, actor) ? ALLOW : deny("AccessDenied");
}

export function canDelete(record: MedicalRecord, actor: Actor): LifecycleDecision {
  if (record.immutable) return deny("Immutable");
  if (record.signature) {
    return isSigner(record, actor) ? ALLOW : deny("AccessDenied");
  }
  return isCreatorOrClinicPeer(record, actor) ? ALLOW : deny("AccessDenied");
}

function raise(decision: LifecycleDecision, record: MedicalRecord, actor: Actor, action: string): void {
  if (decision.allowed) return;
  switch (decision.reason) {
    case "Immutable":
      throw new RecordImmutableError(record.id);
    case "ImmutableType":
      throw new RecordTypeImmutableError(
        record.id,
        record.type === "VACCINE"
          ? "records of type VACCINE cannot be updated"
          : "cannot change record type to VACCINE",
      );
    case "Signed":
      throw new RecordSignedError(record.id);
    case "AccessDenied":
      throw new AccessDeniedError(`User ${actor.id} is not authorized to ${action} record ${record.id}`);
  }
}

export function assertCanUpdate(record: MedicalRecord, actor: Actor, change: RecordChange = {}): void {
  raise(canUpdate(record, actor, change), record, actor, "update");
}

export function assertCanDelete(record: MedicalRecord, actor: Actor): void {
  raise(canDelete(record, actor), record, actor, "delete");
}
