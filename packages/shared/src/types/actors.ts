export type ActorKind = "OWNER" | "VET" | "ADMIN";

interface ActorProfile {
  id: string;
  username: string;
  displayName: string;
}

export interface OwnerActor extends ActorProfile {
  kind: "OWNER";
}

export interface VetActor extends ActorProfile {
  kind: "VET";
  clinicId: string;
  licenseNumber: string;
}

export interface AdminActor extends ActorProfile {
  kind: "ADMIN";
  clinicId: string;
}

export type Actor = OwnerActor | VetActor | AdminActor;
export type StaffActor = VetActor | AdminActor;

export interface Clinic {
  id: string;
  name: string;
  address: string;
  city: string;
  country: string;
}

export type PetStatus = "PENDING" | "ACTIVE" | "INACTIVE";

export interface Pet {
  id: string;
  name: string;
  species: string;
  breed: string;
  birthDate: string | null;   // ISO date
  gender: string | null;
  color: string | null;
  microchip: string | null;
  ownerId: string;
  status: PetStatus;
  pendingClinicId: string | null;
  associatedVetIds: string[];
}

export function isStaff(actor: Actor): actor is StaffActor {
  return actor.kind === "VET" || actor.kind === "ADMIN";
}

export function clinicOf(actor: Actor): string | null {
  return isStaff(actor) ? actor.clinicId : null;
}

export function canSignRecords(actor: Actor): actor is VetActor {
  return actor.kind === "VET";
}
