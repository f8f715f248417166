import type { Actor, Clinic, DomainEvent, Pet, VetActor } from "@vhc/shared";

export interface UnitOfWork {
  /** Runs `work` atomically: every write commits, or none does. */
  transaction<T>(work: () => T): T;
}

export interface PetDirectory {
  findPet(petId: string): Pet | null;
}

export interface StaffDirectory {
  findActor(actorId: string): Actor | null;
  findClinic(clinicId: string): Clinic | null;
  /** Clinic ids of the given vets, skipping vets that no longer exist. */
  clinicIdsOfVets(vetIds: string[]): string[];
}

export type KeyOwnerType = "VET" | "CLINIC";

export interface KeyRef {
  ownerType: KeyOwnerType;
  ownerId: string;
}

export interface KeyStore {
  /**
   * Opens the owner's sealed private key for the duration of `use` only; the
   * key bytes are zeroed once `use` settles, whatever the outcome.
   */
  withPrivateKey<T>(
    ref: KeyRef,
    password: string,
    use: (privateKey: Uint8Array) => Promise<T>,
  ): Promise<T>;
  findPublicKeyHex(ref: KeyRef): string | null;
}

export interface AuthorizationGate {
  /** Throws AccessDeniedError when the requester may not act on the pet. */
  verifyPetAccess(requester: Actor, pet: Pet, action: string): void;
  /** Throws AccessDeniedError unless the vet's clinic currently cares for the pet. */
  verifyCertificateIssuer(vet: VetActor, pet: Pet): void;
}

export type EventWriteStatus = "RECORDED" | "SKIPPED" | "FAILED";

export interface EventSink {
  /** Fire-and-forget: never rejects, reports the outcome instead. */
  publish(event: DomainEvent): Promise<EventWriteStatus>;
}
