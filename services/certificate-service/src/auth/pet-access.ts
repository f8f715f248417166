import type { Actor, Pet, VetActor } from "@vhc/shared";
import { AccessDeniedError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AuthorizationGate, StaffDirectory } from "../ports.js";

export class PetAccessGate implements AuthorizationGate {
  constructor(
    private readonly staff: StaffDirectory,
    private readonly log: Logger,
  ) {}

  private isAssociatedWithClinic(pet: Pet, clinicId: string): boolean {
    return pet.status === "ACTIVE" && this.staff.clinicIdsOfVets(pet.associatedVetIds).includes(clinicId);
  }

  verifyPetAccess(requester: Actor, pet: Pet, action: string): void {
    if (requester.kind === "OWNER") {
      if (requester.id === pet.ownerId) return;
    } else {
      if (pet.status === "PENDING" && pet.pendingClinicId === requester.clinicId) return;
      if (this.isAssociatedWithClinic(pet, requester.clinicId)) return;
    }
    this.log.warn({ requesterId: requester.id, petId: pet.id, action }, "pet access denied");
    throw new AccessDeniedError(`User ${requester.id} is not authorized to ${action} pet ${pet.id}`);
  }

  verifyCertificateIssuer(vet: VetActor, pet: Pet): void {
    if (this.isAssociatedWithClinic(pet, vet.clinicId)) return;
    this.log.warn({ vetId: vet.id, clinicId: vet.clinicId, petId: pet.id }, "certificate issuance denied");
    throw new AccessDeniedError(
      `Vet ${vet.id} of clinic ${vet.clinicId} cannot issue certificates for pet ${pet.id}: the pet is not active with that clinic`,
    );
  }
}
