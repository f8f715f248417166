import { randomUUID } from "node:crypto";
import type {
  Certificate,
  CertificateGeneratedEvent,
  CertificateView,
  GenerateCertificateRequest,
  VetActor,
} from "@vhc/shared";
import {
  AccessDeniedError,
  CertificateExistsForRecordError,
  CertificateNumberExistsError,
  NotFoundError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  AuthorizationGate,
  EventSink,
  EventWriteStatus,
  PetDirectory,
  StaffDirectory,
  UnitOfWork,
} from "../ports.js";
import { markImmutable } from "../records/record-lifecycle.js";
import { isUniqueViolation } from "../storage/database.js";
import type { CertificateStore } from "../storage/certificate-store.js";
import type { RecordStore } from "../storage/record-store.js";
import { toCertificateView } from "./certificate-view.js";
import type { EligibilityValidator } from "./eligibility.js";
import type { HashingService } from "./hashing.js";
import { buildCertificatePayload } from "./payload-builder.js";
import type { SigningService } from "./signing.js";

export type IssuanceState =
  | "Requested"
  | "Validated"
  | "PayloadBuilt"
  | "Hashed"
  | "VetSigned"
  | "ClinicSigned"
  | "Persisted";

export interface CertificateIssuerDeps {
  unitOfWork: UnitOfWork;
  records: RecordStore;
  certificates: CertificateStore;
  pets: PetDirectory;
  staff: StaffDirectory;
  authorization: AuthorizationGate;
  eligibility: EligibilityValidator;
  hashing: HashingService;
  signing: SigningService;
  events: EventSink;
  log: Logger;
  now?: () => Date;
}

export interface IssuedCertificate {
  certificate: CertificateView;
  eventWriteStatus: EventWriteStatus;
}

export class CertificateIssuer {
  private readonly now: () => Date;

  constructor(private readonly deps: CertificateIssuerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private step(state: IssuanceState, context: Record<string, unknown>): void {
    this.deps.log.debug({ ...context, state }, "certificate issuance step");
  }

  private findVet(vetId: string): VetActor {
    const actor = this.deps.staff.findActor(vetId);
    if (!actor) throw new NotFoundError("Vet", vetId);
    if (actor.kind !== "VET") {
      throw new AccessDeniedError(`User ${vetId} is not a veterinarian and cannot issue certificates`);
    }
    return actor;
  }

  /**
   * Validates, builds, hashes and double-signs a certificate for the pet's
   * current rabies record, then stores it and freezes the record in one
   * transaction. Nothing is written unless every step succeeds.
   */
  async generateCertificate(vetId: string, request: GenerateCertificateRequest): Promise<IssuedCertificate> {
    const { log } = this.deps;
    const context = { vetId, petId: request.petId, certificateNumber: request.certificateNumber };
    this.step("Requested", context);

    const vet = this.findVet(vetId);
    const pet = this.deps.pets.findPet(request.petId);
    if (!pet) throw new NotFoundError("Pet", request.petId);
    const clinic = this.deps.staff.findClinic(vet.clinicId);
    if (!clinic) throw new NotFoundError("Clinic", vet.clinicId);
    this.deps.authorization.verifyCertificateIssuer(vet, pet);

    const now = this.now();
    const rabiesRecord = this.deps.eligibility.findValidRabiesRecord(pet.id, now);
    this.deps.eligibility.findValidCheckup(pet.id, now);

    if (this.deps.certificates.existsForRecord(rabiesRecord.id)) {
      throw new CertificateExistsForRecordError(rabiesRecord.id);
    }
    if (this.deps.certificates.getByNumber(request.certificateNumber)) {
      throw new CertificateNumberExistsError(request.certificateNumber);
    }
    this.step("Validated", { ...context, recordId: rabiesRecord.id });

    const payload = buildCertificatePayload({
      pet,
      owner: this.deps.staff.findActor(pet.ownerId),
      rabiesRecord,
      vet,
      clinic,
      certificateNumber: request.certificateNumber,
      issuedAt: now,
    });
    this.step("PayloadBuilt", context);

    const { payloadJson, hash } = this.deps.hashing.hashPayload(payload);
    this.step("Hashed", context);

    const vetSignature = await this.deps.signing.sign(
      { ownerType: "VET", ownerId: vet.id },
      request.vetPassword,
      hash,
    );
    this.step("VetSigned", context);

    const clinicSignature = await this.deps.signing.sign(
      { ownerType: "CLINIC", ownerId: clinic.id },
      request.clinicPassword,
      hash,
    );
    this.step("ClinicSigned", context);

    const certificate: Certificate = {
      id: randomUUID(),
      recordId: rabiesRecord.id,
      petId: pet.id,
      vetId: vet.id,
      clinicId: clinic.id,
      certificateNumber: request.certificateNumber,
      payload: payloadJson,
      hash,
      vetSignature,
      clinicSignature,
      createdAt: now.toISOString(),
    };
    this.persist(certificate);
    this.step("Persisted", { ...context, certificateId: certificate.id });
    log.info(
      { certificateId: certificate.id, petId: pet.id, recordId: rabiesRecord.id, vetId: vet.id },
      "certificate generated",
    );

    const event: CertificateGeneratedEvent = {
      type: "CERTIFICATE_GENERATED",
      occurredAt: certificate.createdAt,
      certificateId: certificate.id,
      certificateNumber: certificate.certificateNumber,
      petId: pet.id,
      ownerId: pet.ownerId,
      recordId: rabiesRecord.id,
      vetId: vet.id,
      clinicId: clinic.id,
      hash,
    };
    const eventWriteStatus = await this.deps.events.publish(event);
    if (eventWriteStatus === "FAILED") {
      log.warn({ certificateId: certificate.id }, "certificate generated event was not delivered");
    }

    return { certificate: toCertificateView(certificate), eventWriteStatus };
  }

  private persist(certificate: Certificate): void {
    try {
      this.deps.unitOfWork.transaction(() => {
        this.deps.certificates.insert(certificate);
        const record = this.deps.records.get(certificate.recordId);
        if (!record) throw new NotFoundError("Record", certificate.recordId);
        this.deps.records.save(markImmutable(record));
      });
    } catch (err) {
      if (isUniqueViolation(err, "certificates.record_id")) {
        throw new CertificateExistsForRecordError(certificate.recordId);
      }
      if (isUniqueViolation(err, "certificates.certificate_number")) {
        throw new CertificateNumberExistsError(certificate.certificateNumber);
      }
      throw err;
    }
  }
}
