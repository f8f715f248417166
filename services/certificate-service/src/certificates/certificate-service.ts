import {
  type Actor,
  type Certificate,
  type CertificateView,
  type DecodedQrCertificate,
  decodeHc1,
  encodeHc1,
  type Pet,
  QrCodecError,
  type VerifyQrTokenResponse,
} from "@vhc/shared";
import { EncodingError, NotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AuthorizationGate, PetDirectory, StaffDirectory } from "../ports.js";
import type { CertificateStore } from "../storage/certificate-store.js";
import { toCertificateView } from "./certificate-view.js";
import type { HashingService } from "./hashing.js";
import type { SigningService } from "./signing.js";

export interface CertificateServiceDeps {
  certificates: CertificateStore;
  pets: PetDirectory;
  staff: StaffDirectory;
  authorization: AuthorizationGate;
  hashing: HashingService;
  signing: SigningService;
  log: Logger;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function issuerIds(payload: Record<string, unknown>): { vetId: string; clinicId: string } | null {
  const issuer = payload.issuer;
  if (!isObject(issuer)) return null;
  const { vetId, clinicId } = issuer;
  if (typeof vetId !== "string" || typeof clinicId !== "string") return null;
  return { vetId, clinicId };
}

export class CertificateService {
  constructor(private readonly deps: CertificateServiceDeps) {}

  private findRequester(requesterId: string): Actor {
    const requester = this.deps.staff.findActor(requesterId);
    if (!requester) throw new NotFoundError("User", requesterId);
    return requester;
  }

  private findPet(petId: string): Pet {
    const pet = this.deps.pets.findPet(petId);
    if (!pet) throw new NotFoundError("Pet", petId);
    return pet;
  }

  private findAuthorizedCertificate(certificateId: string, requesterId: string, action: string): Certificate {
    const certificate = this.deps.certificates.get(certificateId);
    if (!certificate) throw new NotFoundError("Certificate", certificateId);
    const pet = this.findPet(certificate.petId);
    this.deps.authorization.verifyPetAccess(this.findRequester(requesterId), pet, action);
    return certificate;
  }

  listCertificates(petId: string, requesterId: string): CertificateView[] {
    const pet = this.findPet(petId);
    this.deps.authorization.verifyPetAccess(this.findRequester(requesterId), pet, "view certificates for");
    return this.deps.certificates.listByPet(pet.id).map(toCertificateView);
  }

  getCertificate(certificateId: string, requesterId: string): CertificateView {
    return toCertificateView(this.findAuthorizedCertificate(certificateId, requesterId, "view certificate for"));
  }

  getQrToken(certificateId: string, requesterId: string): string {
    const certificate = this.findAuthorizedCertificate(certificateId, requesterId, "get QR data for certificate of");
    try {
      return encodeHc1(certificate);
    } catch (err) {
      this.deps.log.error({ certificateId, reason: err instanceof Error ? err.message : String(err) }, "QR encoding failed");
      throw new EncodingError(`QR data generation failed for certificate ${certificateId}`, { cause: err });
    }
  }

  /**
   * Verifies a scanned token using nothing but its own content and the
   * registered public keys: the digest is recomputed from the embedded payload.
   */
  async verifyQrToken(qrData: string): Promise<VerifyQrTokenResponse> {
    let decoded: DecodedQrCertificate;
    try {
      decoded = decodeHc1(qrData);
    } catch (err) {
      if (err instanceof QrCodecError) {
        throw new EncodingError(`QR data could not be decoded: ${err.message}`, { cause: err });
      }
      throw err;
    }

    const recomputed = this.deps.hashing.hash(decoded.payloadJson);
    const hashMatches = recomputed === decoded.hash;
    const certificateNumber =
      typeof decoded.payload.certificateNumber === "string" ? decoded.payload.certificateNumber : null;
    const stored = certificateNumber ? this.deps.certificates.getByNumber(certificateNumber) : null;

    let vetSignatureValid = false;
    let clinicSignatureValid = false;
    const ids = issuerIds(decoded.payload);
    if (hashMatches && ids) {
      vetSignatureValid = await this.deps.signing.verify(
        { ownerType: "VET", ownerId: ids.vetId },
        decoded.hash,
        decoded.vetSignature,
      );
      clinicSignatureValid = await this.deps.signing.verify(
        { ownerType: "CLINIC", ownerId: ids.clinicId },
        decoded.hash,
        decoded.clinicSignature,
      );
    }

    return {
      certificateNumber,
      valid: hashMatches && vetSignatureValid && clinicSignatureValid,
      hashMatches,
      vetSignatureValid,
      clinicSignatureValid,
      known: stored !== null && stored.hash === decoded.hash,
    };
  }
}
