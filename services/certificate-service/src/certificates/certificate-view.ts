import type { Certificate, CertificatePayload, CertificateView } from "@vhc/shared";

/**
 * Summaries come from the signed payload, so a view always describes the
 * pet, vet and clinic as they were when the certificate was issued.
 */
export function toCertificateView(certificate: Certificate): CertificateView {
  const payload = JSON.parse(certificate.payload) as CertificatePayload;
  return {
    id: certificate.id,
    certificateNumber: certificate.certificateNumber,
    pet: {
      id: payload.subject.petId,
      name: payload.subject.petName,
      species: payload.subject.species,
      breed: payload.subject.breed,
    },
    record: {
      id: certificate.recordId,
      type: payload.vaccination.recordType,
      createdAt: payload.vaccination.recordDate,
    },
    vet: {
      id: certificate.vetId,
      name: payload.issuer.vetName,
      licenseNumber: payload.issuer.vetLicense,
    },
    clinic: {
      id: certificate.clinicId,
      name: payload.issuer.clinicName,
    },
    issuedAt: payload.issuedAt,
    payload: certificate.payload,
    hash: certificate.hash,
    vetSignature: certificate.vetSignature,
    clinicSignature: certificate.clinicSignature,
  };
}
