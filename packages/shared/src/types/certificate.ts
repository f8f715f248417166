import type { RecordType } from "./records.js";

export const CERTIFICATE_TYPE = "PET_HEALTH_CERT_V1";

export interface CertificatePayload {
  certType: typeof CERTIFICATE_TYPE;
  certificateNumber: string;
  issuedAt: string;
  issuer: {
    clinicId: string;
    clinicName: string;
    clinicAddress: string;
    clinicCity: string;
    clinicCountry: string;
    vetId: string;
    vetName: string;
    vetLicense: string;
  };
  subject: {
    petId: string;
    petName: string;
    species: string;
    breed: string;
    birthDate: string | null;
    gender: string | null;
    color: string | null;
    microchip: string | null;
    ownerId: string;
    ownerName: string | null;
  };
  vaccination: {
    recordId: string;
    recordType: RecordType;
    recordDate: string;
    name: string;
    batchNumber: string;
    laboratory: string | null;
    validityMonths: number;
    validFrom: string;
    validUntil: string;
  };
}

export interface Certificate {
  id: string;
  recordId: string;
  petId: string;
  vetId: string;
  clinicId: string;
  certificateNumber: string;
  payload: string;          // canonicalJson(CertificatePayload)
  hash: string;             // sha256Hex(payload)
  vetSignature: string;     // base64 Ed25519 over hash bytes
  clinicSignature: string;  // base64 Ed25519 over the same hash bytes
  createdAt: string;
}

export interface CertificateView {
  id: string;
  certificateNumber: string;
  pet: { id: string; name: string; species: string; breed: string };
  record: { id: string; type: RecordType; createdAt: string };
  vet: { id: string; name: string; licenseNumber: string };
  clinic: { id: string; name: string };
  issuedAt: string;
  payload: string;
  hash: string;
  vetSignature: string;
  clinicSignature: string;
}
