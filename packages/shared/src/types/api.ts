import type { CertificateView } from "./certificate.js";
import type { MedicalRecord, RecordType, VaccineDetails } from "./records.js";

export interface ApiError {
  error: string;
  message?: string;
}

export interface GenerateCertificateRequest {
  petId: string;
  certificateNumber: string;
  vetPassword: string;
  clinicPassword: string;
}

export interface GenerateCertificateResponse {
  certificate: CertificateView;
  eventWriteStatus: "RECORDED" | "SKIPPED" | "FAILED";
}

export interface GetCertificateResponse {
  certificate: CertificateView;
}

export interface ListCertificatesResponse {
  certificates: CertificateView[];
}

export interface GetQrTokenResponse {
  certificateId: string;
  qrData: string;
}

export interface VerifyQrTokenRequest {
  qrData: string;
}

export interface VerifyQrTokenResponse {
  certificateNumber: string | null;
  valid: boolean;
  hashMatches: boolean;
  vetSignatureValid: boolean;
  clinicSignatureValid: boolean;
  known: boolean;
}

export interface CreateRecordRequest {
  petId: string;
  type: RecordType;
  description?: string;
  vaccine?: VaccineDetails;
  vetPassword?: string;
}

export interface UpdateRecordRequest {
  type?: RecordType;
  description?: string;
}

export interface RecordResponse {
  record: MedicalRecord;
}

export interface ListRecordsResponse {
  records: MedicalRecord[];
}
