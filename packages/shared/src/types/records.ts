export const RECORD_TYPES = ["VACCINE", "ILLNESS", "ANNUAL_CHECK", "OTHER"] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

export interface VaccineDetails {
  name: string;
  validityMonths: number;
  laboratory: string | null;
  batchNumber: string;
  isRabies: boolean;
}

export interface RecordSignature {
  signerId: string;
  value: string;            // base64 Ed25519 over sha256Hex(canonicalJson(signable content))
}

export interface MedicalRecord {
  id: string;
  petId: string;
  creatorId: string;
  createdInClinicId: string | null;
  type: RecordType;
  description: string | null;
  vaccine: VaccineDetails | null;
  signature: RecordSignature | null;
  immutable: boolean;
  createdAt: string;        // ISO date-time
}

export function isRecordType(value: unknown): value is RecordType {
  return RECORD_TYPES.some((type) => type === value);
}
