import { addMonths } from "date-fns";
import {
  type Actor,
  CERTIFICATE_TYPE,
  type CertificatePayload,
  type Clinic,
  type MedicalRecord,
  type Pet,
  type VetActor,
} from "@vhc/shared";

export interface PayloadInput {
  pet: Pet;
  owner: Actor | null;
  rabiesRecord: MedicalRecord;
  vet: VetActor;
  clinic: Clinic;
  certificateNumber: string;
  issuedAt: Date;
}

function isoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/**
 * Every field is always present (absent values are null), so the same
 * inputs always yield the same field set and, once canonicalized, the same
 * bytes.
 */
export function buildCertificatePayload(input: PayloadInput): CertificatePayload {
  const { pet, owner, rabiesRecord, vet, clinic } = input;
  const vaccine = rabiesRecord.vaccine;
  if (!vaccine) {
    throw new Error(`record ${rabiesRecord.id} carries no vaccine details`);
  }
  const recordDate = new Date(rabiesRecord.createdAt);

  return {
    certType: CERTIFICATE_TYPE,
    certificateNumber: input.certificateNumber,
    issuedAt: input.issuedAt.toISOString(),
    issuer: {
      clinicId: clinic.id,
      clinicName: clinic.name,
      clinicAddress: clinic.address,
      clinicCity: clinic.city,
      clinicCountry: clinic.country,
      vetId: vet.id,
      vetName: vet.displayName,
      vetLicense: vet.licenseNumber,
    },
    subject: {
      petId: pet.id,
      petName: pet.name,
      species: pet.species,
      breed: pet.breed,
      birthDate: pet.birthDate,
      gender: pet.gender,
      color: pet.color,
      microchip: pet.microchip,
      ownerId: pet.ownerId,
      ownerName: owner?.displayName ?? null,
    },
    vaccination: {
      recordId: rabiesRecord.id,
      recordType: rabiesRecord.type,
      recordDate: rabiesRecord.createdAt,
      name: vaccine.name,
      batchNumber: vaccine.batchNumber,
      laboratory: vaccine.laboratory,
      validityMonths: vaccine.validityMonths,
      validFrom: isoDate(recordDate),
      validUntil: isoDate(addMonths(recordDate, vaccine.validityMonths)),
    },
  };
}
