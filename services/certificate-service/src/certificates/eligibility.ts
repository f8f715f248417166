import { addMonths } from "date-fns";
import type { MedicalRecord } from "@vhc/shared";
import { MissingRabiesVaccineError, MissingRecentCheckupError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { RecordStore } from "../storage/record-store.js";

export const CHECKUP_FRESHNESS_YEARS = 1;

/** `createdAt + validityMonths`, or null when the record carries no usable vaccine details. */
export function vaccineExpiry(record: MedicalRecord): Date | null {
  const vaccine = record.vaccine;
  if (!vaccine || !Number.isInteger(vaccine.validityMonths) || vaccine.validityMonths < 0) {
    return null;
  }
  const created = new Date(record.createdAt);
  if (Number.isNaN(created.getTime())) return null;
  return addMonths(created, vaccine.validityMonths);
}

/**
 * Start of the UTC day one year before `now`. On Feb 29 the cutoff falls on
 * Feb 28 of the previous year.
 */
export function checkupCutoff(now: Date): Date {
  const year = now.getUTCFullYear() - CHECKUP_FRESHNESS_YEARS;
  const month = now.getUTCMonth();
  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return new Date(Date.UTC(year, month, Math.min(now.getUTCDate(), lastDayOfMonth)));
}

export class EligibilityValidator {
  constructor(
    private readonly records: RecordStore,
    private readonly log: Logger,
  ) {}

  findValidRabiesRecord(petId: string, now: Date): MedicalRecord {
    for (const record of this.records.listSignedRabiesVaccines(petId)) {
      const expiry = vaccineExpiry(record);
      if (!expiry) {
        this.log.warn({ recordId: record.id }, "skipping rabies record without usable validity");
        continue;
      }
      if (expiry.getTime() > now.getTime()) {
        this.log.debug({ recordId: record.id, expiry: expiry.toISOString() }, "valid rabies record found");
        return record;
      }
    }
    throw new MissingRabiesVaccineError(petId);
  }

  findValidCheckup(petId: string, now: Date): MedicalRecord {
    const cutoff = checkupCutoff(now);
    const [latest] = this.records.listSignedCheckupsSince(petId, cutoff.toISOString());
    if (!latest) {
      throw new MissingRecentCheckupError(petId, cutoff.toISOString().slice(0, 10));
    }
    this.log.debug({ recordId: latest.id }, "recent checkup found");
    return latest;
  }
}
