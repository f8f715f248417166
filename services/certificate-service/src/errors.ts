export type DomainErrorKind =
  | "InvalidRequest"
  | "NotFound"
  | "AccessDenied"
  | "MissingRabiesVaccine"
  | "MissingRecentCheckup"
  | "AlreadyExistsForRecord"
  | "NumberAlreadyExists"
  | "Immutable"
  | "ImmutableType"
  | "Signed"
  | "HashingError"
  | "SigningError"
  | "EncodingError";

const ERROR_CODES: Record<DomainErrorKind, { code: string; statusCode: number }> = {
  InvalidRequest: { code: "invalid_request", statusCode: 400 },
  NotFound: { code: "not_found", statusCode: 404 },
  AccessDenied: { code: "access_denied", statusCode: 403 },
  MissingRabiesVaccine: { code: "missing_rabies_vaccine", statusCode: 422 },
  MissingRecentCheckup: { code: "missing_recent_checkup", statusCode: 422 },
  AlreadyExistsForRecord: { code: "certificate_exists_for_record", statusCode: 409 },
  NumberAlreadyExists: { code: "certificate_number_exists", statusCode: 409 },
  Immutable: { code: "record_immutable", statusCode: 409 },
  ImmutableType: { code: "record_type_immutable", statusCode: 409 },
  Signed: { code: "record_signed", statusCode: 409 },
  HashingError: { code: "hashing_failed", statusCode: 500 },
  SigningError: { code: "signing_failed", statusCode: 500 },
  EncodingError: { code: "encoding_failed", statusCode: 500 },
};

export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;

  get code(): string {
    return ERROR_CODES[this.kind].code;
  }

  get statusCode(): number {
    return ERROR_CODES[this.kind].statusCode;
  }
}

export class InvalidRequestError extends DomainError {
  readonly kind = "InvalidRequest";
  name = "InvalidRequestError";
}

export class NotFoundError extends DomainError {
  readonly kind = "NotFound";

  constructor(entity: string, id: string) {
    super(`${entity} not found with id: ${id}`);
    this.name = "NotFoundError";
  }
}

export class AccessDeniedError extends DomainError {
  readonly kind = "AccessDenied";
  name = "AccessDeniedError";
}

export class MissingRabiesVaccineError extends DomainError {
  readonly kind = "MissingRabiesVaccine";

  constructor(readonly petId: string) {
    super(`Pet ${petId} has no signed, unexpired rabies vaccination record`);
    this.name = "MissingRabiesVaccineError";
  }
}

export class MissingRecentCheckupError extends DomainError {
  readonly kind = "MissingRecentCheckup";

  constructor(
    readonly petId: string,
    readonly cutoffDate: string,
  ) {
    super(`Pet ${petId} has no signed annual checkup on or after ${cutoffDate}`);
    this.name = "MissingRecentCheckupError";
  }
}

export class CertificateExistsForRecordError extends DomainError {
  readonly kind = "AlreadyExistsForRecord";

  constructor(readonly recordId: string) {
    super(`A certificate already exists for record ${recordId}`);
    this.name = "CertificateExistsForRecordError";
  }
}

export class CertificateNumberExistsError extends DomainError {
  readonly kind = "NumberAlreadyExists";

  constructor(readonly certificateNumber: string) {
    super(`Certificate number '${certificateNumber}' is already in use`);
    this.name = "CertificateNumberExistsError";
  }
}

export class RecordImmutableError extends DomainError {
  readonly kind = "Immutable";

  constructor(readonly recordId: string) {
    super(`Record ${recordId} backs an issued certificate and can no longer be modified or deleted`);
    this.name = "RecordImmutableError";
  }
}

export class RecordTypeImmutableError extends DomainError {
  readonly kind = "ImmutableType";

  constructor(
    readonly recordId: string,
    detail: string,
  ) {
    super(`Record ${recordId}: ${detail}`);
    this.name = "RecordTypeImmutableError";
  }
}

export class RecordSignedError extends DomainError {
  readonly kind = "Signed";

  constructor(readonly recordId: string) {
    super(`Record ${recordId} is signed and cannot be updated`);
    this.name = "RecordSignedError";
  }
}

export class HashingError extends DomainError {
  readonly kind = "HashingError";
  name = "HashingError";
}

export class SigningError extends DomainError {
  readonly kind = "SigningError";
  name = "SigningError";
}

export class EncodingError extends DomainError {
  readonly kind = "EncodingError";
  name = "EncodingError";
}
