export type DomainEventType = "CERTIFICATE_GENERATED" | "RECORD_CREATED" | "RECORD_DELETED";

export interface DomainEventBase {
  type: DomainEventType;
  occurredAt: string;   // ISO date
}

export interface CertificateGeneratedEvent extends DomainEventBase {
  type: "CERTIFICATE_GENERATED";
  certificateId: string;
  certificateNumber: string;
  petId: string;
  ownerId: string;
  recordId: string;
  vetId: string;
  clinicId: string;
  hash: string;
}

export interface RecordCreatedEvent extends DomainEventBase {
  type: "RECORD_CREATED";
  recordId: string;
  petId: string;
  creatorId: string;
  signed: boolean;
}

export interface RecordDeletedEvent extends DomainEventBase {
  type: "RECORD_DELETED";
  recordId: string;
  petId: string;
  deletedBy: string;
}

export type DomainEvent = CertificateGeneratedEvent | RecordCreatedEvent | RecordDeletedEvent;
