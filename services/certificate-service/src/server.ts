import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import {
  ACTOR_ID_HEADER,
  type CreateRecordRequest,
  type GenerateCertificateRequest,
  type GenerateCertificateResponse,
  type GetCertificateResponse,
  type GetQrTokenResponse,
  isRecordType,
  type ListCertificatesResponse,
  type ListRecordsResponse,
  parseActorHeader,
  type RecordResponse,
  type UpdateRecordRequest,
  type VaccineDetails,
  type VerifyQrTokenRequest,
} from "@vhc/shared";
import { PetAccessGate } from "./auth/pet-access.js";
import { CertificateIssuer } from "./certificates/certificate-issuer.js";
import { CertificateService } from "./certificates/certificate-service.js";
import { EligibilityValidator } from "./certificates/eligibility.js";
import { HashingService } from "./certificates/hashing.js";
import { SigningService } from "./certificates/signing.js";
import { DomainError, EncodingError } from "./errors.js";
import { HttpEventSink, NoopEventSink } from "./events/event-sink.js";
import { buildOpenApiSpec } from "./openapi.js";
import type { EventSink } from "./ports.js";
import { RecordService } from "./records/record-service.js";
import { SqliteCertificateStore } from "./storage/certificate-store.js";
import { SqliteDatabase } from "./storage/database.js";
import { SqliteDirectoryStore } from "./storage/directory-store.js";
import { SqliteKeyStore } from "./storage/key-store.js";
import { SqliteRecordStore } from "./storage/record-store.js";

const DEFAULT_DB_PATH = "data/certificate-service.db";

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function parseGenerateRequest(body: unknown): GenerateCertificateRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.petId)) return null;
  if (!isNonEmptyString(body.certificateNumber)) return null;
  if (!isNonEmptyString(body.vetPassword)) return null;
  if (!isNonEmptyString(body.clinicPassword)) return null;
  return {
    petId: body.petId,
    certificateNumber: body.certificateNumber.trim(),
    vetPassword: body.vetPassword,
    clinicPassword: body.clinicPassword,
  };
}

function parseVaccine(value: unknown): VaccineDetails | null {
  if (!isObject(value)) return null;
  if (!isNonEmptyString(value.name)) return null;
  if (!isNonEmptyString(value.batchNumber)) return null;
  if (typeof value.validityMonths !== "number" || !Number.isInteger(value.validityMonths)) return null;
  if (value.validityMonths <= 0) return null;
  let laboratory: string | null = null;
  if (typeof value.laboratory === "string") {
    laboratory = value.laboratory;
  } else if (value.laboratory !== undefined && value.laboratory !== null) {
    return null;
  }
  if (typeof value.isRabies !== "boolean") return null;
  return {
    name: value.name,
    validityMonths: value.validityMonths,
    laboratory,
    batchNumber: value.batchNumber,
    isRabies: value.isRabies,
  };
}

function parseCreateRecordRequest(body: unknown): CreateRecordRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.petId)) return null;
  if (!isRecordType(body.type)) return null;
  if (!isOptionalString(body.description)) return null;
  let vetPassword: string | undefined;
  if (body.vetPassword !== undefined) {
    if (!isNonEmptyString(body.vetPassword)) return null;
    vetPassword = body.vetPassword;
  }
  let vaccine: VaccineDetails | undefined;
  if (body.vaccine !== undefined) {
    const parsed = parseVaccine(body.vaccine);
    if (!parsed) return null;
    vaccine = parsed;
  }
  if ((body.type === "VACCINE") !== (vaccine !== undefined)) return null;
  return {
    petId: body.petId,
    type: body.type,
    description: body.description,
    vaccine,
    vetPassword,
  };
}

function parseUpdateRecordRequest(body: unknown): UpdateRecordRequest | null {
  if (!isObject(body)) return null;
  if (body.type !== undefined && !isRecordType(body.type)) return null;
  if (!isOptionalString(body.description)) return null;
  return { type: body.type, description: body.description };
}

function parseVerifyRequest(body: unknown): VerifyQrTokenRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.qrData)) return null;
  return { qrData: body.qrData.trim() };
}

export interface BuildServerOptions {
  database?: SqliteDatabase;
  dbPath?: string;
  eventSink?: EventSink;
  eventSinkUrl?: string;
  serviceBaseUrl?: string;
  logger?: boolean | { level: string };
  now?: () => Date;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? { level: process.env.LOG_LEVEL || "info" },
  });
  const database =
    options.database ||
    new SqliteDatabase(options.dbPath || process.env.CERT_DB_PATH || DEFAULT_DB_PATH);
  const ownDatabase = !options.database;
  const eventSinkUrl = options.eventSinkUrl ?? process.env.EVENT_SINK_URL;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4101}`;

  const log = app.log;
  const directory = new SqliteDirectoryStore(database);
  const records = new SqliteRecordStore(database);
  const certificates = new SqliteCertificateStore(database);
  const keys = new SqliteKeyStore(database);
  const events =
    options.eventSink || (eventSinkUrl ? new HttpEventSink(eventSinkUrl, log) : new NoopEventSink());
  const authorization = new PetAccessGate(directory, log);
  const hashing = new HashingService();
  const signing = new SigningService(keys, log);

  const issuer = new CertificateIssuer({
    unitOfWork: database,
    records,
    certificates,
    pets: directory,
    staff: directory,
    authorization,
    eligibility: new EligibilityValidator(records, log),
    hashing,
    signing,
    events,
    log,
    now: options.now,
  });
  const certificateService = new CertificateService({
    certificates,
    pets: directory,
    staff: directory,
    authorization,
    hashing,
    signing,
    log,
  });
  const recordService = new RecordService({
    records,
    pets: directory,
    staff: directory,
    authorization,
    hashing,
    signing,
    events,
    log,
    now: options.now,
  });

  function requireActor(req: FastifyRequest, reply: FastifyReply): string | null {
    const actorId = parseActorHeader(req.headers[ACTOR_ID_HEADER]);
    if (actorId) return actorId;
    reply.code(401).send({
      error: "unauthenticated",
      message: `Missing or empty '${ACTOR_ID_HEADER}' header`,
    });
    return null;
  }

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof DomainError) {
      if (err.statusCode >= 500) {
        req.log.error({ err }, "request failed");
      }
      return reply.code(err.statusCode).send({ error: err.code, message: err.message });
    }
    if (typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: "invalid_request", message: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ error: "internal_error" });
  });

  app.get("/health", async () => ({ ok: true, service: "certificate-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.post("/certificates", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;

    const parsed = parseGenerateRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected petId, certificateNumber, vetPassword and clinicPassword",
      });
    }

    const issued = await issuer.generateCertificate(actorId, parsed);
    const response: GenerateCertificateResponse = issued;
    return reply.code(201).send(response);
  });

  app.post("/certificates/verify", async (req, reply) => {
    const parsed = parseVerifyRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({ error: "invalid_request", message: "Expected qrData" });
    }
    try {
      return await certificateService.verifyQrToken(parsed.qrData);
    } catch (err) {
      if (err instanceof EncodingError) {
        return reply.code(422).send({ error: "invalid_qr_data", message: err.message });
      }
      throw err;
    }
  });

  app.get<{ Params: { petId: string } }>("/pets/:petId/certificates", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;
    const response: ListCertificatesResponse = {
      certificates: certificateService.listCertificates(req.params.petId, actorId),
    };
    return response;
  });

  app.get<{ Params: { certificateId: string } }>("/certificates/:certificateId", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;
    const response: GetCertificateResponse = {
      certificate: certificateService.getCertificate(req.params.certificateId, actorId),
    };
    return response;
  });

  app.get<{ Params: { certificateId: string } }>("/certificates/:certificateId/qr", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;
    const response: GetQrTokenResponse = {
      certificateId: req.params.certificateId,
      qrData: certificateService.getQrToken(req.params.certificateId, actorId),
    };
    return response;
  });

  app.post("/records", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;

    const parsed = parseCreateRecordRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message:
          "Expected petId, type, optional description and vetPassword; vaccine details exactly when type is VACCINE",
      });
    }

    const response: RecordResponse = { record: await recordService.createRecord(actorId, parsed) };
    return reply.code(201).send(response);
  });

  app.get<{ Params: { petId: string } }>("/pets/:petId/records", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;
    const response: ListRecordsResponse = {
      records: recordService.listRecords(req.params.petId, actorId),
    };
    return response;
  });

  app.get<{ Params: { recordId: string } }>("/records/:recordId", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;
    const response: RecordResponse = { record: recordService.getRecord(req.params.recordId, actorId) };
    return response;
  });

  app.patch<{ Params: { recordId: string } }>("/records/:recordId", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;

    const parsed = parseUpdateRecordRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected optional type and description",
      });
    }

    const response: RecordResponse = {
      record: recordService.updateRecord(req.params.recordId, parsed, actorId),
    };
    return response;
  });

  app.delete<{ Params: { recordId: string } }>("/records/:recordId", async (req, reply) => {
    const actorId = requireActor(req, reply);
    if (!actorId) return;
    await recordService.deleteRecord(req.params.recordId, actorId);
    return reply.code(204).send();
  });

  app.addHook("onClose", async () => {
    if (ownDatabase) {
      database.close();
    }
  });

  return app;
}
