import assert from "node:assert/strict";
import test from "node:test";
import { deflateSync } from "node:zlib";
import {
  type ApiError,
  canonicalJson,
  encodeBase45,
  encodeHc1,
  type GenerateCertificateResponse,
  type GetCertificateResponse,
  type GetQrTokenResponse,
  type ListCertificatesResponse,
  parseJsonObject,
  QR_DATA_PREFIX,
  sha256Hex,
  type RecordResponse,
  type VerifyQrTokenResponse,
} from "@vhc/shared";
import { buildServer } from "../server.js";
import {
  admin,
  CLINIC_PASSWORD,
  createHarness,
  foreignVet,
  type Harness,
  NOW,
  owner,
  pet,
  vet,
  VET_PASSWORD,
} from "./fixtures.js";

type App = Awaited<ReturnType<typeof buildServer>>;

async function withServer(run: (app: App, h: Harness) => Promise<void>) {
  const h = await createHarness();
  const app = await buildServer({ database: h.database, eventSink: h.events, now: () => NOW, logger: false });
  try {
    await run(app, h);
  } finally {
    await app.close();
    h.close();
  }
}

async function createSignedRecords(app: App) {
  const rabiesRes = await app.inject({
    method: "POST",
    url: "/records",
    headers: { "x-actor-id": vet.id },
    payload: {
      petId: pet.id,
      type: "VACCINE",
      vaccine: { name: "Rabisin", validityMonths: 12, laboratory: null, batchNumber: "B-12", isRabies: true },
      vetPassword: VET_PASSWORD,
    },
  });
  assert.equal(rabiesRes.statusCode, 201);

  const checkupRes = await app.inject({
    method: "POST",
    url: "/records",
    headers: { "x-actor-id": vet.id },
    payload: { petId: pet.id, type: "ANNUAL_CHECK", description: "All clear", vetPassword: VET_PASSWORD },
  });
  assert.equal(checkupRes.statusCode, 201);

  return rabiesRes.json<RecordResponse>().record;
}

async function issue(app: App, actorId: string = vet.id) {
  return app.inject({
    method: "POST",
    url: "/certificates",
    headers: { "x-actor-id": actorId },
    payload: {
      petId: pet.id,
      certificateNumber: "VHC-2026-0042",
      vetPassword: VET_PASSWORD,
      clinicPassword: CLINIC_PASSWORD,
    },
  });
}

test("records, issuance, lookup, QR export and verification over HTTP", async () => {
  await withServer(async (app) => {
    const rabies = await createSignedRecords(app);
    assert.equal(rabies.signature?.signerId, vet.id);

    const issueRes = await issue(app);
    assert.equal(issueRes.statusCode, 201);
    const issued = issueRes.json<GenerateCertificateResponse>();
    assert.equal(issued.eventWriteStatus, "RECORDED");
    assert.equal(issued.certificate.record.id, rabies.id);
    const certificateId = issued.certificate.id;

    const getRes = await app.inject({
      method: "GET",
      url: `/certificates/${certificateId}`,
      headers: { "x-actor-id": owner.id },
    });
    assert.equal(getRes.statusCode, 200);
    assert.equal(getRes.json<GetCertificateResponse>().certificate.hash, issued.certificate.hash);

    const listRes = await app.inject({
      method: "GET",
      url: `/pets/${pet.id}/certificates`,
      headers: { "x-actor-id": admin.id },
    });
    assert.equal(listRes.statusCode, 200);
    assert.deepEqual(
      listRes.json<ListCertificatesResponse>().certificates.map((certificate) => certificate.certificateNumber),
      ["VHC-2026-0042"],
    );

    const qrRes = await app.inject({
      method: "GET",
      url: `/certificates/${certificateId}/qr`,
      headers: { "x-actor-id": owner.id },
    });
    assert.equal(qrRes.statusCode, 200);
    const { qrData } = qrRes.json<GetQrTokenResponse>();
    assert.ok(qrData.startsWith("HC1:"));

    const verifyRes = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { qrData },
    });
    assert.equal(verifyRes.statusCode, 200);
    assert.deepEqual(verifyRes.json<VerifyQrTokenResponse>(), {
      certificateNumber: "VHC-2026-0042",
      valid: true,
      hashMatches: true,
      vetSignatureValid: true,
      clinicSignatureValid: true,
      known: true,
    });

    const patchRes = await app.inject({
      method: "PATCH",
      url: `/records/${rabies.id}`,
      headers: { "x-actor-id": vet.id },
      payload: { description: "edited" },
    });
    assert.equal(patchRes.statusCode, 409);
    assert.equal(patchRes.json<ApiError>().error, "record_immutable");

    const deleteRes = await app.inject({
      method: "DELETE",
      url: `/records/${rabies.id}`,
      headers: { "x-actor-id": vet.id },
    });
    assert.equal(deleteRes.statusCode, 409);
  });
});

test("a tampered payload fails verification", async () => {
  await withServer(async (app, h) => {
    await createSignedRecords(app);
    const issued = (await issue(app)).json<GenerateCertificateResponse>().certificate;

    const payload = parseJsonObject(issued.payload);
    assert.ok(payload);
    const forged = encodeHc1({
      payload: canonicalJson({ ...payload, certType: "PET_HEALTH_CERT_V2" }),
      hash: issued.hash,
      vetSignature: issued.vetSignature,
      clinicSignature: issued.clinicSignature,
    });

    const res = await app.inject({ method: "POST", url: "/certificates/verify", payload: { qrData: forged } });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json<VerifyQrTokenResponse>(), {
      certificateNumber: "VHC-2026-0042",
      valid: false,
      hashMatches: false,
      vetSignatureValid: false,
      clinicSignatureValid: false,
      known: true,
    });
    assert.equal(h.certificates.listByPet(pet.id).length, 1);
  });
});

test("a token without issuer ids verifies no signature", async () => {
  await withServer(async (app) => {
    await createSignedRecords(app);
    const issued = (await issue(app)).json<GenerateCertificateResponse>().certificate;

    const payload = canonicalJson({ certificateNumber: "VHC-2026-0999", issuer: "clinic-1" });
    const token = encodeHc1({
      payload,
      hash: sha256Hex(payload),
      vetSignature: issued.vetSignature,
      clinicSignature: issued.clinicSignature,
    });

    const res = await app.inject({ method: "POST", url: "/certificates/verify", payload: { qrData: token } });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json<VerifyQrTokenResponse>(), {
      certificateNumber: "VHC-2026-0999",
      valid: false,
      hashMatches: true,
      vetSignatureValid: false,
      clinicSignatureValid: false,
      known: false,
    });
  });
});

test("issuance errors map to status codes", async () => {
  await withServer(async (app) => {
    const noHeader = await app.inject({ method: "POST", url: "/certificates", payload: {} });
    assert.equal(noHeader.statusCode, 401);
    assert.equal(noHeader.json<ApiError>().error, "unauthenticated");

    const badBody = await app.inject({
      method: "POST",
      url: "/certificates",
      headers: { "x-actor-id": vet.id },
      payload: { petId: pet.id, certificateNumber: "VHC-1" },
    });
    assert.equal(badBody.statusCode, 400);
    assert.equal(badBody.json<ApiError>().error, "invalid_request");

    const missingRabies = await issue(app);
    assert.equal(missingRabies.statusCode, 422);
    assert.equal(missingRabies.json<ApiError>().error, "missing_rabies_vaccine");

    await createSignedRecords(app);
    const foreign = await issue(app, foreignVet.id);
    assert.equal(foreign.statusCode, 403);
    assert.equal(foreign.json<ApiError>().error, "access_denied");

    assert.equal((await issue(app)).statusCode, 201);
    const again = await issue(app);
    assert.equal(again.statusCode, 409);
    assert.equal(again.json<ApiError>().error, "certificate_exists_for_record");
  });
});

test("verification rejects tokens that cannot be decoded", async () => {
  await withServer(async (app) => {
    const empty = await app.inject({ method: "POST", url: "/certificates/verify", payload: { qrData: " " } });
    assert.equal(empty.statusCode, 400);

    const garbage = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { qrData: "HC1:not-base45" },
    });
    assert.equal(garbage.statusCode, 422);
    assert.equal(garbage.json<ApiError>().error, "invalid_qr_data");

    // [h'5f', {}, h'a0', []]: the protected header is not decodable CBOR
    const headerBytes = Uint8Array.from([0x84, 0x41, 0x5f, 0xa0, 0x41, 0xa0, 0x80]);
    const brokenHeader = QR_DATA_PREFIX + encodeBase45(deflateSync(headerBytes));
    const broken = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { qrData: brokenHeader },
    });
    assert.equal(broken.statusCode, 422);
    assert.equal(broken.json<ApiError>().error, "invalid_qr_data");

    const oversized = QR_DATA_PREFIX + encodeBase45(deflateSync(new Uint8Array(1024 * 1024)));
    const bomb = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { qrData: oversized },
    });
    assert.equal(bomb.statusCode, 422);
  });
});

test("record endpoints validate input and enforce access", async () => {
  await withServer(async (app) => {
    const noVaccine = await app.inject({
      method: "POST",
      url: "/records",
      headers: { "x-actor-id": vet.id },
      payload: { petId: pet.id, type: "VACCINE" },
    });
    assert.equal(noVaccine.statusCode, 400);

    const draftRes = await app.inject({
      method: "POST",
      url: "/records",
      headers: { "x-actor-id": owner.id },
      payload: { petId: pet.id, type: "OTHER", description: "Ate a sock" },
    });
    assert.equal(draftRes.statusCode, 201);
    const draft = draftRes.json<RecordResponse>().record;

    const foreignRead = await app.inject({
      method: "GET",
      url: `/records/${draft.id}`,
      headers: { "x-actor-id": foreignVet.id },
    });
    assert.equal(foreignRead.statusCode, 403);

    const missing = await app.inject({ method: "GET", url: "/records/rec-404", headers: { "x-actor-id": owner.id } });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json<ApiError>(), { error: "not_found", message: "Record not found with id: rec-404" });

    const listRes = await app.inject({
      method: "GET",
      url: `/pets/${pet.id}/records`,
      headers: { "x-actor-id": vet.id },
    });
    assert.equal(listRes.statusCode, 200);

    const deleted = await app.inject({
      method: "DELETE",
      url: `/records/${draft.id}`,
      headers: { "x-actor-id": owner.id },
    });
    assert.equal(deleted.statusCode, 204);
  });
});

test("serves health and OpenAPI documents", async () => {
  await withServer(async (app) => {
    const health = await app.inject({ method: "GET", url: "/health" });
    assert.deepEqual(health.json(), { ok: true, service: "certificate-service" });

    const res = await app.inject({ method: "GET", url: "/openapi.json" });
    assert.equal(res.statusCode, 200);
    const body = res.json<{ openapi: string; paths: Record<string, unknown> }>();
    assert.equal(body.openapi, "3.0.3");
    assert.equal(typeof body.paths["/certificates"], "object");
    assert.equal(typeof body.paths["/certificates/{certificateId}/qr"], "object");
  });
});
