import assert from "node:assert/strict";
import test from "node:test";
import { deflateSync } from "node:zlib";
import { Encoder } from "cbor-x";
import { encodeBase45 } from "../crypto/base45.js";
import { canonicalJson } from "../crypto/canonicalize.js";
import { randomPrivateKey, signDigest } from "../crypto/ed25519.js";
import { sha256Hex } from "../crypto/hash.js";
import { decodeHc1, encodeHc1, MAX_DECODED_BYTES, QR_DATA_PREFIX, QrCodecError } from "../qr/hc1.js";

async function signedFields() {
  const payload = canonicalJson({
    certType: "PET_HEALTH_CERT_V1",
    certificateNumber: "VHC-0001",
    issuer: { vetId: "vet-1", clinicId: "clinic-1" },
    subject: { petId: "pet-1", microchip: null },
    vaccination: { validityMonths: 36 },
  });
  const hash = sha256Hex(payload);
  return {
    payload,
    hash,
    vetSignature: await signDigest(hash, randomPrivateKey()),
    clinicSignature: await signDigest(hash, randomPrivateKey()),
  };
}

test("HC1 token round-trips payload, hash and both signatures", async () => {
  const fields = await signedFields();
  const token = encodeHc1(fields);

  assert.ok(token.startsWith(QR_DATA_PREFIX));
  assert.match(token.slice(QR_DATA_PREFIX.length), /^[0-9A-Z $%*+\-./:]+$/);

  const decoded = decodeHc1(token);
  assert.equal(decoded.payloadJson, fields.payload);
  assert.equal(sha256Hex(decoded.payloadJson), decoded.hash);
  assert.equal(decoded.hash, fields.hash);
  assert.equal(decoded.vetSignature, fields.vetSignature);
  assert.equal(decoded.clinicSignature, fields.clinicSignature);
  assert.equal(decoded.payload.certificateNumber, "VHC-0001");
});

test("a payload swapped under the original hash no longer hashes to it", async () => {
  const fields = await signedFields();
  const forged = encodeHc1({
    ...fields,
    payload: canonicalJson({ certificateNumber: "VHC-9999", issuer: { vetId: "vet-1", clinicId: "clinic-1" } }),
  });

  const decoded = decodeHc1(forged);
  assert.equal(decoded.hash, fields.hash);
  assert.notEqual(sha256Hex(decoded.payloadJson), decoded.hash);
});

test("encoding refuses missing or malformed fields", async () => {
  const fields = await signedFields();
  assert.throws(() => encodeHc1({ ...fields, payload: "" }), QrCodecError);
  assert.throws(() => encodeHc1({ ...fields, payload: "[1,2]" }), /not a JSON object/);
  assert.throws(() => encodeHc1({ ...fields, payload: "{oops" }), /not valid JSON/);
  assert.throws(() => encodeHc1({ ...fields, hash: "abc" }), /SHA-256/);
  assert.throws(() => encodeHc1({ ...fields, vetSignature: "" }), /signatures/);
});

test("decoding rejects foreign or corrupt tokens", () => {
  assert.throws(() => decodeHc1("HC2:ABC"), /must start with 'HC1:'/);
  assert.throws(() => decodeHc1("HC1:abc"), /could not be decoded/);
  assert.throws(() => decodeHc1("HC1:BB8"), QrCodecError);
});

const cbor = new Encoder({ useRecords: false, mapsAsObjects: true });

function tokenFromCbor(bytes: Uint8Array): string {
  return QR_DATA_PREFIX + encodeBase45(deflateSync(bytes));
}

function coseSignWithPayload(payloadBytes: Uint8Array): Uint8Array {
  const signature = (kid: string) => [
    Buffer.from(cbor.encode(new Map([[1, -8]]))),
    new Map([[4, Buffer.from(kid, "utf8")]]),
    Buffer.alloc(64, 1),
  ];
  return cbor.encode([
    Buffer.from(cbor.encode(new Map([[1, -8]]))),
    new Map([["hash", sha256Hex("payload")]]),
    Buffer.from(payloadBytes),
    [signature("vet"), signature("clinic")],
  ]);
}

test("a protected header that is not valid CBOR fails as QrCodecError", () => {
  // [h'5f', {}, h'a0', []]: the header byte opens an indefinite byte string
  const token = tokenFromCbor(Uint8Array.from([0x84, 0x41, 0x5f, 0xa0, 0x41, 0xa0, 0x80]));
  assert.throws(
    () => decodeHc1(token),
    (err: unknown) => err instanceof QrCodecError && err.message === "QR data could not be decoded",
  );
});

test("a payload with values JSON cannot carry fails as QrCodecError", () => {
  const token = tokenFromCbor(coseSignWithPayload(cbor.encode({ amount: 2n ** 70n })));
  assert.throws(
    () => decodeHc1(token),
    (err: unknown) => err instanceof QrCodecError && err.cause instanceof Error,
  );
});

test("tokens inflating beyond the size bound are rejected", () => {
  const token = tokenFromCbor(new Uint8Array(MAX_DECODED_BYTES * 4));
  assert.ok(token.length < 2000);
  assert.throws(() => decodeHc1(token), /could not be decoded/);
});
