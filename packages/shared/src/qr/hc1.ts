import { deflateSync, inflateSync } from "node:zlib";
import { Encoder } from "cbor-x";
import { decodeBase45, encodeBase45 } from "../crypto/base45.js";
import { canonicalJson, parseJsonObject } from "../crypto/canonicalize.js";
import { isSha256Hex } from "../crypto/hash.js";
import type { Certificate } from "../types/certificate.js";

export const QR_DATA_PREFIX = "HC1:";

// COSE header labels and algorithm id
const COSE_ALG = 1;
const COSE_KID = 4;
const COSE_ALG_EDDSA = -8;
const HASH_LABEL = "hash";

// Inflated CBOR above this size is rejected; real certificates are a few KiB.
export const MAX_DECODED_BYTES = 64 * 1024;

const cbor = new Encoder({ useRecords: false, mapsAsObjects: true });

export type QrCertificateFields = Pick<
  Certificate,
  "payload" | "hash" | "vetSignature" | "clinicSignature"
>;

export interface DecodedQrCertificate {
  payload: Record<string, unknown>;
  payloadJson: string;
  hash: string;
  vetSignature: string;
  clinicSignature: string;
}

export class QrCodecError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QrCodecError";
  }
}

function isBase64(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && /^[A-Za-z0-9+/]+={0,2}$/.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value) && !(value instanceof Uint8Array);
}

// Decoders may surface CBOR maps either as Map or as plain objects.
function headerValue(header: unknown, label: number | string): unknown {
  if (header instanceof Map) return header.get(label);
  if (isRecord(header)) return header[String(label)];
  return undefined;
}

function signatureEntry(signature: string, kid: string): unknown[] {
  return [
    Buffer.from(cbor.encode(new Map([[COSE_ALG, COSE_ALG_EDDSA]]))),
    new Map<number, unknown>([[COSE_KID, Buffer.from(kid, "utf8")]]),
    Buffer.from(signature, "base64"),
  ];
}

/**
 * Packs the verifiable fields as a COSE_Sign shaped CBOR array, deflates it
 * and encodes it as Base45 behind the HC1 prefix.
 */
export function encodeHc1(certificate: QrCertificateFields): string {
  if (!isSha256Hex(certificate.hash)) {
    throw new QrCodecError("certificate hash is missing or not a SHA-256 hex digest");
  }
  if (!isBase64(certificate.vetSignature) || !isBase64(certificate.clinicSignature)) {
    throw new QrCodecError("certificate signatures are missing or not base64");
  }
  let payload: Record<string, unknown> | null;
  try {
    payload = certificate.payload ? parseJsonObject(certificate.payload) : null;
  } catch (err) {
    throw new QrCodecError("certificate payload is not valid JSON", { cause: err });
  }
  if (!payload) {
    throw new QrCodecError("certificate payload is missing or not a JSON object");
  }

  const coseSign = [
    Buffer.from(cbor.encode(new Map([[COSE_ALG, COSE_ALG_EDDSA]]))),
    new Map<string, unknown>([[HASH_LABEL, certificate.hash]]),
    Buffer.from(cbor.encode(payload)),
    [
      signatureEntry(certificate.vetSignature, "vet"),
      signatureEntry(certificate.clinicSignature, "clinic"),
    ],
  ];

  try {
    const compressed = deflateSync(cbor.encode(coseSign));
    return QR_DATA_PREFIX + encodeBase45(compressed);
  } catch (err) {
    throw new QrCodecError("certificate could not be encoded", { cause: err });
  }
}

function readSignature(entry: unknown, expectedKid: string): string {
  if (!Array.isArray(entry) || entry.length !== 3) {
    throw new QrCodecError("malformed COSE signature entry");
  }
  const kid = headerValue(entry[1], COSE_KID);
  const kidText = kid instanceof Uint8Array ? Buffer.from(kid).toString("utf8") : kid;
  if (kidText !== expectedKid) {
    throw new QrCodecError(`expected '${expectedKid}' signature, found '${String(kidText)}'`);
  }
  const signature: unknown = entry[2];
  if (!(signature instanceof Uint8Array) || signature.length === 0) {
    throw new QrCodecError("COSE signature is not a byte string");
  }
  return Buffer.from(signature).toString("base64");
}

function decodeCoseSign(encoded: string): DecodedQrCertificate {
  const compressed = decodeBase45(encoded);
  const coseSign: unknown = cbor.decode(inflateSync(compressed, { maxOutputLength: MAX_DECODED_BYTES }));

  if (!Array.isArray(coseSign) || coseSign.length !== 4) {
    throw new QrCodecError("QR data is not a COSE_Sign structure");
  }
  const [protectedHeader, unprotectedHeader, payloadBytes, signatures]: unknown[] = coseSign;
  if (!(protectedHeader instanceof Uint8Array) || !(payloadBytes instanceof Uint8Array)) {
    throw new QrCodecError("COSE header or payload is not a byte string");
  }
  if (headerValue(cbor.decode(protectedHeader), COSE_ALG) !== COSE_ALG_EDDSA) {
    throw new QrCodecError("unsupported COSE algorithm");
  }
  const hash = headerValue(unprotectedHeader, HASH_LABEL);
  if (!isSha256Hex(hash)) {
    throw new QrCodecError("QR data carries no SHA-256 hash");
  }
  if (!Array.isArray(signatures) || signatures.length !== 2) {
    throw new QrCodecError("QR data must carry exactly two signatures");
  }

  const payload: unknown = cbor.decode(payloadBytes);
  if (!isRecord(payload)) {
    throw new QrCodecError("QR payload is not a map");
  }

  return {
    payload,
    payloadJson: canonicalJson(payload),
    hash,
    vetSignature: readSignature(signatures[0], "vet"),
    clinicSignature: readSignature(signatures[1], "clinic"),
  };
}

export function decodeHc1(qrData: string): DecodedQrCertificate {
  if (!qrData.startsWith(QR_DATA_PREFIX)) {
    throw new QrCodecError(`QR data must start with '${QR_DATA_PREFIX}'`);
  }
  try {
    return decodeCoseSign(qrData.slice(QR_DATA_PREFIX.length));
  } catch (err) {
    if (err instanceof QrCodecError) throw err;
    throw new QrCodecError("QR data could not be decoded", { cause: err });
  }
}
