import { xchacha20poly1305 } from "@noble/ciphers/chacha";
import { scrypt } from "@noble/hashes/scrypt";
import { randomBytes, utf8ToBytes } from "@noble/hashes/utils";
import { publicKeyHexFromPrivateKey, randomPrivateKey } from "./ed25519.js";

// Envelope layout: v1.<log2 N>.<salt b64>.<nonce b64>.<ciphertext+tag b64>
const ENVELOPE_VERSION = "v1";
const SALT_LENGTH = 16;
const NONCE_LENGTH = 24;
const KEY_LENGTH = 32;
export const DEFAULT_SCRYPT_LOG_N = 15;

export interface SealOptions {
  scryptLogN?: number;
}

export interface SealedKeyPair {
  publicKeyHex: string;
  sealedPrivateKey: string;
}

export class KeyEnvelopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KeyEnvelopeError";
  }
}

function deriveKey(password: string, salt: Uint8Array, logN: number): Uint8Array {
  return scrypt(utf8ToBytes(password), salt, { N: 2 ** logN, r: 8, p: 1, dkLen: KEY_LENGTH });
}

function toB64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

function fromB64(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, "base64"));
}

export function sealPrivateKey(
  privateKey: Uint8Array,
  password: string,
  options: SealOptions = {},
): string {
  if (password.length === 0) {
    throw new KeyEnvelopeError("password is required to seal a private key");
  }
  const logN = options.scryptLogN ?? DEFAULT_SCRYPT_LOG_N;
  const salt = randomBytes(SALT_LENGTH);
  const nonce = randomBytes(NONCE_LENGTH);
  const key = deriveKey(password, salt, logN);
  try {
    const sealed = xchacha20poly1305(key, nonce).encrypt(privateKey);
    return [ENVELOPE_VERSION, String(logN), toB64(salt), toB64(nonce), toB64(sealed)].join(".");
  } finally {
    key.fill(0);
  }
}

/**
 * Returns a fresh buffer holding the private key. The caller owns it and must
 * zero it once done; see `withOpenedKey`.
 */
export function openPrivateKey(envelope: string, password: string): Uint8Array {
  const parts = envelope.split(".");
  if (parts.length !== 5 || parts[0] !== ENVELOPE_VERSION) {
    throw new KeyEnvelopeError("unsupported key envelope format");
  }
  const logN = Number(parts[1]);
  if (!Number.isInteger(logN) || logN < 1 || logN > 20) {
    throw new KeyEnvelopeError("invalid key envelope cost parameter");
  }
  const salt = fromB64(parts[2]);
  const nonce = fromB64(parts[3]);
  if (salt.length !== SALT_LENGTH || nonce.length !== NONCE_LENGTH) {
    throw new KeyEnvelopeError("corrupt key envelope");
  }
  const key = deriveKey(password, salt, logN);
  try {
    return xchacha20poly1305(key, nonce).decrypt(fromB64(parts[4]));
  } catch (err) {
    throw new KeyEnvelopeError("private key could not be opened (wrong password or corrupt envelope)", {
      cause: err,
    });
  } finally {
    key.fill(0);
  }
}

export async function withOpenedKey<T>(
  envelope: string,
  password: string,
  use: (privateKey: Uint8Array) => Promise<T>,
): Promise<T> {
  const privateKey = openPrivateKey(envelope, password);
  try {
    return await use(privateKey);
  } finally {
    privateKey.fill(0);
  }
}

export async function generateSealedKeyPair(
  password: string,
  options: SealOptions = {},
): Promise<SealedKeyPair> {
  const privateKey = randomPrivateKey();
  try {
    return {
      publicKeyHex: await publicKeyHexFromPrivateKey(privateKey),
      sealedPrivateKey: sealPrivateKey(privateKey, password, options),
    };
  } finally {
    privateKey.fill(0);
  }
}
