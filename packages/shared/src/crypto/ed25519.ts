import * as ed from "@noble/ed25519";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export const SIGNATURE_ALGORITHM = "Ed25519";

export function randomPrivateKey(): Uint8Array {
  return ed.utils.randomPrivateKey();
}

export async function publicKeyHexFromPrivateKey(privateKey: Uint8Array): Promise<string> {
  return bytesToHex(await ed.getPublicKeyAsync(privateKey));
}

/**
 * Detached signature over the digest bytes (the hex is decoded first),
 * not over the payload the digest was computed from.
 */
export async function signDigest(hashHex: string, privateKey: Uint8Array): Promise<string> {
  const sig = await ed.signAsync(hexToBytes(hashHex), privateKey);
  return Buffer.from(sig).toString("base64");
}

export async function verifyDigest(
  hashHex: string,
  signatureBase64: string,
  publicKeyHex: string,
): Promise<boolean> {
  const sig = new Uint8Array(Buffer.from(signatureBase64, "base64"));
  return ed.verifyAsync(sig, hexToBytes(hashHex), hexToBytes(publicKeyHex));
}
