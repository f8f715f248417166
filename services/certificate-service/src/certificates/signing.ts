import { isSha256Hex, signDigest, verifyDigest } from "@vhc/shared";
import { SigningError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { KeyRef, KeyStore } from "../ports.js";

function describe(ref: KeyRef): string {
  return `${ref.ownerType === "VET" ? "Vet" : "Clinic"} ${ref.ownerId}`;
}

export class SigningService {
  constructor(
    private readonly keys: KeyStore,
    private readonly log: Logger,
  ) {}

  /**
   * Signs the digest bytes with the owner's Ed25519 key. The key is opened
   * with `password` for this call only. No retries: any failure is final.
   */
  async sign(ref: KeyRef, password: string, digestHex: string): Promise<string> {
    if (!isSha256Hex(digestHex)) {
      throw new SigningError(`Refusing to sign for ${describe(ref)}: digest is not a SHA-256 hex string`);
    }
    if (password.length === 0) {
      throw new SigningError(`Password for ${describe(ref)} private key is required for signing`);
    }

    let signature: string;
    try {
      signature = await this.keys.withPrivateKey(ref, password, (privateKey) =>
        signDigest(digestHex, privateKey),
      );
    } catch (err) {
      this.log.error(
        { ownerType: ref.ownerType, ownerId: ref.ownerId, reason: err instanceof Error ? err.message : String(err) },
        "signature generation failed",
      );
      throw new SigningError(`Failed to generate ${describe(ref)} digital signature`, { cause: err });
    }
    if (signature.length === 0) {
      throw new SigningError(`Empty signature produced for ${describe(ref)}`);
    }
    this.log.debug({ ownerType: ref.ownerType, ownerId: ref.ownerId }, "digest signed");
    return signature;
  }

  async verify(ref: KeyRef, digestHex: string, signatureBase64: string): Promise<boolean> {
    const publicKeyHex = this.keys.findPublicKeyHex(ref);
    if (!publicKeyHex || !isSha256Hex(digestHex) || signatureBase64.length === 0) {
      return false;
    }
    try {
      return await verifyDigest(digestHex, signatureBase64, publicKeyHex);
    } catch (err) {
      this.log.debug(
        { ownerType: ref.ownerType, ownerId: ref.ownerId, reason: err instanceof Error ? err.message : String(err) },
        "signature verification errored",
      );
      return false;
    }
  }
}
