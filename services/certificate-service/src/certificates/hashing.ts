import { canonicalJson, HASH_ALGORITHM, sha256Hex } from "@vhc/shared";
import { HashingError } from "../errors.js";

export interface HashedPayload {
  payloadJson: string;
  hash: string;
}

/**
 * SHA-256 over the RFC 8785 canonical JSON of a payload, lowercase hex.
 * Verifiers recompute the digest from the stored payload string alone.
 */
export class HashingService {
  readonly algorithm = HASH_ALGORITHM;

  serialize(payload: unknown): string {
    let json: string | undefined;
    try {
      json = canonicalJson(payload);
    } catch (err) {
      throw new HashingError("Failed to serialize payload for hashing", { cause: err });
    }
    if (typeof json !== "string" || json.length === 0) {
      throw new HashingError("Payload serialized to an empty document");
    }
    return json;
  }

  hash(payloadJson: string): string {
    try {
      return sha256Hex(payloadJson);
    } catch (err) {
      throw new HashingError(`Failed to compute ${this.algorithm} digest`, { cause: err });
    }
  }

  hashPayload(payload: unknown): HashedPayload {
    const payloadJson = this.serialize(payload);
    return { payloadJson, hash: this.hash(payloadJson) };
  }
}
