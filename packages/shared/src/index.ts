export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./crypto/ed25519.js";
export * from "./crypto/base45.js";
export * from "./crypto/key-envelope.js";
export * from "./qr/hc1.js";
export * from "./auth/actor-header.js";
export * from "./types/actors.js";
export * from "./types/records.js";
export * from "./types/certificate.js";
export * from "./types/events.js";
export * from "./types/api.js";
