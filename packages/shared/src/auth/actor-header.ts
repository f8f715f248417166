export const ACTOR_ID_HEADER = "x-actor-id";

/**
 * Identity of the caller as asserted by the upstream gateway. Token
 * verification happens before requests reach the service.
 */
export function parseActorHeader(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    if (typeof first !== "string") return null;
    const trimmed = first.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}
