import type { DomainEvent } from "@vhc/shared";
import type { Logger } from "../logger.js";
import type { EventSink, EventWriteStatus } from "../ports.js";

export class NoopEventSink implements EventSink {
  async publish(): Promise<EventWriteStatus> {
    return "SKIPPED";
  }
}

/** Posts events to the notification relay; delivery failures are reported, never thrown. */
export class HttpEventSink implements EventSink {
  constructor(
    private readonly baseUrl: string,
    private readonly log: Logger,
    private readonly timeoutMs = 5000,
  ) {}

  async publish(event: DomainEvent): Promise<EventWriteStatus> {
    try {
      const response = await fetch(`${this.baseUrl.replace(/\/$/, "")}/events`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ event }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.log.warn({ type: event.type, statusCode: response.status }, "event sink rejected event");
        return "FAILED";
      }
      return "RECORDED";
    } catch (err) {
      this.log.warn({ type: event.type, err }, "event sink unreachable");
      return "FAILED";
    }
  }
}
