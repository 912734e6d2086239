/**
 * Single-shot listener for the gateway's error frame.
 *
 * The gateway sends at most one error frame per connection and then stops processing
 * it, so each connection gets exactly one reader that performs exactly one read:
 *
 *   waiting ──frame parsed───────► done (report, close, invalidate)
 *           ──unknown cmd/status─► done (log, close, invalidate)
 *           ──read failed/closed─► done (close, invalidate)
 *
 * The reader never touches client state directly. It asks for invalidation and hands
 * reports over through {@link ErrorFrameReaderEvents}; both are expected to return
 * without blocking.
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { toPushError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { GatewayConnection } from "../interfaces/transport.js";
import { ERROR_FRAME_LENGTH, parseErrorFrame } from "../protocol/error-frame.js";
import type { FailureReport } from "../types/delivery.js";

export type ReaderState = "waiting" | "done";

export type ReaderOutcome =
  | { kind: "reported"; report: FailureReport }
  | { kind: "discarded"; reason: "unknown-command" | "unknown-status" | "short-frame" }
  | { kind: "closed"; error: Error };

export interface ErrorFrameReaderEvents {
  /** A recognized failure frame arrived on `connection`. */
  onReport(report: FailureReport, connection: GatewayConnection): void;
  /** `connection` is finished; drop it if it is still the current one. */
  onStale(connection: GatewayConnection): void;
}

export class ErrorFrameReader {
  private currentState: ReaderState = "waiting";
  private outcome: Promise<ReaderOutcome> | null = null;

  constructor(
    private readonly connection: GatewayConnection,
    private readonly events: ErrorFrameReaderEvents,
    private readonly logger: Logger = noopLogger,
  ) {}

  get state(): ReaderState {
    return this.currentState;
  }

  /** Start the read. Repeated calls return the same outcome; the promise never rejects. */
  run(): Promise<ReaderOutcome> {
    this.outcome ??= this.readOnce();
    return this.outcome;
  }

  private async readOnce(): Promise<ReaderOutcome> {
    const connection = this.connection.id;
    let frame: Buffer;
    try {
      frame = await this.connection.readFrame(ERROR_FRAME_LENGTH);
    } catch (err) {
      const error = toPushError(err);
      this.logger.debug?.("Gateway connection ended without an error frame", { connection, error });
      this.finish();
      return { kind: "closed", error };
    }

    const parsed = parseErrorFrame(frame);
    this.finish();

    switch (parsed.kind) {
      case "ok":
        this.logger.info("Gateway reported a failed notification", {
          connection,
          sequence: parsed.report.sequence,
          status: parsed.report.status,
          reason: parsed.reason,
        });
        this.events.onReport(parsed.report, this.connection);
        return { kind: "reported", report: parsed.report };
      case "unknown-command":
        this.logger.warn("Discarding frame with unknown command", {
          connection,
          frame: frame.toString("hex"),
        });
        return { kind: "discarded", reason: parsed.kind };
      case "unknown-status":
        this.logger.warn("Discarding frame with unknown status", {
          connection,
          frame: frame.toString("hex"),
        });
        return { kind: "discarded", reason: parsed.kind };
      case "short-frame":
        this.logger.warn("Discarding truncated frame", { connection, length: parsed.length });
        return { kind: "discarded", reason: parsed.kind };
    }
  }

  private finish(): void {
    this.currentState = "done";
    this.connection.close();
    this.events.onStale(this.connection);
  }
}
