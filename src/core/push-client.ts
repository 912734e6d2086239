/**
 * PushClient: delivery orchestrator for the legacy binary push protocol.
 *
 * The gateway never acknowledges a notification; it only reports, asynchronously,
 * the sequence number of the first one it rejected before it stops reading the
 * connection. The client therefore:
 *
 * - assigns a sequence number to every send and writes it under one lock,
 * - records each written notification in a bounded {@link ReplayQueue},
 * - on a failure report, hands the rejected notification to the failure sink and
 *   resubmits everything written after it. Notifications written before it are
 *   taken as delivered and forgotten.
 *
 * Error frames reach the client through a bounded internal queue drained by one
 * consumer task, so socket reads never wait on the send lock.
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { CertificateStore, certificateSourceFrom } from "../adapters/certificate-store.js";
import { TlsDialer } from "../adapters/tls-dialer.js";
import { errorMessage, NotRunningError, SerializationError, toPushError } from "../errors.js";
import type { FailureSink } from "../interfaces/failure-sink.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  CredentialSource,
  GatewayConnection,
  GatewayDialer,
} from "../interfaces/transport.js";
import { encodeNotification } from "../protocol/notification-encoder.js";
import { STATUS_NO_ERROR } from "../protocol/status-codes.js";
import { type PushClientConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import type {
  DeliveryFailure,
  FailureReport,
  NotificationEncoder,
  PushNotification,
} from "../types/delivery.js";
import { AsyncLock } from "./async-lock.js";
import { AsyncMessageQueue } from "./async-message-queue.js";
import { ConnectionManager } from "./connection-manager.js";
import { ReplayQueue } from "./replay-queue.js";
import { SequenceCounter } from "./sequence-counter.js";

export interface PushClientOptions {
  config: PushClientConfig;
  /** Receives notifications the client gave up on. Dropped (debug-logged) when absent. */
  onFailure?: FailureSink;
  /** Defaults to the enhanced binary format. */
  encoder?: NotificationEncoder;
  /** Defaults to {@link TlsDialer}. */
  dialer?: GatewayDialer;
  /** Defaults to a {@link CertificateStore} built from `config.certificate`. */
  credentials?: CredentialSource;
  logger?: Logger;
}

/** Options accepted by the factory helpers, where gateway and certificate are positional. */
export type PushClientFactoryOptions = Omit<PushClientOptions, "config"> & {
  config?: Omit<PushClientConfig, "gateway" | "certificate">;
};

export class PushClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly onFailure: FailureSink;
  private readonly encode: NotificationEncoder;
  private readonly lock = new AsyncLock();
  private readonly sequence: SequenceCounter;
  private readonly replayQueue: ReplayQueue<PushNotification>;
  private readonly connections: ConnectionManager;
  private readonly reports: AsyncMessageQueue<FailureReport>;
  private readonly reportConsumer: Promise<void>;
  private isRunning = true;

  constructor(options: PushClientOptions) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? noopLogger;
    this.encode = options.encoder ?? encodeNotification;
    this.onFailure =
      options.onFailure ??
      ((failure) => {
        this.logger.debug?.("Delivery failure dropped, no sink configured", {
          sequence: failure.notification.sequence,
        });
      });

    this.sequence = new SequenceCounter(this.config.sequenceBound);
    this.replayQueue = new ReplayQueue<PushNotification>(this.config.replayQueueCapacity);
    this.reports = new AsyncMessageQueue<FailureReport>(this.config.failureChannelCapacity);
    this.connections = new ConnectionManager({
      host: this.config.host,
      port: this.config.port,
      dialer: options.dialer ?? new TlsDialer(),
      credentials:
        options.credentials ?? new CertificateStore(certificateSourceFrom(this.config.certificate)),
      ca: this.config.ca,
      minTlsVersion: this.config.minTlsVersion,
      timeoutMs: this.config.timeoutMs,
      logger: this.logger,
      readerEvents: {
        onReport: (report) => this.enqueueReport(report),
        onStale: (connection) => this.requestInvalidation(connection),
      },
    });

    this.reportConsumer = this.consumeReports();
  }

  /** Client authenticating with certificate and key files. */
  static fromCertificateFiles(
    gateway: string,
    certFile: string,
    keyFile: string,
    options: PushClientFactoryOptions = {},
  ): PushClient {
    const { config, ...rest } = options;
    return new PushClient({ ...rest, config: { ...config, gateway, certificate: { certFile, keyFile } } });
  }

  /** Client authenticating with PEM blocks held in memory. */
  static fromCertificateBlocks(
    gateway: string,
    cert: string,
    key: string,
    options: PushClientFactoryOptions = {},
  ): PushClient {
    const { config, ...rest } = options;
    return new PushClient({ ...rest, config: { ...config, gateway, certificate: { cert, key } } });
  }

  get running(): boolean {
    return this.isRunning;
  }

  get connected(): boolean {
    return this.connections.current !== null;
  }

  /** Notifications written whose fate is still unknown. */
  get inFlight(): number {
    return this.replayQueue.size;
  }

  /** Open the gateway connection ahead of the first send. No-op when already connected. */
  async connect(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.assertRunning();
      await this.connections.ensureConnected();
    });
  }

  /**
   * Assign the next sequence number to `notification` and write it to the gateway.
   *
   * A failed write is retried once on a fresh connection. If the notification still
   * cannot be written, the connection is dropped, the sink receives a failure without
   * a report, and the error is rethrown. Resolving means "written", not "delivered".
   */
  send(notification: PushNotification): Promise<void> {
    return this.lock.runExclusive(() => this.sendLocked(notification));
  }

  /**
   * Handle a gateway failure report as if it had arrived on the connection. Runs under
   * the send lock; returns once the replay queue has been drained and resends issued.
   */
  reportFailure(report: FailureReport): Promise<void> {
    return this.lock.runExclusive(() => this.handleReport(report));
  }

  /** Stop accepting sends, drop the connection and stop processing failure reports. */
  async close(): Promise<void> {
    const wasRunning = await this.lock.runExclusive(() => {
      if (!this.isRunning) return false;
      this.isRunning = false;
      this.connections.discard();
      return true;
    });
    if (!wasRunning) return;

    this.reports.finish();
    await this.reportConsumer;
    this.logger.info("Push client closed", { gateway: this.config.gateway });
  }

  private async sendLocked(notification: PushNotification): Promise<void> {
    this.assertRunning();

    const sequence = this.sequence.next();
    notification.sequence = sequence;

    let payload: Uint8Array;
    try {
      payload = this.encode(notification);
    } catch (err) {
      if (err instanceof SerializationError) throw err;
      throw new SerializationError(`Failed to encode notification: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      await this.writeWithRetry(payload, sequence);
    } catch (err) {
      this.connections.discard();
      this.emitFailure({ notification, report: null });
      throw toPushError(err);
    }
    this.replayQueue.append(notification);
  }

  private async writeWithRetry(payload: Uint8Array, sequence: number): Promise<void> {
    const connection = await this.connections.ensureConnected();
    try {
      await connection.write(payload, this.config.timeoutMs);
    } catch (err) {
      this.logger.warn("Write failed, retrying on a new connection", {
        connection: connection.id,
        sequence,
        error: err,
      });
      const fresh = await this.connections.reconnect();
      await fresh.write(payload, this.config.timeoutMs);
    }
  }

  private handleReport(report: FailureReport): void {
    if (!this.isRunning) return;
    if (report.status === STATUS_NO_ERROR) return;

    const drained = this.replayQueue.drainFrom(report.sequence);
    if (!drained) {
      this.logger.warn("Replay queue too small to locate failed notification", {
        capacity: this.replayQueue.capacity,
        sequence: report.sequence,
      });
      return;
    }

    this.emitFailure({ notification: drained.matched, report });

    if (drained.following.length > 0) {
      this.logger.info("Resending notifications written after the failed one", {
        sequence: report.sequence,
        count: drained.following.length,
      });
    }
    // Each resend queues on the lock behind this task, in original send order.
    for (const notification of drained.following) {
      const previous = notification.sequence;
      void this.send(notification).catch((err: unknown) => {
        this.logger.warn("Resend failed", { previousSequence: previous, error: err });
      });
    }
  }

  private enqueueReport(report: FailureReport): void {
    if (!this.isRunning) return;
    if (!this.reports.enqueue(report)) {
      this.logger.warn("Failure report dropped, report queue is full", {
        sequence: report.sequence,
        capacity: this.config.failureChannelCapacity,
      });
    }
  }

  private requestInvalidation(connection: GatewayConnection): void {
    void this.lock.runExclusive(() => {
      if (this.isRunning) this.connections.invalidate(connection);
    });
  }

  private async consumeReports(): Promise<void> {
    for await (const report of this.reports) {
      try {
        await this.reportFailure(report);
      } catch (err) {
        this.logger.error("Failed to process failure report", {
          sequence: report.sequence,
          error: err,
        });
      }
    }
  }

  private emitFailure(failure: DeliveryFailure): void {
    queueMicrotask(() => {
      try {
        this.onFailure(failure);
      } catch (err) {
        this.logger.error("Failure sink threw", {
          sequence: failure.notification.sequence,
          error: err,
        });
      }
    });
  }

  private assertRunning(): void {
    if (!this.isRunning) throw new NotRunningError();
  }
}
