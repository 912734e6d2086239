import type { SecureVersion } from "node:tls";
import { noopLogger } from "../adapters/noop-logger.js";
import { CertificateError, ConnectError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  ClientCredentials,
  CredentialSource,
  GatewayConnection,
  GatewayDialer,
} from "../interfaces/transport.js";
import { ErrorFrameReader, type ErrorFrameReaderEvents } from "./error-frame-reader.js";

export interface ConnectionManagerOptions {
  host: string;
  port: number;
  dialer: GatewayDialer;
  credentials: CredentialSource;
  ca?: string[];
  minTlsVersion: SecureVersion;
  timeoutMs: number;
  /** Wired into the reader started for every new connection. */
  readerEvents: ErrorFrameReaderEvents;
  logger?: Logger;
}

/**
 * Owns the single cached gateway connection.
 *
 * Not synchronized itself: every method is called under the client's send lock.
 * Opening is lazy, and each successful open starts an {@link ErrorFrameReader}
 * bound to the new connection.
 */
export class ConnectionManager {
  private connection: GatewayConnection | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  get current(): GatewayConnection | null {
    return this.connection;
  }

  /** Return the cached connection, opening one if none is cached. */
  async ensureConnected(): Promise<GatewayConnection> {
    return this.connection ?? this.open();
  }

  /** Drop the cached connection and open a fresh one. */
  async reconnect(): Promise<GatewayConnection> {
    this.discard();
    return this.open();
  }

  /**
   * Clear the cache only if it still holds `connection`. A reader bound to a
   * superseded connection must not evict its replacement.
   */
  invalidate(connection: GatewayConnection): boolean {
    if (this.connection !== connection) return false;
    this.connection = null;
    this.logger.info("Gateway connection invalidated", { connection: connection.id });
    return true;
  }

  /** Close and forget the cached connection, if any. */
  discard(): void {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    connection.close();
    this.logger.debug?.("Gateway connection discarded", { connection: connection.id });
  }

  private async open(): Promise<GatewayConnection> {
    const { host, port, dialer, credentials, ca, minTlsVersion, timeoutMs } = this.options;
    const gateway = `${host}:${port}`;

    let keyMaterial: ClientCredentials;
    try {
      keyMaterial = await credentials.load();
    } catch (err) {
      this.logger.error("Failed to load client certificate", { gateway, error: err });
      if (err instanceof CertificateError) throw err;
      throw new CertificateError(`Failed to load client certificate: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let connection: GatewayConnection;
    try {
      connection = await dialer.dial({
        host,
        port,
        servername: host,
        credentials: keyMaterial,
        ca,
        minVersion: minTlsVersion,
        timeoutMs,
      });
    } catch (err) {
      this.logger.error("Failed to open gateway connection", { gateway, error: err });
      if (err instanceof ConnectError) throw err;
      throw new ConnectError(`Failed to connect to ${gateway}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.connection = connection;
    this.logger.info("Gateway connection opened", { gateway, connection: connection.id });

    const reader = new ErrorFrameReader(connection, this.options.readerEvents, this.logger);
    void reader.run();
    return connection;
  }
}
