/**
 * Transport seam between the delivery engine and the gateway socket.
 * The TLS adapter implements it for production; tests substitute an in-process fake.
 * @module
 */

import type { SecureVersion } from "node:tls";

/** PEM-encoded client certificate and private key. */
export interface ClientCredentials {
  cert: string;
  key: string;
}

/** Resolves client key material. Implementations cache after the first success. */
export interface CredentialSource {
  load(): Promise<ClientCredentials>;
}

export interface DialOptions {
  host: string;
  port: number;
  /** Server name pinned during the handshake. */
  servername: string;
  credentials: ClientCredentials;
  /** Extra trusted roots; the platform store is used when absent. */
  ca?: string[];
  minVersion: SecureVersion;
  timeoutMs: number;
}

/**
 * One live encrypted stream to the gateway.
 *
 * The gateway writes at most one error frame per connection, so `readFrame` is
 * single-shot: it resolves with exactly `length` bytes or rejects once the stream
 * closes or errors.
 */
export interface GatewayConnection {
  /** Diagnostic identifier; identity comparisons use the object itself. */
  readonly id: number;
  readonly closed: boolean;
  write(data: Uint8Array, timeoutMs: number): Promise<void>;
  readFrame(length: number): Promise<Buffer>;
  close(): void;
}

export interface GatewayDialer {
  dial(options: DialOptions): Promise<GatewayConnection>;
}
