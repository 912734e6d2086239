/**
 * binpush public API barrel.
 *
 * Re-exports the delivery client, its collaborators, protocol codecs and adapters.
 * @module
 */

// Adapters
export { CertificateStore, certificateSourceFrom } from "./adapters/certificate-store.js";
export type { CertificateSource } from "./adapters/certificate-store.js";
export { FailureChannel } from "./adapters/failure-channel.js";
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { TlsDialer, TlsGatewayConnection } from "./adapters/tls-dialer.js";
// Config
export { pushClientConfigSchema } from "./config/config-schema.js";
// Core
export { AsyncLock } from "./core/async-lock.js";
export { AsyncMessageQueue } from "./core/async-message-queue.js";
export type { ConnectionManagerOptions } from "./core/connection-manager.js";
export { ConnectionManager } from "./core/connection-manager.js";
export type {
  ErrorFrameReaderEvents,
  ReaderOutcome,
  ReaderState,
} from "./core/error-frame-reader.js";
export { ErrorFrameReader } from "./core/error-frame-reader.js";
export type { PushClientFactoryOptions, PushClientOptions } from "./core/push-client.js";
export { PushClient } from "./core/push-client.js";
export type { DrainResult, Sequenced } from "./core/replay-queue.js";
export { ReplayQueue } from "./core/replay-queue.js";
export { MAX_SEQUENCE_BOUND, SequenceCounter } from "./core/sequence-counter.js";
// Errors
export {
  CertificateError,
  ConfigError,
  ConnectError,
  ConnectionClosedError,
  errorMessage,
  NotRunningError,
  PushError,
  SerializationError,
  toPushError,
  WriteError,
} from "./errors.js";
// Interfaces
export type { FailureSink } from "./interfaces/failure-sink.js";
export type { Logger } from "./interfaces/logger.js";
export type {
  ClientCredentials,
  CredentialSource,
  DialOptions,
  GatewayConnection,
  GatewayDialer,
} from "./interfaces/transport.js";
// Protocol
export type { ErrorFrameParseResult } from "./protocol/error-frame.js";
export {
  ERROR_FRAME_COMMAND,
  ERROR_FRAME_LENGTH,
  encodeErrorFrame,
  parseErrorFrame,
} from "./protocol/error-frame.js";
export {
  encodeNotification,
  MAX_PAYLOAD_BYTES,
  readEncodedSequence,
} from "./protocol/notification-encoder.js";
export { describeStatus, STATUS_NO_ERROR, STATUS_REASONS } from "./protocol/status-codes.js";
// Types
export type {
  CertificateConfig,
  PushClientConfig,
  ResolvedConfig,
} from "./types/config.js";
export {
  DEFAULT_CONFIG,
  PRODUCTION_GATEWAY,
  resolveConfig,
  SANDBOX_GATEWAY,
} from "./types/config.js";
export type {
  DeliveryFailure,
  FailureReport,
  NotificationEncoder,
  PushNotification,
} from "./types/delivery.js";
