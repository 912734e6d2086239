/**
 * Public test utilities: exported from the `"binpush/testing"` entry point.
 * Consumers can drive a PushClient against an in-process gateway stand-in.
 */
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export { FakeGatewayConnection, FakeGatewayDialer } from "./testing/fake-gateway.js";
