import type { DeliveryFailure } from "../types/delivery.js";

/**
 * Receives notifications the client gave up on. Owned by whoever constructs the client;
 * invoked off the send path, so a slow consumer never holds the send lock.
 */
export type FailureSink = (failure: DeliveryFailure) => void;
