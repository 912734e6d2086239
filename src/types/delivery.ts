/** A push notification as accepted by `PushClient.send`. */
export interface PushNotification {
  /** 64 hex characters (32 bytes) identifying the target device. */
  deviceToken: string;
  /** JSON payload delivered to the device. */
  payload: Record<string, unknown>;
  /** Epoch seconds after which the gateway may discard the notification; 0 means "do not store". */
  expiry?: number;
  /**
   * Assigned by the client on every send, including resends. Callers must not set or reuse it
   * while the notification is in flight.
   */
  sequence?: number;
}

/** Failure frame reported by the gateway. */
export interface FailureReport {
  command: number;
  status: number;
  sequence: number;
}

/**
 * A notification the client could not deliver. `report` is null when the failure was local
 * (dial, handshake, certificate, or write) rather than reported by the gateway.
 */
export interface DeliveryFailure {
  notification: PushNotification;
  report: FailureReport | null;
}

/** Converts a sequenced notification into its wire bytes. */
export type NotificationEncoder = (notification: PushNotification) => Uint8Array;
