/**
 * Default notification serializer: the legacy "enhanced" binary format.
 *
 * command (1) = 1 | sequence (int32 BE) | expiry (uint32 BE) |
 * token length (uint16 BE) | token (32) | payload length (uint16 BE) | payload (UTF-8 JSON)
 */

import { z } from "zod";
import { SerializationError } from "../errors.js";
import type { PushNotification } from "../types/delivery.js";

export const NOTIFICATION_COMMAND = 1;
export const DEVICE_TOKEN_BYTES = 32;
export const MAX_PAYLOAD_BYTES = 2048;

const HEADER_BYTES = 1 + 4 + 4 + 2 + DEVICE_TOKEN_BYTES + 2;

const sequencedNotificationSchema = z.object({
  deviceToken: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, "device token must be 64 hexadecimal characters"),
  payload: z.record(z.unknown()),
  expiry: z.number().int().min(0).max(0xffffffff).optional(),
  sequence: z.number().int().min(-0x80000000).max(0x7fffffff),
});

export function encodeNotification(notification: PushNotification): Buffer {
  const parsed = sequencedNotificationSchema.safeParse(notification);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "notification"}: ${issue.message}` : "";
    throw new SerializationError(`Invalid notification: ${detail}`, { cause: parsed.error });
  }
  const { deviceToken, payload, expiry = 0, sequence } = parsed.data;

  let json: string;
  try {
    json = JSON.stringify(payload);
  } catch (err) {
    throw new SerializationError("Notification payload is not JSON-serializable", { cause: err });
  }
  const body = Buffer.from(json, "utf8");
  if (body.length > MAX_PAYLOAD_BYTES) {
    throw new SerializationError(
      `Notification payload is ${body.length} bytes, limit is ${MAX_PAYLOAD_BYTES}`,
    );
  }

  const frame = Buffer.alloc(HEADER_BYTES + body.length);
  let offset = frame.writeUInt8(NOTIFICATION_COMMAND, 0);
  offset = frame.writeInt32BE(sequence, offset);
  offset = frame.writeUInt32BE(expiry, offset);
  offset = frame.writeUInt16BE(DEVICE_TOKEN_BYTES, offset);
  offset += Buffer.from(deviceToken, "hex").copy(frame, offset);
  offset = frame.writeUInt16BE(body.length, offset);
  body.copy(frame, offset);
  return frame;
}

/** Sequence number carried by an encoded notification. */
export function readEncodedSequence(frame: Uint8Array): number {
  return new DataView(frame.buffer, frame.byteOffset, frame.byteLength).getInt32(1, false);
}
