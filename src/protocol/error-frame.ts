/**
 * Error-frame codec.
 *
 * Layout (6 bytes): command (1) | status (1) | sequence (int32, big-endian).
 * Only frames whose command byte equals {@link ERROR_FRAME_COMMAND} are recognized.
 */

import type { FailureReport } from "../types/delivery.js";
import { describeStatus } from "./status-codes.js";

export const ERROR_FRAME_COMMAND = 8;
export const ERROR_FRAME_LENGTH = 6;

export type ErrorFrameParseResult =
  | { kind: "ok"; report: FailureReport; reason: string }
  | { kind: "unknown-command"; command: number }
  | { kind: "unknown-status"; report: FailureReport }
  | { kind: "short-frame"; length: number };

export function parseErrorFrame(frame: Uint8Array): ErrorFrameParseResult {
  if (frame.length < ERROR_FRAME_LENGTH) {
    return { kind: "short-frame", length: frame.length };
  }

  const view = new DataView(frame.buffer, frame.byteOffset, ERROR_FRAME_LENGTH);
  const command = view.getUint8(0);
  if (command !== ERROR_FRAME_COMMAND) {
    return { kind: "unknown-command", command };
  }

  const report: FailureReport = {
    command,
    status: view.getUint8(1),
    sequence: view.getInt32(2, false),
  };
  const reason = describeStatus(report.status);
  if (reason === undefined) {
    return { kind: "unknown-status", report };
  }
  return { kind: "ok", report, reason };
}

/** Encode a report as the gateway would send it. Used by test gateways and fixtures. */
export function encodeErrorFrame(report: FailureReport): Buffer {
  const frame = Buffer.alloc(ERROR_FRAME_LENGTH);
  frame.writeUInt8(report.command, 0);
  frame.writeUInt8(report.status, 1);
  frame.writeInt32BE(report.sequence, 2);
  return frame;
}
