/** Status codes the gateway may place in an error frame, with their documented meaning. */
export const STATUS_REASONS: ReadonlyMap<number, string> = new Map([
  [0, "No errors encountered"],
  [1, "Processing error"],
  [2, "Missing device token"],
  [3, "Missing topic"],
  [4, "Missing payload"],
  [5, "Invalid token size"],
  [6, "Invalid topic size"],
  [7, "Invalid payload size"],
  [8, "Invalid token"],
  [10, "Shutdown"],
  [255, "None (unknown)"],
]);

/** Status meaning "no error"; a frame carrying it does not identify a failed notification. */
export const STATUS_NO_ERROR = 0;

export function describeStatus(status: number): string | undefined {
  return STATUS_REASONS.get(status);
}
