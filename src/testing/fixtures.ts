import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { ClientCredentials } from "../interfaces/transport.js";
import type { PushNotification } from "../types/delivery.js";

/** Absolute path of a file under `src/testing/fixtures/`. */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

/** Self-signed localhost pair, usable as both client credentials and server identity. */
export function localhostCredentials(): ClientCredentials {
  return {
    cert: readFileSync(fixturePath("localhost-cert.pem"), "utf8"),
    key: readFileSync(fixturePath("localhost-key.pem"), "utf8"),
  };
}

/** A valid notification whose device token encodes `n`. */
export function makeNotification(n: number): PushNotification {
  return {
    deviceToken: n.toString(16).padStart(64, "0"),
    payload: { aps: { alert: `notification ${n}` } },
  };
}
