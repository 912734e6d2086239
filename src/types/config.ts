import type { SecureVersion } from "node:tls";
import { pushClientConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Historical gateways of the legacy binary protocol. */
export const PRODUCTION_GATEWAY = "gateway.push.apple.com:2195";
export const SANDBOX_GATEWAY = "gateway.sandbox.push.apple.com:2195";

/** Either a pair of PEM blocks or a pair of file paths. Blocks win when both are given. */
export interface CertificateConfig {
  certFile?: string;
  keyFile?: string;
  cert?: string;
  key?: string;
}

/** Client configuration; everything but gateway and certificate has a default. */
export interface PushClientConfig {
  /** Gateway address as `host:port`; the host is pinned as the TLS server name. */
  gateway: string;
  certificate: CertificateConfig;
  /** Extra trusted roots for the gateway certificate. */
  ca?: string | string[];

  // Resource limits
  replayQueueCapacity?: number; // default: 10000
  sequenceBound?: number; // default: 2^31 - 1, must exceed replayQueueCapacity
  failureChannelCapacity?: number; // default: 10

  // Timeouts
  timeoutMs?: number; // default: 60000 (dial, handshake and write)

  minTlsVersion?: SecureVersion; // default: "TLSv1.2"
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<PushClientConfig, "ca">> & {
  ca: string[] | undefined;
  host: string;
  port: number;
};

export const DEFAULT_CONFIG = {
  replayQueueCapacity: 10000,
  sequenceBound: 0x7fffffff,
  failureChannelCapacity: 10,
  timeoutMs: 60000,
  minTlsVersion: "TLSv1.2",
} as const satisfies Partial<PushClientConfig>;

export function resolveConfig(config: PushClientConfig): ResolvedConfig {
  const validation = pushClientConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const replayQueueCapacity = config.replayQueueCapacity ?? DEFAULT_CONFIG.replayQueueCapacity;
  const sequenceBound = config.sequenceBound ?? DEFAULT_CONFIG.sequenceBound;
  // Keeps a wrapped counter from reaching a resident entry through successful sends alone.
  // Failed sends also consume numbers; the replay queue drops the older entry on reuse.
  if (replayQueueCapacity >= sequenceBound) {
    throw new ConfigError(
      `Invalid configuration: sequenceBound (${sequenceBound}) must exceed replayQueueCapacity (${replayQueueCapacity})`,
    );
  }

  const separator = config.gateway.lastIndexOf(":");
  return {
    gateway: config.gateway,
    host: config.gateway.slice(0, separator),
    port: Number(config.gateway.slice(separator + 1)),
    certificate: { ...config.certificate },
    ca: config.ca === undefined ? undefined : [config.ca].flat(),
    replayQueueCapacity,
    sequenceBound,
    failureChannelCapacity: config.failureChannelCapacity ?? DEFAULT_CONFIG.failureChannelCapacity,
    timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    minTlsVersion: config.minTlsVersion ?? DEFAULT_CONFIG.minTlsVersion,
  };
}
