import { z } from "zod";

const positiveMs = z.number().int().positive();

/** `host:port` with a non-empty host and a TCP port. */
export const gatewayAddressSchema = z
  .string()
  .regex(/^[^\s:]+:\d{1,5}$/, "must be host:port")
  .refine((value) => Number(value.slice(value.lastIndexOf(":") + 1)) <= 65535, "port out of range");

export const certificateConfigSchema = z
  .object({
    certFile: z.string().min(1).optional(),
    keyFile: z.string().min(1).optional(),
    cert: z.string().min(1).optional(),
    key: z.string().min(1).optional(),
  })
  .refine(
    (c) => (c.cert || c.key ? Boolean(c.cert && c.key) : Boolean(c.certFile && c.keyFile)),
    "provide cert and key, or certFile and keyFile",
  );

export const pushClientConfigSchema = z.object({
  gateway: gatewayAddressSchema,
  certificate: certificateConfigSchema,
  ca: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),

  // Resource limits
  replayQueueCapacity: z.number().int().min(1).optional(),
  sequenceBound: z.number().int().min(2).max(0x80000000).optional(),
  failureChannelCapacity: z.number().int().min(1).optional(),

  // Timeouts
  timeoutMs: positiveMs.optional(),

  // Transport
  minTlsVersion: z.enum(["TLSv1", "TLSv1.1", "TLSv1.2", "TLSv1.3"]).optional(),
});
