/**
 * Client key material for the gateway handshake.
 *
 * Raw PEM blocks take precedence; files are read only when no block was supplied.
 * The pair is parsed and cross-checked once, then cached for the store's lifetime.
 * A failed load is not cached, so the next send tries again.
 */

import { createPrivateKey, type KeyObject, X509Certificate } from "node:crypto";
import { readFile } from "node:fs/promises";
import { CertificateError, errorMessage } from "../errors.js";
import type { ClientCredentials, CredentialSource } from "../interfaces/transport.js";
import type { CertificateConfig } from "../types/config.js";

export type CertificateSource =
  | { kind: "pem"; cert: string; key: string }
  | { kind: "files"; certFile: string; keyFile: string };

export function certificateSourceFrom(config: CertificateConfig): CertificateSource {
  if (config.cert || config.key) {
    return { kind: "pem", cert: config.cert ?? "", key: config.key ?? "" };
  }
  return { kind: "files", certFile: config.certFile ?? "", keyFile: config.keyFile ?? "" };
}

export class CertificateStore implements CredentialSource {
  private cached: ClientCredentials | null = null;

  constructor(private readonly source: CertificateSource) {}

  async load(): Promise<ClientCredentials> {
    if (this.cached) return this.cached;

    const raw = this.source.kind === "pem" ? this.source : await readPair(this.source);
    const credentials = verifyPair(raw.cert, raw.key);
    this.cached = credentials;
    return credentials;
  }
}

async function readPair(source: {
  certFile: string;
  keyFile: string;
}): Promise<ClientCredentials> {
  try {
    const [cert, key] = await Promise.all([
      readFile(source.certFile, "utf8"),
      readFile(source.keyFile, "utf8"),
    ]);
    return { cert, key };
  } catch (err) {
    throw new CertificateError(`Failed to read client certificate: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function verifyPair(cert: string, key: string): ClientCredentials {
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(cert);
  } catch (err) {
    throw new CertificateError(`Invalid client certificate: ${errorMessage(err)}`, { cause: err });
  }

  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey(key);
  } catch (err) {
    throw new CertificateError(`Invalid client private key: ${errorMessage(err)}`, { cause: err });
  }

  if (!certificate.checkPrivateKey(privateKey)) {
    throw new CertificateError("Client certificate does not match private key");
  }
  return { cert, key };
}
