/**
 * node:tls implementation of the gateway transport.
 * @module
 */

import type { Duplex } from "node:stream";
import { connect, type TLSSocket } from "node:tls";
import { ConnectError, ConnectionClosedError, errorMessage, WriteError } from "../errors.js";
import type { DialOptions, GatewayConnection, GatewayDialer } from "../interfaces/transport.js";

export class TlsDialer implements GatewayDialer {
  private nextId = 1;

  dial(options: DialOptions): Promise<GatewayConnection> {
    const target = `${options.host}:${options.port}`;
    return new Promise<GatewayConnection>((resolve, reject) => {
      let socket: TLSSocket;
      try {
        socket = connect({
          host: options.host,
          port: options.port,
          servername: options.servername,
          cert: options.credentials.cert,
          key: options.credentials.key,
          ca: options.ca,
          minVersion: options.minVersion,
        });
      } catch (err) {
        reject(new ConnectError(`Failed to dial ${target}: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      const fail = (error: ConnectError): void => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onError = (err: Error): void => {
        fail(new ConnectError(`Failed to connect to ${target}: ${err.message}`, { cause: err }));
      };
      const onSecureConnect = (): void => {
        cleanup();
        resolve(new TlsGatewayConnection(this.nextId++, socket));
      };
      const timer = setTimeout(() => {
        fail(new ConnectError(`Timed out after ${options.timeoutMs}ms connecting to ${target}`));
      }, options.timeoutMs);
      const cleanup = (): void => {
        clearTimeout(timer);
        socket.off("error", onError);
        socket.off("secureConnect", onSecureConnect);
      };

      socket.once("error", onError);
      socket.once("secureConnect", onSecureConnect);
    });
  }
}

interface PendingRead {
  length: number;
  resolve: (frame: Buffer) => void;
  reject: (error: Error) => void;
}

/**
 * Wraps a connected TLSSocket (typed as its Duplex base). Incoming bytes are buffered from the moment the
 * connection is established so a frame that arrives before `readFrame` is not lost.
 */
export class TlsGatewayConnection implements GatewayConnection {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private endReason: Error | null = null;

  constructor(
    readonly id: number,
    private readonly socket: Duplex,
  ) {
    socket.on("data", (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      this.settle();
    });
    socket.on("error", (err: Error) => {
      this.end(new ConnectionClosedError(`Connection error: ${err.message}`, { cause: err }));
    });
    socket.on("end", () => this.end(new ConnectionClosedError("Gateway closed the connection")));
    socket.on("close", () => this.end(new ConnectionClosedError()));
  }

  get closed(): boolean {
    return this.endReason !== null || this.socket.destroyed;
  }

  write(data: Uint8Array, timeoutMs: number): Promise<void> {
    if (this.closed || !this.socket.writable) {
      return Promise.reject(new WriteError("Connection is not writable"));
    }
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.socket.destroy();
        reject(new WriteError(`Write timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.socket.write(data, (err) => {
        clearTimeout(timer);
        if (err) {
          reject(new WriteError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  readFrame(length: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error("A frame read is already pending"));
    }
    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { length, resolve, reject };
      this.settle();
    });
  }

  close(): void {
    this.socket.destroy();
    this.end(new ConnectionClosedError("Connection closed locally"));
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;
    if (this.buffered >= pending.length) {
      const all = Buffer.concat(this.chunks, this.buffered);
      this.chunks = [all.subarray(pending.length)];
      this.buffered -= pending.length;
      this.pending = null;
      pending.resolve(all.subarray(0, pending.length));
    } else if (this.endReason) {
      this.pending = null;
      pending.reject(this.endReason);
    }
  }

  private end(reason: Error): void {
    this.endReason ??= reason;
    this.settle();
  }
}
