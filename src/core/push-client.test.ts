import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CertificateError,
  ConnectError,
  NotRunningError,
  SerializationError,
  WriteError,
} from "../errors.js";
import type {
  CredentialSource,
  DialOptions,
  GatewayConnection,
  GatewayDialer,
} from "../interfaces/transport.js";
import { encodeErrorFrame } from "../protocol/error-frame.js";
import { FakeGatewayDialer } from "../testing/fake-gateway.js";
import { makeNotification } from "../testing/fixtures.js";
import type { PushClientConfig } from "../types/config.js";
import type { DeliveryFailure } from "../types/delivery.js";
import { PushClient, type PushClientOptions } from "./push-client.js";

const GATEWAY = "gateway.example.test:2195";

const credentials: CredentialSource = {
  load: async () => ({ cert: "test-cert", key: "test-key" }),
};

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const clients: PushClient[] = [];

function setup(
  config: Partial<PushClientConfig> = {},
  overrides: Partial<Omit<PushClientOptions, "config">> = {},
) {
  const dialer = new FakeGatewayDialer();
  const failures: DeliveryFailure[] = [];
  const logger = createLogger();
  const client = new PushClient({
    config: { gateway: GATEWAY, certificate: { cert: "test-cert", key: "test-key" }, ...config },
    dialer,
    credentials,
    onFailure: (failure) => failures.push(failure),
    logger,
    ...overrides,
  });
  clients.push(client);
  return { client, dialer, failures, logger };
}

/** Creates each connection at once but holds the dial open until `release()`. */
class HeldDialer implements GatewayDialer {
  readonly fake = new FakeGatewayDialer();
  private readonly held: Array<() => void> = [];

  async dial(options: DialOptions): Promise<GatewayConnection> {
    const connection = await this.fake.dial(options);
    await new Promise<void>((resolve) => this.held.push(resolve));
    return connection;
  }

  /** Complete the oldest held dial. */
  release(): void {
    this.held.shift()?.();
  }
}

function failureFrame(sequence: number): Buffer {
  return encodeErrorFrame({ command: 8, status: 8, sequence });
}

/** Let queued microtasks and timers run. */
function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
});

describe("PushClient", () => {
  describe("send", () => {
    it("assigns consecutive sequence numbers and tracks writes in flight", async () => {
      const { client, dialer } = setup();
      const notifications = [0, 1, 2].map(makeNotification);

      for (const notification of notifications) await client.send(notification);

      expect(notifications.map((n) => n.sequence)).toEqual([0, 1, 2]);
      expect(dialer.dialAttempts).toBe(1);
      expect(dialer.latest?.sequences).toEqual([0, 1, 2]);
      expect(client.inFlight).toBe(3);
      expect(client.connected).toBe(true);
    });

    it("pins the gateway host as the server name", async () => {
      const { client, dialer } = setup({ timeoutMs: 1500 });
      await client.send(makeNotification(0));
      expect(dialer.dials[0]).toMatchObject({
        host: "gateway.example.test",
        port: 2195,
        servername: "gateway.example.test",
        timeoutMs: 1500,
        minVersion: "TLSv1.2",
      });
    });

    it("keeps at most replayQueueCapacity notifications in flight", async () => {
      const { client } = setup({ replayQueueCapacity: 2, sequenceBound: 100 });
      for (let i = 0; i < 5; i++) await client.send(makeNotification(i));
      expect(client.inFlight).toBe(2);
    });

    it("wraps sequence numbers at the configured bound", async () => {
      const { client, dialer } = setup({ replayQueueCapacity: 2, sequenceBound: 3 });
      for (let i = 0; i < 4; i++) await client.send(makeNotification(i));
      expect(dialer.latest?.sequences).toEqual([0, 1, 2, 0]);
    });

    it("serializes concurrent sends", async () => {
      const { client, dialer } = setup();
      const notifications = Array.from({ length: 10 }, (_, i) => makeNotification(i));

      await Promise.all(notifications.map((n) => client.send(n)));

      expect(dialer.latest?.sequences).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(new Set(notifications.map((n) => n.sequence)).size).toBe(10);
    });

    it("retries a failed write once on a fresh connection", async () => {
      const { client, dialer, failures, logger } = setup();
      dialer.failWritesOnNextConnections(1);

      await client.send(makeNotification(0));

      expect(dialer.dialAttempts).toBe(2);
      expect(dialer.connections[0]?.closed).toBe(true);
      expect(dialer.connections[1]?.sequences).toEqual([0]);
      expect(client.inFlight).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Write failed, retrying on a new connection",
        expect.objectContaining({ connection: 1, sequence: 0 }),
      );
      await settle();
      expect(failures).toEqual([]);
    });

    it("reports exactly one failure when the retry also fails", async () => {
      const { client, dialer, failures } = setup();
      dialer.failWritesOnNextConnections(2);
      const notification = makeNotification(0);

      await expect(client.send(notification)).rejects.toBeInstanceOf(WriteError);

      await vi.waitFor(() => expect(failures).toHaveLength(1));
      await settle();
      expect(failures).toEqual([{ notification, report: null }]);
      expect(dialer.dialAttempts).toBe(2);
      expect(client.connected).toBe(false);
      expect(client.inFlight).toBe(0);
    });

    it("treats a write that misses its deadline as failed and retries on a fresh connection", async () => {
      const { client, dialer, failures, logger } = setup({ timeoutMs: 50 });
      dialer.stallWritesOnNextConnections(1);

      await client.send(makeNotification(0));

      expect(dialer.dialAttempts).toBe(2);
      expect(dialer.connections[0]?.closed).toBe(true);
      expect(dialer.connections[0]?.written).toEqual([]);
      expect(dialer.connections[1]?.sequences).toEqual([0]);
      expect(client.inFlight).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith("Write failed, retrying on a new connection", {
        connection: 1,
        sequence: 0,
        error: expect.objectContaining({ code: "WRITE", message: "Write timed out after 50ms" }),
      });
      await settle();
      expect(failures).toEqual([]);
    });

    it("blames the newest notification when failed sends let the counter wrap onto a resident one", async () => {
      const { client, dialer, failures } = setup({ replayQueueCapacity: 2, sequenceBound: 3 });
      const a = makeNotification(0);
      const b = makeNotification(1);
      const c = makeNotification(2);
      const d = makeNotification(3);

      await client.send(a);
      dialer.connections[0]?.failWrites(1);
      dialer.failWritesOnNextConnections(3);
      await expect(client.send(b)).rejects.toBeInstanceOf(WriteError);
      await expect(client.send(c)).rejects.toBeInstanceOf(WriteError);
      await client.send(d);

      expect([a.sequence, d.sequence]).toEqual([0, 0]);
      expect(client.inFlight).toBe(1);

      await client.reportFailure({ command: 8, status: 8, sequence: 0 });

      await settle();
      expect(failures.filter((failure) => failure.report !== null)).toEqual([
        { notification: d, report: { command: 8, status: 8, sequence: 0 } },
      ]);
      expect(dialer.written).toHaveLength(2);
    });

    it("does not retry when the first connect fails", async () => {
      const { client, dialer, failures } = setup();
      dialer.failNextDials(1);
      const notification = makeNotification(0);

      await expect(client.send(notification)).rejects.toBeInstanceOf(ConnectError);
      await vi.waitFor(() => expect(failures).toEqual([{ notification, report: null }]));
      expect(dialer.dialAttempts).toBe(1);

      await client.send(makeNotification(1));
      expect(dialer.dialAttempts).toBe(2);
    });

    it("surfaces certificate failures without dialing", async () => {
      const failing: CredentialSource = {
        load: async () => {
          throw new CertificateError("Invalid client private key: test");
        },
      };
      const { client, dialer, failures } = setup({}, { credentials: failing });

      await expect(client.send(makeNotification(0))).rejects.toBeInstanceOf(CertificateError);
      await vi.waitFor(() => expect(failures).toHaveLength(1));
      expect(failures[0]?.report).toBeNull();
      expect(dialer.dialAttempts).toBe(0);
    });

    it("aborts before any I/O when serialization fails, still consuming a sequence number", async () => {
      const { client, dialer, failures } = setup();
      const invalid = { ...makeNotification(0), deviceToken: "not-hex" };

      await expect(client.send(invalid)).rejects.toBeInstanceOf(SerializationError);
      await settle();
      expect(dialer.dialAttempts).toBe(0);
      expect(failures).toEqual([]);

      const next = makeNotification(1);
      await client.send(next);
      expect(next.sequence).toBe(1);
    });

    it("wraps errors thrown by a custom encoder", async () => {
      const { client } = setup(
        {},
        {
          encoder: () => {
            throw new Error("nope");
          },
        },
      );
      await expect(client.send(makeNotification(0))).rejects.toThrow(
        new SerializationError("Failed to encode notification: nope"),
      );
    });
  });

  describe("failure reports", () => {
    it("resends only the notifications written after the failed one", async () => {
      const { client, dialer, failures } = setup();
      const notifications = [0, 1, 2].map(makeNotification);
      for (const notification of notifications) await client.send(notification);
      const first = dialer.connections[0];

      first?.pushFrame(encodeErrorFrame({ command: 8, status: 8, sequence: 1 }));

      await vi.waitFor(() => expect(dialer.connections[1]?.sequences).toEqual([3]));
      expect(failures).toEqual([
        { notification: notifications[1], report: { command: 8, status: 8, sequence: 1 } },
      ]);
      expect(notifications[2]?.sequence).toBe(3);
      expect(dialer.written).toHaveLength(4);
      expect(first?.closed).toBe(true);
      expect(client.inFlight).toBe(1);
    });

    it("logs a capacity warning and resends nothing when the failed notification was evicted", async () => {
      const { client, dialer, failures, logger } = setup({
        replayQueueCapacity: 2,
        sequenceBound: 100,
      });
      for (let i = 0; i < 3; i++) await client.send(makeNotification(i));

      dialer.connections[0]?.pushFrame(encodeErrorFrame({ command: 8, status: 8, sequence: 0 }));

      await vi.waitFor(() =>
        expect(logger.warn).toHaveBeenCalledWith(
          "Replay queue too small to locate failed notification",
          { capacity: 2, sequence: 0 },
        ),
      );
      await settle();
      expect(client.inFlight).toBe(2);
      expect(failures).toEqual([]);
      expect(dialer.written).toHaveLength(3);
    });

    it("resends the drained tail in original order", async () => {
      const { client, dialer } = setup();
      const notifications = [0, 1, 2, 3].map(makeNotification);
      for (const notification of notifications) await client.send(notification);

      await client.reportFailure({ command: 8, status: 8, sequence: 0 });

      await vi.waitFor(() =>
        expect(dialer.latest?.sequences).toEqual([0, 1, 2, 3, 4, 5, 6]),
      );
      expect(notifications.slice(1).map((n) => n.sequence)).toEqual([4, 5, 6]);
      expect(dialer.dialAttempts).toBe(1);
      expect(client.inFlight).toBe(3);
    });

    it("treats a second report for the same sequence as a queue miss", async () => {
      const { client, failures, logger } = setup();
      for (let i = 0; i < 2; i++) await client.send(makeNotification(i));

      await client.reportFailure({ command: 8, status: 8, sequence: 1 });
      await client.reportFailure({ command: 8, status: 8, sequence: 1 });

      await settle();
      expect(failures).toHaveLength(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Replay queue too small to locate failed notification",
        expect.objectContaining({ sequence: 1 }),
      );
    });

    it("ignores a report carrying the no-error status", async () => {
      const { client, failures } = setup();
      for (let i = 0; i < 2; i++) await client.send(makeNotification(i));

      await client.reportFailure({ command: 8, status: 0, sequence: 0 });

      await settle();
      expect(client.inFlight).toBe(2);
      expect(failures).toEqual([]);
    });

    it("drops reports beyond failureChannelCapacity while the lock is busy", async () => {
      const dialer = new HeldDialer();
      const { client, failures, logger } = setup({ failureChannelCapacity: 1 }, { dialer });
      const first = makeNotification(0);
      const second = makeNotification(1);

      const firstSend = client.send(first);
      const secondSend = client.send(second);

      // First report reaches the consumer, which then waits on the lock.
      await vi.waitFor(() => expect(dialer.fake.dialAttempts).toBe(1));
      dialer.fake.connections[0]?.failWrites(1).pushFrame(failureFrame(1));
      dialer.release();

      // Second report fills the queue; the retry fails as well.
      await vi.waitFor(() => expect(dialer.fake.dialAttempts).toBe(2));
      dialer.fake.connections[1]?.failWrites(Number.POSITIVE_INFINITY).pushFrame(failureFrame(7));
      dialer.release();
      await expect(firstSend).rejects.toBeInstanceOf(WriteError);

      // Third report finds the queue full.
      await vi.waitFor(() => expect(dialer.fake.dialAttempts).toBe(3));
      dialer.fake.connections[2]?.failWrites(1).pushFrame(failureFrame(9));
      dialer.release();
      await vi.waitFor(() =>
        expect(logger.warn).toHaveBeenCalledWith("Failure report dropped, report queue is full", {
          sequence: 9,
          capacity: 1,
        }),
      );

      await vi.waitFor(() => expect(dialer.fake.dialAttempts).toBe(4));
      dialer.release();
      await secondSend;

      await vi.waitFor(() =>
        expect(failures).toContainEqual({
          notification: second,
          report: { command: 8, status: 8, sequence: 1 },
        }),
      );
      expect(failures).toContainEqual({ notification: first, report: null });
      expect(logger.warn).not.toHaveBeenCalledWith(
        "Failure report dropped, report queue is full",
        expect.objectContaining({ sequence: 7 }),
      );
    });

    it("logs resend failures without escalating them", async () => {
      const { client, dialer, failures, logger } = setup();
      const notifications = [0, 1].map(makeNotification);
      for (const notification of notifications) await client.send(notification);
      dialer.latest?.failWrites(Number.POSITIVE_INFINITY);
      dialer.failNextDials(1);

      await client.reportFailure({ command: 8, status: 8, sequence: 0 });

      await vi.waitFor(() =>
        expect(logger.warn).toHaveBeenCalledWith(
          "Resend failed",
          expect.objectContaining({ previousSequence: 1 }),
        ),
      );
      await vi.waitFor(() => expect(failures).toHaveLength(2));
      expect(failures).toEqual([
        { notification: notifications[0], report: { command: 8, status: 8, sequence: 0 } },
        { notification: notifications[1], report: null },
      ]);
    });
  });

  describe("connection lifecycle", () => {
    it("connect opens the connection ahead of the first send", async () => {
      const { client, dialer } = setup();

      await client.connect();
      await client.connect();
      await client.send(makeNotification(0));

      expect(dialer.dialAttempts).toBe(1);
      expect(dialer.latest?.sequences).toEqual([0]);
    });

    it("reconnects lazily after the gateway hangs up", async () => {
      const { client, dialer, failures } = setup();
      await client.send(makeNotification(0));

      dialer.connections[0]?.hangUp();
      await vi.waitFor(() => expect(client.connected).toBe(false));
      await client.send(makeNotification(1));

      expect(dialer.dialAttempts).toBe(2);
      expect(dialer.connections[1]?.sequences).toEqual([1]);
      expect(failures).toEqual([]);
    });

    it("a discarded frame still retires its connection", async () => {
      const { client, dialer, failures } = setup();
      await client.send(makeNotification(0));

      dialer.connections[0]?.pushFrame(Buffer.from([1, 8, 0, 0, 0, 0]));

      await vi.waitFor(() => expect(client.connected).toBe(false));
      expect(client.inFlight).toBe(1);
      expect(failures).toEqual([]);
    });
  });

  describe("close", () => {
    it("rejects sends with NotRunningError and performs no I/O", async () => {
      const { client, dialer } = setup();

      await client.close();

      expect(client.running).toBe(false);
      await expect(client.send(makeNotification(0))).rejects.toBeInstanceOf(NotRunningError);
      await expect(client.connect()).rejects.toBeInstanceOf(NotRunningError);
      expect(dialer.dialAttempts).toBe(0);
    });

    it("closes the cached connection and is idempotent", async () => {
      const { client, dialer } = setup();
      await client.send(makeNotification(0));

      await client.close();
      await client.close();

      expect(dialer.connections[0]?.closed).toBe(true);
      expect(client.connected).toBe(false);
    });

    it("ignores failure reports once closed", async () => {
      const { client, failures } = setup();
      await client.send(makeNotification(0));
      await client.close();

      await client.reportFailure({ command: 8, status: 8, sequence: 0 });

      await settle();
      expect(failures).toEqual([]);
      expect(client.inFlight).toBe(1);
    });
  });

  describe("factories", () => {
    it("fromCertificateBlocks builds a running client", async () => {
      const dialer = new FakeGatewayDialer();
      const client = PushClient.fromCertificateBlocks(GATEWAY, "test-cert", "test-key", {
        dialer,
        credentials,
        config: { replayQueueCapacity: 5 },
      });
      clients.push(client);

      await client.send(makeNotification(0));

      expect(client.running).toBe(true);
      expect(dialer.dials[0]?.servername).toBe("gateway.example.test");
    });

    it("fromCertificateFiles reads key material from disk", async () => {
      const dialer = new FakeGatewayDialer();
      const failures: DeliveryFailure[] = [];
      const client = PushClient.fromCertificateFiles(
        GATEWAY,
        "/nonexistent/cert.pem",
        "/nonexistent/key.pem",
        { dialer, onFailure: (failure) => failures.push(failure) },
      );
      clients.push(client);

      await expect(client.send(makeNotification(0))).rejects.toThrow(
        "Failed to read client certificate",
      );
      expect(dialer.dialAttempts).toBe(0);
      await vi.waitFor(() => expect(failures).toHaveLength(1));
    });

    it("rejects invalid configuration at construction", () => {
      expect(() => PushClient.fromCertificateBlocks("no-port", "test-cert", "test-key")).toThrow(
        "Invalid configuration",
      );
    });
  });
});
