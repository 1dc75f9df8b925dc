import { after, before, describe, test, mock } from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import axios from "axios";
import { createWebhookApp } from "../../src/app/server";
import type { RelayResponse } from "../../src/services/webhook-relay.service";
import { createMockLogger, RecordingNotifier } from "../helpers/fakes";

const client = axios.create({ validateStatus: () => true });

function listen(app: ReturnType<typeof createWebhookApp>): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1");
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

describe("webhook app", () => {
  const notifier = new RecordingNotifier();
  const handleAlert = mock.fn(
    async (payload: unknown): Promise<RelayResponse> => {
      if (typeof payload === "object" && payload !== null && "explode" in payload) {
        throw new Error("relay crashed near test-secret");
      }
      return { httpStatus: 200, body: { status: "ok", action: "BUY" } };
    },
  );
  let server: Server;
  let baseUrl: string;

  before(async () => {
    const app = createWebhookApp({
      relay: { handleAlert },
      notifier,
      logger: createMockLogger(),
      secrets: ["test-secret"],
    });
    ({ server, baseUrl } = await listen(app));
  });

  after(async () => {
    await close(server);
  });

  test("passes the parsed body to the relay and returns its answer", async () => {
    const response = await client.post(`${baseUrl}/webhook`, {
      secret: "test-secret",
      action: "BUY",
    });

    assert.equal(response.status, 200);
    assert.deepEqual(response.data, { status: "ok", action: "BUY" });
    const lastCall = handleAlert.mock.calls[handleAlert.mock.calls.length - 1];
    assert.deepEqual(lastCall.arguments[0], { secret: "test-secret", action: "BUY" });
  });

  test("answers malformed JSON with 400 and no notification", async () => {
    const eventCount = notifier.events.length;
    const calls = handleAlert.mock.callCount();

    const response = await client.post(`${baseUrl}/webhook`, '{"secret": "test-secret", "action":', {
      headers: { "Content-Type": "application/json" },
      // send the broken text as-is instead of re-encoding it as a JSON string
      transformRequest: [(data: string) => data],
    });

    assert.equal(response.status, 400);
    assert.deepEqual(response.data, { status: "error", error: "invalid_payload" });
    assert.equal(notifier.events.length, eventCount);
    assert.equal(handleAlert.mock.callCount(), calls);
  });

  test("turns an unexpected failure into one scrubbed notification and a generic 500", async () => {
    notifier.events.length = 0;

    const response = await client.post(`${baseUrl}/webhook`, { explode: true });

    assert.equal(response.status, 500);
    assert.deepEqual(response.data, { status: "error", error: "internal_error" });
    assert.deepEqual(notifier.events, [
      { type: "UNHANDLED_ERROR", message: "Error: relay crashed near <redacted>" },
    ]);
  });

  test("reports liveness", async () => {
    const response = await client.get(`${baseUrl}/health`);

    assert.equal(response.status, 200);
    assert.equal(response.data.status, "ok");
    assert.equal(typeof response.data.uptimeSeconds, "number");
    assert.equal(response.headers["x-powered-by"], undefined);
  });
});
