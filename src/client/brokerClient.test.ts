import test from "node:test";
import assert from "node:assert/strict";
import type { AddressInfo } from "node:net";
import { startHttpServer } from "../http/server";
import { MemoryRequestStore } from "../stores/memoryRequestStore";
import { BrokerClient } from "./brokerClient";
import { BrokerBackpressureError, BrokerHttpError, ClientTimeoutError } from "./errors";

const logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

async function withClient(
  store: MemoryRequestStore,
  run: (client: BrokerClient) => Promise<void>
): Promise<void> {
  const server = startHttpServer({ host: "127.0.0.1", port: 0, logger, store });
  await new Promise<void>((resolve) => server.on("listening", () => resolve()));
  const address = server.address() as AddressInfo;
  const client = new BrokerClient({ baseUrl: `http://127.0.0.1:${address.port}/`, logger });

  try {
    await run(client);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}

test("health reports a reachable broker", async () => {
  await withClient(new MemoryRequestStore(), async (client) => {
    assert.equal(client.baseUrl.endsWith("/"), false);
    assert.equal(await client.health(), true);
  });
});

test("health is false when nothing listens", async () => {
  const client = new BrokerClient({ baseUrl: "http://127.0.0.1:1", requestTimeoutMs: 500 });
  assert.equal(await client.health(), false);
});

test("ask, answer and status round through the broker", async () => {
  await withClient(new MemoryRequestStore(), async (client) => {
    const id = await client.ask({ question: "What DB?", agent: "test-bot" });

    const pending = await client.pending();
    assert.deepEqual(
      pending.map((record) => [record.id, record.status]),
      [[id, "pending"]]
    );

    assert.equal(await client.answer(id, "Postgres"), true);
    assert.equal(await client.answer(id, "MySQL"), false);

    const record = await client.status(id);
    assert.equal(record?.status, "answered");
    assert.equal(record?.answer, "Postgres");
    assert.equal(record?.agent, "test-bot");
  });
});

test("status is null for an unknown id", async () => {
  await withClient(new MemoryRequestStore(), async (client) => {
    assert.equal(await client.status("000000000000"), null);
  });
});

test("ask surfaces validation errors with the broker's message", async () => {
  await withClient(new MemoryRequestStore(), async (client) => {
    await assert.rejects(
      client.ask({ question: "Run it?", request_type: "permission" }),
      (error: unknown) =>
        error instanceof BrokerHttpError && error.status === 400 && error.message === "missing command"
    );
  });
});

test("a full broker rejects with a backpressure error", async () => {
  const store = new MemoryRequestStore({ limits: { maxPendingRequests: 1 } });
  await withClient(store, async (client) => {
    await client.ask({ question: "first" });
    await assert.rejects(
      client.ask({ question: "second" }),
      (error: unknown) =>
        error instanceof BrokerBackpressureError && error.status === 429 && error.message === "too many pending requests"
    );
  });
});

test("waitForAnswer returns once the request is answered", async () => {
  const store = new MemoryRequestStore();
  await withClient(store, async (client) => {
    const id = await client.ask({ question: "Proceed?" });
    let sleeps = 0;

    const record = await client.waitForAnswer(id, {
      timeoutMs: 60_000,
      sleep: async () => {
        sleeps += 1;
        if (sleeps === 2) store.answer(id, "yes");
      },
    });

    assert.equal(record.answer, "yes");
    assert.equal(sleeps, 2);
  });
});

test("waitForAnswer times out with the request id", async () => {
  const store = new MemoryRequestStore();
  await withClient(store, async (client) => {
    const id = await client.ask({ question: "Anyone there?" });
    let clock = 0;

    await assert.rejects(
      client.waitForAnswer(id, {
        timeoutMs: 3_000,
        pollIntervalMs: 1_000,
        now: () => clock,
        sleep: async (ms) => {
          clock += ms;
        },
      }),
      (error: unknown) => error instanceof ClientTimeoutError && error.requestId === id && error.timeoutMs === 3_000
    );
    assert.equal(store.get(id)?.status, "pending");
  });
});

test("waitForAnswer keeps polling through failed reads", async () => {
  let calls = 0;
  const record = {
    id: "aabbccddeeff",
    question: "Proceed?",
    context: null,
    agent: null,
    task: null,
    request_type: "question",
    command: null,
    status: "answered",
    answer: "go",
    created_at: 1_767_225_600,
    answered_at: 1_767_225_601,
  };
  const fetchImpl: typeof fetch = async () => {
    calls += 1;
    if (calls === 1) throw new Error("connection reset");
    return new Response(JSON.stringify(record), { status: 200 });
  };
  const client = new BrokerClient({ baseUrl: "http://127.0.0.1:9131", fetchImpl });

  const result = await client.waitForAnswer("aabbccddeeff", { timeoutMs: 60_000, sleep: async () => {} });
  assert.equal(result.answer, "go");
  assert.equal(calls, 2);
});
