import test from "node:test";
import assert from "node:assert/strict";
import { IdleWatchdog } from "./idleWatchdog";
import { MemoryRequestStore } from "../stores/memoryRequestStore";

const logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function setup(idleTimeoutMs = 600_000) {
  let nowMs = 1_700_000_000_000;
  const now = () => nowMs;
  const store = new MemoryRequestStore({ now });
  let idleCalls = 0;
  const watchdog = new IdleWatchdog({
    store,
    logger,
    idleTimeoutMs,
    intervalMs: 30_000,
    onIdle: () => {
      idleCalls += 1;
    },
    now,
  });
  return {
    store,
    watchdog,
    advance: (ms: number) => {
      nowMs += ms;
    },
    idleCalls: () => idleCalls,
  };
}

test("IdleWatchdog fires once the broker has been idle past the timeout", () => {
  const { watchdog, advance, idleCalls } = setup();
  watchdog.start();
  try {
    advance(600_000);
    assert.equal(watchdog.tick(), false);
    advance(30_000);
    assert.equal(watchdog.tick(), true);
    assert.equal(idleCalls(), 1);
    assert.equal(watchdog.getStats().running, false);
  } finally {
    watchdog.stop();
  }
});

test("IdleWatchdog never fires while requests are pending", () => {
  const { store, watchdog, advance, idleCalls } = setup();
  store.create({ question: "anyone there?" });
  for (let i = 0; i < 100; i += 1) {
    advance(30_000);
    assert.equal(watchdog.tick(), false);
  }
  assert.equal(idleCalls(), 0);
});

test("IdleWatchdog measures idleness from the last tick that saw pending work", () => {
  const { store, watchdog, advance, idleCalls } = setup(60_000);
  const created = store.create({ question: "q" });
  assert.equal(created.status, "created");

  advance(30_000);
  watchdog.tick();
  if (created.status === "created") store.answer(created.request.id, "done");

  advance(60_000);
  assert.equal(watchdog.tick(), false);
  advance(30_000);
  assert.equal(watchdog.tick(), true);
  assert.equal(idleCalls(), 1);
});

test("IdleWatchdog ignores ticks after it has fired", () => {
  const { watchdog, advance, idleCalls } = setup(1_000);
  watchdog.tick();
  advance(5_000);
  assert.equal(watchdog.tick(), true);
  advance(5_000);
  assert.equal(watchdog.tick(), false);
  assert.equal(idleCalls(), 1);
  assert.equal(watchdog.getStats().ticks, 2);
});

test("IdleWatchdog runs on its interval timer", async () => {
  let idle = false;
  const watchdog = new IdleWatchdog({
    store: new MemoryRequestStore(),
    logger,
    idleTimeoutMs: 0,
    intervalMs: 10,
    onIdle: () => {
      idle = true;
    },
  });
  watchdog.start();
  try {
    const deadline = Date.now() + 2_000;
    while (!idle && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    assert.equal(idle, true);
  } finally {
    watchdog.stop();
  }
});
