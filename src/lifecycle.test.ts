import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { ExponentialBackoffStrategy } from "./backoff/exponential-backoff.js";
import type { TopicRequest } from "./contracts.js";
import { ExternalTask } from "./task/external-task.js";
import type { ExternalTaskService } from "./task/external-task-service.js";
import { makeTask } from "./testing/fake-engine.js";
import { captureLogger, gate, linesWithMsg, waitFor } from "./testing/helpers.js";
import { TopicSubscriptionManager } from "./topic/topic-subscription-manager.js";

// ── Helpers ────────────────────────────────────────────────────────────────

const service: ExternalTaskService = {
  async complete() {},
  async handleFailure() {},
  async handleBpmnError() {},
  async extendLock() {},
  async unlock() {},
};

/**
 * Manager backed by a stub engine that hands out queued tasks, a couple of
 * milliseconds per call, and tracks how many fetches overlap. `holdFetches`
 * makes every fetch wait on a promise before it answers.
 */
function harness() {
  const { logger, lines } = captureLogger();
  const queue: ExternalTask[] = [];
  const fetches: TopicRequest[][] = [];
  let inFlight = 0;
  let peakInFlight = 0;
  let held: Promise<void> = Promise.resolve();

  const manager = new TopicSubscriptionManager({
    engine: {
      async fetchAndLock(topics) {
        fetches.push(topics);
        inFlight++;
        peakInFlight = Math.max(peakInFlight, inFlight);
        try {
          await held;
          await delay(2);
          const names = new Set(topics.map((t) => t.topicName));
          const taken = queue.filter((t) => names.has(t.topicName));
          queue.splice(0, queue.length, ...queue.filter((t) => !taken.includes(t)));
          return taken;
        } finally {
          inFlight--;
        }
      },
    },
    service,
    clientLockDuration: 20_000,
    logger,
  });

  const enqueue = (id: string, topicName: string) =>
    queue.push(new ExternalTask(makeTask(id, topicName)));
  const holdFetches = (until: Promise<void>) => {
    held = until;
  };
  return { manager, lines, fetches, enqueue, holdFetches, peak: () => peakInFlight };
}

// ── Start / stop ───────────────────────────────────────────────────────────

test("concurrent start calls launch a single loop", async () => {
  const { manager, fetches, peak, lines } = harness();
  manager.subscribe({ topicName: "a", handler: () => {} });

  await Promise.all([manager.start(), manager.start(), manager.start()]);
  await waitFor(() => fetches.length >= 5);
  await manager.stop();

  assert.equal(peak(), 1);
  assert.equal(linesWithMsg(lines, "worker started").length, 1);
});

test("no fetch happens after stop resolves", async () => {
  const { manager, fetches } = harness();
  manager.subscribe({ topicName: "a", handler: () => {} });
  await manager.start();
  await waitFor(() => fetches.length >= 2);

  await manager.stop();
  const count = fetches.length;
  await delay(30);

  assert.equal(fetches.length, count);
  assert.equal(manager.isRunning(), false);
});

test("stop on a stopped worker is a no-op", async () => {
  const { manager, lines } = harness();
  await manager.stop();
  await manager.stop();
  assert.equal(linesWithMsg(lines, "worker stopped").length, 0);
});

test("stop waits for the in-flight handler to finish", async () => {
  const { manager, enqueue } = harness();
  const release = gate();
  let entered = false;
  let finished = false;
  manager.subscribe({
    topicName: "a",
    handler: async () => {
      entered = true;
      await release.opened;
      finished = true;
    },
  });
  enqueue("a1", "a");
  await manager.start();
  await waitFor(() => entered);

  let stopped = false;
  const stopping = manager.stop().then(() => {
    stopped = true;
  });
  await delay(20);
  assert.equal(stopped, false);
  assert.equal(manager.isRunning(), false);

  release.open();
  await stopping;
  assert.equal(finished, true);
});

test("an aborted stop logs the interruption and returns without waiting", async () => {
  const { manager, enqueue, lines } = harness();
  const release = gate();
  let entered = false;
  let finished = false;
  manager.subscribe({
    topicName: "a",
    handler: async () => {
      entered = true;
      await release.opened;
      finished = true;
    },
  });
  enqueue("a1", "a");
  await manager.start();
  await waitFor(() => entered);

  const controller = new AbortController();
  const stopping = manager.stop({ signal: controller.signal });
  controller.abort(new Error("shutdown deadline"));
  await stopping;

  assert.equal(finished, false);
  assert.equal(manager.isRunning(), false);
  const [logged] = linesWithMsg(lines, "interrupted while waiting for worker shutdown");
  assert.equal(logged?.level, 40);
  assert.equal(logged?.err?.message, "shutdown deadline");

  release.open();
  await waitFor(() => finished);
});

test("start after an interrupted stop waits for the old loop to exit", async () => {
  const { manager, enqueue, peak, fetches } = harness();
  const release = gate();
  let entered = false;
  manager.subscribe({
    topicName: "a",
    handler: async () => {
      entered = true;
      await release.opened;
    },
  });
  enqueue("a1", "a");
  await manager.start();
  await waitFor(() => entered);

  const controller = new AbortController();
  controller.abort();
  await manager.stop({ signal: controller.signal });

  const restarting = manager.start();
  await delay(10);
  release.open();
  await restarting;
  const count = fetches.length;
  await waitFor(() => fetches.length > count);
  await manager.stop();

  assert.equal(peak(), 1);
});

test("a handler can stop the worker it runs in", async () => {
  const { manager, enqueue, lines } = harness();
  let stopReturned = false;
  manager.subscribe({
    topicName: "a",
    handler: async () => {
      await manager.stop();
      stopReturned = true;
    },
  });
  enqueue("a1", "a");
  await manager.start();

  await waitFor(() => stopReturned);
  assert.equal(manager.isRunning(), false);
  await manager.stop();
  assert.equal(linesWithMsg(lines, "worker stopped").length, 0);
});

test("a handler can stop and restart the worker it runs in", async () => {
  const { manager, enqueue, fetches, lines } = harness();
  let restarted = false;
  manager.subscribe({
    topicName: "a",
    handler: async () => {
      await manager.stop();
      await manager.start();
      restarted = manager.isRunning();
    },
  });
  enqueue("a1", "a");
  await manager.start();

  await waitFor(() => restarted);
  const count = fetches.length;
  await waitFor(() => fetches.length > count);
  await manager.stop();

  assert.equal(manager.isRunning(), false);
  assert.equal(linesWithMsg(lines, "worker started").length, 2);
  assert.equal(linesWithMsg(lines, "worker stopped").length, 1);
});

// ── Loop behaviour ─────────────────────────────────────────────────────────

test("the loop keeps going after a handler error", async () => {
  const { manager, enqueue } = harness();
  const handled: string[] = [];
  manager.subscribe({
    topicName: "a",
    handler: (task) => {
      handled.push(task.id);
      if (task.id === "a1") throw new Error("first one fails");
    },
  });
  enqueue("a1", "a");
  await manager.start();
  await waitFor(() => handled.length === 1);
  enqueue("a2", "a");
  await waitFor(() => handled.length === 2);
  await manager.stop();

  assert.deepEqual(handled, ["a1", "a2"]);
});

test("an unexpected failure in a cycle is logged and the next cycle runs", async () => {
  const { manager, fetches, lines } = harness();
  let failures = 1;
  manager.subscribe({
    topicName: "a",
    handler: () => {},
    get variableNames() {
      if (failures > 0) {
        failures--;
        throw new Error("snapshot broke");
      }
      return undefined;
    },
  });
  await manager.start();
  await waitFor(() => fetches.length >= 1);
  await manager.stop();

  const logged = linesWithMsg(lines, "exception while acquiring tasks");
  assert.equal(logged.length, 1);
  assert.equal(logged[0]?.level, 50);
  assert.equal(logged[0]?.err?.message, "snapshot broke");
});

test("an idle worker makes no calls until something subscribes", async () => {
  const { manager, fetches } = harness();
  await manager.start();
  await delay(20);
  assert.equal(fetches.length, 0);

  manager.subscribe({ topicName: "a", handler: () => {} });
  await waitFor(() => fetches.length >= 1);
  await manager.stop();
});

test("subscriptions made while stopped are picked up on the next start", async () => {
  const { manager, fetches, enqueue } = harness();
  await manager.start();
  await manager.stop();

  const handled: string[] = [];
  manager.subscribe({ topicName: "a", handler: (task) => void handled.push(task.id) });
  enqueue("a1", "a");
  await delay(20);
  assert.equal(fetches.length, 0);

  await manager.start();
  await waitFor(() => handled.length === 1);
  await manager.stop();
  assert.deepEqual(handled, ["a1"]);
});

// ── Backoff interplay ──────────────────────────────────────────────────────

test("stop cuts a backoff wait short", async () => {
  const { manager, fetches } = harness();
  manager.setBackoffStrategy(new ExponentialBackoffStrategy({ initTime: 60_000, maxTime: 60_000 }));
  manager.subscribe({ topicName: "a", handler: () => {} });
  await manager.start();
  await waitFor(() => fetches.length === 1);
  await delay(10);

  const started = Date.now();
  await manager.stop();
  assert.ok(Date.now() - started < 1_000);
  assert.equal(fetches.length, 1);
});

test("a new subscription cuts a backoff wait short", async () => {
  const { manager, fetches } = harness();
  manager.setBackoffStrategy(new ExponentialBackoffStrategy({ initTime: 60_000, maxTime: 60_000 }));
  manager.subscribe({ topicName: "a", handler: () => {} });
  await manager.start();
  await waitFor(() => fetches.length === 1);
  await delay(10);

  manager.subscribe({ topicName: "b", handler: () => {} });
  await waitFor(() => fetches.length === 2);
  await manager.stop();

  assert.deepEqual(
    fetches[1]?.map((t) => t.topicName),
    ["a", "b"]
  );
});

test("stop during an in-flight fetch does not wait out the backoff", async () => {
  const { manager, fetches, holdFetches } = harness();
  const release = gate();
  holdFetches(release.opened);
  manager.setBackoffStrategy(new ExponentialBackoffStrategy({ initTime: 60_000, maxTime: 60_000 }));
  manager.subscribe({ topicName: "a", handler: () => {} });
  await manager.start();
  await waitFor(() => fetches.length === 1);

  const started = Date.now();
  const stopping = manager.stop();
  await delay(20);
  release.open();
  await stopping;

  assert.ok(Date.now() - started < 1_000);
  assert.equal(fetches.length, 1);
});

test("a subscription made during an in-flight fetch is fetched without waiting out the backoff", async () => {
  const { manager, fetches, holdFetches } = harness();
  const release = gate();
  holdFetches(release.opened);
  manager.setBackoffStrategy(new ExponentialBackoffStrategy({ initTime: 60_000, maxTime: 60_000 }));
  manager.subscribe({ topicName: "a", handler: () => {} });
  await manager.start();
  await waitFor(() => fetches.length === 1);

  manager.subscribe({ topicName: "b", handler: () => {} });
  release.open();
  await waitFor(() => fetches.length === 2);
  await manager.stop();

  assert.deepEqual(
    fetches[1]?.map((t) => t.topicName),
    ["a", "b"]
  );
});
