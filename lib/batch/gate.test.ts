import assert from "node:assert/strict";
import test from "node:test";
import { PipelineConfigError } from "./errors";
import { assertSchedulerPreconditions, ConcurrencyGate } from "./gate";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

test("permits are granted in request order once capacity frees up", async () => {
  const gate = new ConcurrencyGate(1);
  const granted: string[] = [];

  const releaseFirst = await gate.acquire();
  const second = gate.acquire().then((release) => {
    granted.push("second");
    return release;
  });
  const third = gate.acquire().then((release) => {
    granted.push("third");
    return release;
  });
  assert.deepEqual(gate.getState(), { capacity: 1, inUse: 1, waiting: 2 });

  releaseFirst();
  const releaseSecond = await second;
  assert.deepEqual(granted, ["second"]);
  releaseSecond();
  const releaseThird = await third;
  assert.deepEqual(granted, ["second", "third"]);
  releaseThird();
  assert.equal(gate.inUse, 0);
});

test("a release handle frees its permit only once", async () => {
  const gate = new ConcurrencyGate(2);
  const first = await gate.acquire();
  await gate.acquire();
  first();
  first();
  assert.equal(gate.inUse, 1);
});

test("run releases the permit when the work throws", async () => {
  const gate = new ConcurrencyGate(1);
  await assert.rejects(
    gate.run(async () => {
      throw new Error("boom");
    }),
    /boom/,
  );
  assert.equal(gate.inUse, 0);
  assert.equal(await gate.run(async () => "ok"), "ok");
});

test("an aborted waiter leaves the queue without taking a permit", async () => {
  const gate = new ConcurrencyGate(1);
  const release = await gate.acquire();
  const controller = new AbortController();
  const waiting = gate.acquire(controller.signal);
  assert.equal(gate.waiting, 1);

  controller.abort();
  await assert.rejects(waiting, { name: "AbortError" });
  assert.equal(gate.waiting, 0);

  release();
  assert.equal(gate.inUse, 0);
});

test("never more than capacity holders at once", async () => {
  const gate = new ConcurrencyGate(3);
  let current = 0;
  let peak = 0;
  await Promise.all(
    Array.from({ length: 10 }, (_, i) =>
      gate.run(async () => {
        current += 1;
        peak = Math.max(peak, current);
        await delay(5 + (i % 3) * 3);
        current -= 1;
      }),
    ),
  );
  assert.equal(peak, 3);
});

test("raising capacity admits queued waiters immediately", async () => {
  const gate = new ConcurrencyGate(1);
  await gate.acquire();
  const pending = gate.acquire();
  gate.setCapacity(2);
  const release = await pending;
  assert.equal(gate.inUse, 2);
  release();
});

test("scheduler preconditions reject batches larger than the gate", () => {
  assert.throws(
    () => assertSchedulerPreconditions({ batchSize: 6, maxConcurrent: 5 }),
    (error: unknown) =>
      error instanceof PipelineConfigError && error.message === "batchSize (6) must not exceed maxConcurrent (5)",
  );
  assert.doesNotThrow(() => assertSchedulerPreconditions({ batchSize: 5, maxConcurrent: 5 }));
});
