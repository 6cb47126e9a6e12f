import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Limiter } from "./limiter.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("Limiter", () => {
  it("admits up to max at once and queues the rest in order", async () => {
    const limiter = new Limiter(2);
    const admitted: string[] = [];

    for (const id of ["a", "b", "c", "d"]) {
      limiter.acquire().then(() => admitted.push(id));
    }
    await tick();
    assert.deepEqual(admitted, ["a", "b"]);
    assert.equal(limiter.running, 2);
    assert.equal(limiter.queued, 2);

    limiter.release();
    await tick();
    assert.deepEqual(admitted, ["a", "b", "c"]);
    assert.equal(limiter.running, 2);
    assert.equal(limiter.queued, 1);

    limiter.release();
    limiter.release();
    limiter.release();
    await tick();
    assert.deepEqual(admitted, ["a", "b", "c", "d"]);
    assert.equal(limiter.running, 0);
    assert.equal(limiter.queued, 0);
  });

  it("does not go below zero on extra releases", () => {
    const limiter = new Limiter(1);
    limiter.release();
    assert.equal(limiter.running, 0);
  });

  it("rejects a non-positive max", () => {
    assert.throws(() => new Limiter(0), RangeError);
    assert.throws(() => new Limiter(1.5), RangeError);
  });
});
