import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { isClientDisconnect, unquotePath } from "./file-handler.js";

describe("unquotePath", () => {
  it("decodes percent escapes as UTF-8", () => {
    assert.equal(unquotePath("caf%C3%A9%20menu.txt"), "café menu.txt");
    assert.equal(unquotePath("..%2Fsecret.txt"), "../secret.txt");
  });

  it("leaves plain text and stray percent signs alone", () => {
    assert.equal(unquotePath("a+b.txt"), "a+b.txt");
    assert.equal(unquotePath("100%.txt"), "100%.txt");
  });

  it("replaces malformed sequences instead of throwing", () => {
    assert.equal(unquotePath("%E0%A4%A"), "�%A");
    assert.equal(unquotePath("%FF.txt"), "�.txt");
  });
});

describe("isClientDisconnect", () => {
  it("recognizes a destination closed mid-stream", async () => {
    const source = new Readable({ read() {} });
    const sink = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    const done = pipeline(source, sink);
    sink.destroy();

    await assert.rejects(done, (err) => {
      assert.equal(isClientDisconnect(err), true);
      return true;
    });
  });

  it("recognizes socket resets", () => {
    assert.equal(isClientDisconnect(Object.assign(new Error("reset"), { code: "ECONNRESET" })), true);
    assert.equal(isClientDisconnect(Object.assign(new Error("pipe"), { code: "EPIPE" })), true);
  });

  it("rejects other failures", () => {
    assert.equal(isClientDisconnect(new Error("boom")), false);
    assert.equal(isClientDisconnect(Object.assign(new Error("io"), { code: "EIO" })), false);
    assert.equal(isClientDisconnect("ECONNRESET"), false);
  });
});
