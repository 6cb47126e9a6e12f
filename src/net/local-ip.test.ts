import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { serverUrl } from "./local-ip.js";

describe("serverUrl", () => {
  it("builds the root URL for a host and port", () => {
    assert.equal(serverUrl("192.168.1.20", 8000), "http://192.168.1.20:8000/");
    assert.equal(serverUrl("127.0.0.1", 54321), "http://127.0.0.1:54321/");
  });
});
