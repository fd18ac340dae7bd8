import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  FetchTransport,
  TransportError,
  bearer,
  classifyFetchError,
  parseJsonBody,
  type FetchInit,
  type FetchLike
} from "../src/transport.js";

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("classifyFetchError", () => {
  it("recognises certificate failures in the cause", () => {
    const error = new TypeError("fetch failed", {
      cause: codedError("unable to verify the first certificate", "UNABLE_TO_VERIFY_LEAF_SIGNATURE")
    });
    assert.equal(classifyFetchError(error), "tls");
  });

  it("recognises connect timeouts and aborted requests", () => {
    assert.equal(
      classifyFetchError(new TypeError("fetch failed", { cause: codedError("timeout", "UND_ERR_CONNECT_TIMEOUT") })),
      "timeout"
    );
    const aborted = new Error("The operation was aborted due to timeout");
    aborted.name = "TimeoutError";
    assert.equal(classifyFetchError(aborted), "timeout");
  });

  it("treats everything else as a network failure", () => {
    assert.equal(
      classifyFetchError(new TypeError("fetch failed", { cause: codedError("refused", "ECONNREFUSED") })),
      "network"
    );
    assert.equal(classifyFetchError("boom"), "network");
  });
});

describe("FetchTransport", () => {
  it("returns status and body and sends JSON accept plus extra headers", async () => {
    const seen: Array<{ url: string; init: FetchInit }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
      seen.push({ url, init });
      return { status: 200, text: async () => '{"ok":true}' };
    };
    const transport = new FetchTransport({ timeoutMs: 3050, fetchImpl });

    try {
      const response = await transport.get("https://mc.example.org/info", {
        headers: bearer("test-token"),
        verify: true
      });

      assert.deepEqual(response, {
        url: "https://mc.example.org/info",
        status: 200,
        body: '{"ok":true}',
        fromCache: false
      });
      assert.equal(seen.length, 1);
      assert.equal(seen[0].init.method, "GET");
      assert.deepEqual(seen[0].init.headers, {
        accept: "application/json",
        Authorization: "Bearer test-token"
      });
    } finally {
      await transport.close();
    }
  });

  it("uses separate dispatchers for verified and unverified requests", async () => {
    const dispatchers: FetchInit["dispatcher"][] = [];
    const fetchImpl: FetchLike = async (_url, init) => {
      dispatchers.push(init.dispatcher);
      return { status: 204, text: async () => "" };
    };
    const transport = new FetchTransport({ timeoutMs: 1000, fetchImpl });

    try {
      await transport.get("https://a.example.org", { verify: true });
      await transport.get("https://a.example.org", { verify: false });
      await transport.get("https://b.example.org", { verify: true });

      assert.equal(dispatchers[0], dispatchers[2]);
      assert.notEqual(dispatchers[0], dispatchers[1]);
    } finally {
      await transport.close();
    }
  });

  it("wraps fetch failures in a classified TransportError", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError("fetch failed", { cause: codedError("certificate has expired", "CERT_HAS_EXPIRED") });
    };
    const transport = new FetchTransport({ timeoutMs: 1000, fetchImpl });

    try {
      await assert.rejects(
        () => transport.get("https://mc.example.org", { verify: true }),
        (error: unknown) => {
          assert.ok(error instanceof TransportError);
          assert.equal(error.kind, "tls");
          assert.equal(error.url, "https://mc.example.org");
          assert.equal(error.message, "GET https://mc.example.org failed (tls): certificate has expired");
          return true;
        }
      );
    } finally {
      await transport.close();
    }
  });
});

describe("parseJsonBody", () => {
  it("returns undefined for bodies that are not JSON", () => {
    assert.equal(parseJsonBody("<html>"), undefined);
    assert.deepEqual(parseJsonBody('{"a":1}'), { a: 1 });
  });
});
