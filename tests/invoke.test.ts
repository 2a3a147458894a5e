import { describe, it, expect } from "vitest";
import { invokeHashBtcHeader, invokeBatch } from "../src/service/invoke.js";
import { CallOutcomeSchema } from "../src/contracts/schemas.js";
import { DEFAULT_MAX_INPUT_BYTES } from "../src/hash/hashing.js";
import { GENESIS_HEADER, GENESIS_HASH256, HELLO_HASH256 } from "./fixtures.js";

const REQUEST_ID = "a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d";
const UUID_V4_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function text(payloadHex: string): string {
  return Buffer.from(payloadHex, "hex").toString("utf8");
}

// ===================================================================
// invokeHashBtcHeader
// ===================================================================

describe("invokeHashBtcHeader", () => {
  it("returns a success outcome with the digest", () => {
    expect(
      invokeHashBtcHeader({ headerHex: "68656c6c6f", requestId: REQUEST_ID }),
    ).toEqual({ status: "success", requestId: REQUEST_ID, output: HELLO_HASH256 });
  });

  it("generates a request id when none is given", () => {
    const outcome = invokeHashBtcHeader({ headerHex: GENESIS_HEADER });
    expect(outcome.requestId).toMatch(UUID_V4_RE);
    expect(outcome).toMatchObject({ status: "success", output: GENESIS_HASH256 });
  });

  it("returns an empty payload on decode failure", () => {
    expect(
      invokeHashBtcHeader({ headerHex: "xyz", requestId: REQUEST_ID }),
    ).toEqual({
      status: "failure",
      requestId: REQUEST_ID,
      code: "DECODE_ERROR",
      payload: "",
    });
  });

  it("carries the message as payload for size failures", () => {
    const outcome = invokeHashBtcHeader(
      { headerHex: "aabbcc", requestId: REQUEST_ID },
      { maxInputBytes: 2 },
    );
    expect(outcome).toEqual({
      status: "failure",
      requestId: REQUEST_ID,
      code: "INPUT_TOO_LARGE",
      payload: "496e70757420657863656564732032206279746573",
    });
  });

  it("bounds input size when no options are passed", () => {
    const outcome = invokeHashBtcHeader({
      headerHex: "00".repeat(DEFAULT_MAX_INPUT_BYTES + 1),
      requestId: REQUEST_ID,
    });
    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.code).toBe("INPUT_TOO_LARGE");
      expect(text(outcome.payload)).toBe("Input exceeds 1048576 bytes");
    }
  });

  it("accepts input at the default bound", () => {
    const outcome = invokeHashBtcHeader({
      headerHex: "00".repeat(DEFAULT_MAX_INPUT_BYTES),
    });
    expect(outcome.status).toBe("success");
  });

  it("lets the caller raise the bound", () => {
    const outcome = invokeHashBtcHeader(
      { headerHex: "00".repeat(DEFAULT_MAX_INPUT_BYTES + 1) },
      { maxInputBytes: DEFAULT_MAX_INPUT_BYTES + 1 },
    );
    expect(outcome.status).toBe("success");
  });

  it("honours requireHeaderLength", () => {
    const outcome = invokeHashBtcHeader(
      { headerHex: "00", requestId: REQUEST_ID },
      { requireHeaderLength: true },
    );
    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.code).toBe("HEADER_LENGTH_INVALID");
      expect(text(outcome.payload)).toBe(
        "Block header must be 80 bytes, got 1",
      );
    }
  });

  it("rejects a non-string headerHex as REQUEST_INVALID", () => {
    const outcome = invokeHashBtcHeader({ headerHex: 42 });
    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.code).toBe("REQUEST_INVALID");
      expect(outcome.requestId).toMatch(UUID_V4_RE);
    }
  });

  it("rejects a malformed requestId", () => {
    const outcome = invokeHashBtcHeader({ headerHex: "00", requestId: "r-1" });
    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") expect(outcome.code).toBe("REQUEST_INVALID");
  });

  it("rejects non-object requests", () => {
    expect(invokeHashBtcHeader(null).status).toBe("failure");
    expect(invokeHashBtcHeader("00").status).toBe("failure");
  });

  it("tolerates extra request fields", () => {
    const outcome = invokeHashBtcHeader({
      headerHex: "68656c6c6f",
      requestId: REQUEST_ID,
      note: "extra",
    });
    expect(outcome.status).toBe("success");
  });

  it("produces outcomes that satisfy CallOutcomeSchema", () => {
    const outcomes = [
      invokeHashBtcHeader({ headerHex: "00" }),
      invokeHashBtcHeader({ headerHex: "0" }),
      invokeHashBtcHeader({}),
    ];
    for (const o of outcomes) {
      expect(CallOutcomeSchema.safeParse(o).success).toBe(true);
    }
  });
});

// ===================================================================
// invokeBatch
// ===================================================================

describe("invokeBatch", () => {
  it("hashes each request independently and in order", () => {
    const result = invokeBatch({
      requests: [
        { headerHex: "68656c6c6f", requestId: REQUEST_ID },
        { headerHex: "nothex" },
        { headerHex: GENESIS_HEADER },
      ],
    });
    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.succeeded).toBe(2);
    expect(result.failed).toBe(1);
    expect(result.outcomes.map((o) => o.status)).toEqual([
      "success",
      "failure",
      "success",
    ]);
    expect(result.outcomes[0]).toEqual({
      status: "success",
      requestId: REQUEST_ID,
      output: HELLO_HASH256,
    });
  });

  it("applies options to every request", () => {
    const result = invokeBatch(
      { requests: [{ headerHex: "00" }, { headerHex: GENESIS_HEADER }] },
      { requireHeaderLength: true },
    );
    expect(result.valid && result.failed).toBe(1);
  });

  it("bounds every request by default", () => {
    const result = invokeBatch({
      requests: [
        { headerHex: "68656c6c6f" },
        { headerHex: "00".repeat(DEFAULT_MAX_INPUT_BYTES + 1) },
      ],
    });
    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.outcomes[1]).toMatchObject({
      status: "failure",
      code: "INPUT_TOO_LARGE",
    });
  });

  it("rejects an empty batch", () => {
    expect(invokeBatch({ requests: [] }).valid).toBe(false);
  });

  it("rejects a missing requests array", () => {
    expect(invokeBatch({ headerHex: "00" }).valid).toBe(false);
  });

  it("rejects more than 1000 requests", () => {
    const requests = Array.from({ length: 1001 }, () => ({ headerHex: "" }));
    expect(invokeBatch({ requests }).valid).toBe(false);
  });
});
