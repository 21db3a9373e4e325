import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import {
  ConfigError,
  CursorError,
  DecryptionError,
  InvalidParameterError,
  LimitError,
  ProtocolVersionMismatchError,
  RateLimitExceededError,
  ResourceNotFoundError,
  SessionSequenceError,
  StoreUnavailableError,
  VaultMcpError,
} from "../src/errors.js";
import { toJsonRpcError } from "../src/protocol/dispatcher.js";

describe("error classes", () => {
  it("all domain errors extend VaultMcpError with a code and name", () => {
    const errors = [
      new DecryptionError("bad tag"),
      new StoreUnavailableError("query", "ECONNREFUSED"),
      new CursorError(),
      new LimitError("limit must be an integer"),
      new ProtocolVersionMismatchError("1999-01-01", ["2025-06-18"]),
      new RateLimitExceededError("tools/call"),
      new ResourceNotFoundError("mcp-obsidian://default/missing.md"),
      new SessionSequenceError("tools/list"),
      new InvalidParameterError("bad"),
      new ConfigError(["COUCHDB_URL: Invalid URL"]),
    ];
    for (const err of errors) {
      assert.ok(err instanceof VaultMcpError);
      assert.ok(err instanceof Error);
      assert.notEqual(err.name, "VaultMcpError");
    }
    assert.deepEqual(
      errors.map((e) => e.code),
      [
        "DECRYPTION_FAILED",
        "STORE_UNAVAILABLE",
        "INVALID_CURSOR",
        "INVALID_LIMIT",
        "PROTOCOL_VERSION_MISMATCH",
        "RATE_LIMIT_EXCEEDED",
        "RESOURCE_NOT_FOUND",
        "NOT_INITIALIZED",
        "INVALID_PARAMETER",
        "INVALID_CONFIG",
      ],
    );
  });

  it("formats messages", () => {
    assert.equal(new DecryptionError("bad tag").message, "Decryption failed: bad tag");
    assert.equal(new SessionSequenceError("tools/list").message, "Received 'tools/list' before initialization was complete");
    assert.equal(new ConfigError(["A: x", "B: y"]).message, "Invalid configuration:\n  A: x\n  B: y");
  });
});

describe("toJsonRpcError", () => {
  it("maps the version mismatch to -32001 with the supported list", () => {
    const body = toJsonRpcError(new ProtocolVersionMismatchError("1999-01-01", ["2025-03-26", "2025-06-18"]));
    assert.equal(body.code, -32001);
    assert.deepEqual(body.data, { requested: "1999-01-01", supported: ["2025-03-26", "2025-06-18"] });
  });

  it("maps not-found and rate limiting to their server codes", () => {
    const notFound = toJsonRpcError(new ResourceNotFoundError("mcp-obsidian://default/x.md"));
    assert.deepEqual(notFound, {
      code: -32002,
      message: "Resource not found: mcp-obsidian://default/x.md",
      data: { uri: "mcp-obsidian://default/x.md" },
    });
    assert.deepEqual(toJsonRpcError(new RateLimitExceededError("tools/call")), {
      code: -32003,
      message: "Rate limit exceeded. Please wait before making more requests.",
    });
  });

  it("maps cursor, limit and parameter errors to invalid params", () => {
    assert.equal(toJsonRpcError(new CursorError()).code, ErrorCode.InvalidParams);
    assert.equal(toJsonRpcError(new LimitError("too big")).code, ErrorCode.InvalidParams);
    assert.equal(toJsonRpcError(new InvalidParameterError("nope")).code, ErrorCode.InvalidParams);
  });

  it("maps sequencing faults to invalid request", () => {
    assert.deepEqual(toJsonRpcError(new SessionSequenceError("resources/list")), {
      code: ErrorCode.InvalidRequest,
      message: "Received 'resources/list' before initialization was complete",
    });
  });

  it("passes McpError codes through", () => {
    const body = toJsonRpcError(new McpError(ErrorCode.MethodNotFound, "Method not found: x"));
    assert.equal(body.code, -32601);
  });

  it("turns anything else into an internal error", () => {
    const body = toJsonRpcError(new TypeError("boom"));
    assert.deepEqual(body, { code: ErrorCode.InternalError, message: "Internal error: boom" });
  });
});
