// ---- JSON-RPC error codes ----
// -32000 to -32099 is the JSON-RPC "server error" range.

export const PROTOCOL_VERSION_MISMATCH = -32001;
export const RESOURCE_NOT_FOUND = -32002;
export const RATE_LIMIT_EXCEEDED = -32003;

export class VaultMcpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "VaultMcpError";
  }
}

export class DecryptionError extends VaultMcpError {
  constructor(reason: string) {
    super(`Decryption failed: ${reason}`, "DECRYPTION_FAILED");
    this.name = "DecryptionError";
  }
}

export class StoreUnavailableError extends VaultMcpError {
  constructor(operation: string, cause: string) {
    super(`Document store unavailable during ${operation}: ${cause}`, "STORE_UNAVAILABLE");
    this.name = "StoreUnavailableError";
  }
}

export class CursorError extends VaultMcpError {
  constructor(message = "Invalid cursor token") {
    super(message, "INVALID_CURSOR");
    this.name = "CursorError";
  }
}

export class LimitError extends VaultMcpError {
  constructor(message: string) {
    super(message, "INVALID_LIMIT");
    this.name = "LimitError";
  }
}

export class ProtocolVersionMismatchError extends VaultMcpError {
  constructor(
    public readonly requested: string,
    public readonly supported: readonly string[],
  ) {
    super(
      `Unsupported protocol version '${requested}'. Supported versions: ${supported.join(", ")}`,
      "PROTOCOL_VERSION_MISMATCH",
    );
    this.name = "ProtocolVersionMismatchError";
  }
}

export class RateLimitExceededError extends VaultMcpError {
  constructor(public readonly key: string) {
    super("Rate limit exceeded. Please wait before making more requests.", "RATE_LIMIT_EXCEEDED");
    this.name = "RateLimitExceededError";
  }
}

export class ResourceNotFoundError extends VaultMcpError {
  constructor(public readonly uri: string) {
    super(`Resource not found: ${uri}`, "RESOURCE_NOT_FOUND");
    this.name = "ResourceNotFoundError";
  }
}

export class SessionSequenceError extends VaultMcpError {
  constructor(method: string) {
    super(`Received '${method}' before initialization was complete`, "NOT_INITIALIZED");
    this.name = "SessionSequenceError";
  }
}

export class InvalidParameterError extends VaultMcpError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

export class ConfigError extends VaultMcpError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}
