import { LATEST_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from "@modelcontextprotocol/sdk/types.js";

export type VersionPolicyName = "strict" | "permissive";

/** Decides which protocol version a session speaks, given the client's request. */
export interface VersionPolicy {
  readonly name: VersionPolicyName;
  readonly supported: readonly string[];
  /** The version to answer with, or `undefined` to reject the handshake. */
  negotiate(requested: string): string | undefined;
}

/** Only versions the server implements are accepted, echoed back unchanged. */
export function strictVersionPolicy(supported: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS): VersionPolicy {
  return {
    name: "strict",
    supported,
    negotiate: (requested) => (supported.includes(requested) ? requested : undefined),
  };
}

/** Unknown versions are answered with `fallback` and the client decides whether to continue. */
export function permissiveVersionPolicy(
  supported: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS,
  fallback: string = LATEST_PROTOCOL_VERSION,
): VersionPolicy {
  return {
    name: "permissive",
    supported,
    negotiate: (requested) => (supported.includes(requested) ? requested : fallback),
  };
}

export function versionPolicyFor(name: VersionPolicyName): VersionPolicy {
  return name === "strict" ? strictVersionPolicy() : permissiveVersionPolicy();
}
