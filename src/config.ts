import { z } from "zod";
import { ConfigError } from "./errors.js";

const flag = z.stringbool().default(false);

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  COUCHDB_URL: z.url(),
  COUCHDB_DATABASE: z.string().min(1),
  COUCHDB_USER: z.string().min(1),
  COUCHDB_PASSWORD: z.string().min(1),
  VAULT_PASSPHRASE: optionalSecret,
  USE_PATH_OBFUSCATION: flag,
  VAULT_ID: z.string().min(1).default("default"),
  URI_SCHEME: z
    .string()
    .regex(/^[a-z][a-z0-9+.-]*$/, "must be a lower-case URI scheme")
    .default("mcp-obsidian"),
  SERVER_HOST: z.string().min(1).default("127.0.0.1"),
  SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  MCP_API_KEY: optionalSecret,
  RATE_LIMIT_REQUESTS_PER_MINUTE: positiveInt(60),
  RATE_LIMIT_BURST_SIZE: positiveInt(10),
  PATH_SCAN_LIMIT: positiveInt(500),
  SEARCH_SCAN_LIMIT: positiveInt(5000),
  SCAN_BATCH_SIZE: positiveInt(200),
  BROWSE_OVERFETCH: positiveInt(2),
  SEARCH_PAGE_FACTOR: positiveInt(3),
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  SESSION_IDLE_TIMEOUT_MS: positiveInt(1_800_000),
  PROTOCOL_VERSION_POLICY: z.enum(["strict", "permissive"]).default("strict"),
});

export interface AppConfig {
  couch: {
    url: string;
    database: string;
    user: string;
    password: string;
    requestTimeoutMs: number;
  };
  vault: {
    passphrase?: string;
    usePathObfuscation: boolean;
    vaultId: string;
    uriScheme: string;
  };
  scan: {
    pathScanLimit: number;
    searchScanLimit: number;
    batchSize: number;
    browseOverfetch: number;
    searchPageFactor: number;
  };
  http: {
    host: string;
    port: number;
    apiKey?: string;
    sessionIdleTimeoutMs: number;
  };
  rateLimit: {
    requestsPerMinute: number;
    burstSize: number;
  };
  protocolVersionPolicy: "strict" | "permissive";
}

/** Reads and validates configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    couch: {
      url: e.COUCHDB_URL,
      database: e.COUCHDB_DATABASE,
      user: e.COUCHDB_USER,
      password: e.COUCHDB_PASSWORD,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    vault: {
      passphrase: e.VAULT_PASSPHRASE,
      usePathObfuscation: e.USE_PATH_OBFUSCATION,
      vaultId: e.VAULT_ID,
      uriScheme: e.URI_SCHEME,
    },
    scan: {
      pathScanLimit: e.PATH_SCAN_LIMIT,
      searchScanLimit: e.SEARCH_SCAN_LIMIT,
      batchSize: e.SCAN_BATCH_SIZE,
      browseOverfetch: e.BROWSE_OVERFETCH,
      searchPageFactor: e.SEARCH_PAGE_FACTOR,
    },
    http: {
      host: e.SERVER_HOST,
      port: e.SERVER_PORT,
      apiKey: e.MCP_API_KEY,
      sessionIdleTimeoutMs: e.SESSION_IDLE_TIMEOUT_MS,
    },
    rateLimit: {
      requestsPerMinute: e.RATE_LIMIT_REQUESTS_PER_MINUTE,
      burstSize: e.RATE_LIMIT_BURST_SIZE,
    },
    protocolVersionPolicy: e.PROTOCOL_VERSION_POLICY,
  };
}
