import debug from "debug";
import { v4 as uuidv4 } from "uuid";
import type { Session } from "./session.js";

const log = debug("couch-notes:protocol");

export interface SessionRegistryOptions {
  createSession: (id: string) => Session;
  /** Sessions untouched for this long are closed by `sweep()`. */
  idleTimeoutMs: number;
  /** Interval of the background sweep; 0 disables it. */
  sweepIntervalMs?: number;
  now?: () => number;
}

interface Entry {
  session: Session;
  lastSeen: number;
}

/** Session id → session for the HTTP transports. */
export class SessionRegistry {
  private readonly sessions = new Map<string, Entry>();
  private readonly now: () => number;
  private readonly timer: NodeJS.Timeout | undefined;

  constructor(private readonly options: SessionRegistryOptions) {
    this.now = options.now ?? Date.now;
    const interval = options.sweepIntervalMs ?? Math.min(60_000, options.idleTimeoutMs);
    if (interval > 0) {
      this.timer = setInterval(() => this.sweep(), interval);
      this.timer.unref();
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  /** New session with a fresh id, its dispatch loop already running. */
  create(): Session {
    const id = uuidv4();
    const session = this.options.createSession(id);
    this.sessions.set(id, { session, lastSeen: this.now() });
    session.onClose(() => this.sessions.delete(id));
    session.start().catch((err: unknown) => {
      console.error(`[couch-notes] session ${id} dispatch loop failed: ${err instanceof Error ? err.message : String(err)}`);
      session.close();
    });
    log("session %s created (%d open)", id, this.sessions.size);
    return session;
  }

  /** Looks up a session and marks it as active. */
  get(id: string): Session | undefined {
    const entry = this.sessions.get(id);
    if (!entry) return undefined;
    entry.lastSeen = this.now();
    return entry.session;
  }

  delete(id: string): boolean {
    const entry = this.sessions.get(id);
    if (!entry) return false;
    entry.session.close();
    this.sessions.delete(id);
    return true;
  }

  /** Closes idle sessions; returns how many were closed. */
  sweep(): number {
    const cutoff = this.now() - this.options.idleTimeoutMs;
    let closed = 0;
    for (const [id, entry] of this.sessions) {
      if (entry.lastSeen <= cutoff) {
        log("session %s idle since %d, closing", id, entry.lastSeen);
        this.delete(id);
        closed++;
      }
    }
    return closed;
  }

  closeAll(): void {
    if (this.timer) clearInterval(this.timer);
    for (const id of [...this.sessions.keys()]) this.delete(id);
  }
}
