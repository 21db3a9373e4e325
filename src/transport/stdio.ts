import debug from "debug";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Session } from "../protocol/session.js";

const log = debug("couch-notes:protocol");

async function pumpOutbound(session: Session, transport: Transport): Promise<void> {
  for (;;) {
    const message = await session.outbound.next();
    if (message === undefined) return;
    await transport.send(message);
  }
}

/**
 * Binds one session to a message transport (the process's stdin/stdout in
 * production) and runs it. Resolves once either side closes.
 */
export async function runStdio(session: Session, transport: Transport): Promise<void> {
  transport.onmessage = (message) => {
    session.inbound.push(message);
  };
  transport.onerror = (err) => {
    log("transport error: %s", err.message);
  };
  transport.onclose = () => session.close();

  await transport.start();
  const loop = session.start();
  try {
    await pumpOutbound(session, transport);
  } finally {
    session.close();
    await loop;
    await transport.close();
  }
}
