import { z } from "zod";
import { textResult, type ToolRegistry } from "./registry.js";

export function registerPingTool(tools: ToolRegistry): void {
  tools.registerTool(
    "ping",
    {
      description: "Liveness check. Returns 'pong'.",
      inputSchema: z.object({}),
    },
    async () => textResult("pong"),
  );
}
