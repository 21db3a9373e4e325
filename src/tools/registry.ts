import { z } from "zod";
import { ErrorCode, McpError, type CallToolResult, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { VaultMcpError } from "../errors.js";

export interface ToolConfig<S extends z.ZodType> {
  title?: string;
  description: string;
  inputSchema: S;
}

export type ToolHandler<S extends z.ZodType> = (args: z.output<S>) => Promise<CallToolResult>;

interface RegisteredTool {
  tool: Tool;
  invoke(args: unknown): Promise<CallToolResult>;
}

const jsonObjectSchema = z.object({
  properties: z.record(z.string(), z.unknown()).optional(),
  required: z.array(z.string()).optional(),
});

export function textResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }] };
}

export function errorResult(message: string): CallToolResult {
  return { isError: true, content: [{ type: "text", text: message }] };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Static tool catalog. Arguments are validated before a handler runs; domain
 * errors thrown by a handler come back as an `isError` result.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  registerTool<S extends z.ZodType>(name: string, config: ToolConfig<S>, handler: ToolHandler<S>): void {
    if (this.tools.has(name)) throw new Error(`Tool already registered: ${name}`);

    const json = jsonObjectSchema.parse(z.toJSONSchema(config.inputSchema, { io: "input" }));
    const tool: Tool = {
      name,
      description: config.description,
      inputSchema: { type: "object", properties: json.properties ?? {} },
      annotations: { readOnlyHint: true },
    };
    if (config.title) tool.title = config.title;
    if (json.required && json.required.length > 0) tool.inputSchema.required = json.required;

    this.tools.set(name, {
      tool,
      invoke: async (args) => {
        const parsed = config.inputSchema.safeParse(args ?? {});
        if (!parsed.success) {
          throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool ${name}: ${describeIssues(parsed.error)}`);
        }
        try {
          return await handler(parsed.data);
        } catch (err) {
          if (err instanceof VaultMcpError) return errorResult(err.message);
          throw err;
        }
      },
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Catalog sorted by name. */
  list(): Tool[] {
    return [...this.tools.values()].map((entry) => entry.tool).sort((a, b) => a.name.localeCompare(b.name));
  }

  async call(name: string, args: unknown): Promise<CallToolResult> {
    const entry = this.tools.get(name);
    if (!entry) throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    return entry.invoke(args);
  }
}
