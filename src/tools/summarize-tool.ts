import { z } from "zod";
import { InvalidParameterError, ResourceNotFoundError } from "../errors.js";
import type { ContentReconstructor } from "../vault/content.js";
import { extractTitle, parseFrontmatter } from "../vault/notes.js";
import type { NoteUri } from "../vault/uri.js";
import { textResult, type ToolRegistry } from "./registry.js";

export interface SummarizeDeps {
  content: ContentReconstructor;
  uris: NoteUri;
}

export interface Summary {
  text: string;
  wordCount: number;
  truncated: boolean;
}

/** First `maxWords` words of `body`, whitespace collapsed. */
export function summarize(body: string, maxWords: number): Summary {
  const words = body.split(/\s+/).filter(Boolean);
  const truncated = words.length > maxWords;
  const kept = truncated ? words.slice(0, maxWords) : words;
  return { text: kept.join(" ") + (truncated ? " …" : ""), wordCount: words.length, truncated };
}

export function registerSummarizeTool(tools: ToolRegistry, deps: SummarizeDeps): void {
  tools.registerTool(
    "summarise_note",
    {
      title: "Summarise note",
      description:
        "Summarise a note by returning the opening of its body (frontmatter removed), cut to a word budget. " +
        "Pass the note URI as returned by find_notes or resources/list.",
      inputSchema: z.object({
        uri: z.string().min(1).describe("URI of the note to summarise."),
        max_words: z.number().int().min(1).max(5000).default(300).describe("Word budget for the summary."),
      }),
    },
    async ({ uri, max_words }) => {
      const path = deps.uris.decode(uri);
      if (path === undefined) throw new InvalidParameterError(`Invalid note URI: ${uri}`);

      const content = await deps.content.getContent(path);
      if (content === undefined) throw new ResourceNotFoundError(uri);

      const { body } = parseFrontmatter(content);
      const summary = summarize(body, max_words);
      return textResult({
        uri,
        path,
        title: extractTitle(body, path),
        word_count: summary.wordCount,
        truncated: summary.truncated,
        summary: summary.text,
      });
    },
  );
}
