import type { Citation } from "../contracts/evidence";
import type { Logger } from "../logger";
import type { ToolCallContext, ToolInvoker } from "./tool_client";

export const DEFAULT_KB_TOOL_NAME = "retrieve_from_aws_kb";
const KB_TOOL_SUFFIXES = ["retrieve-from-kb", "retrieve_from_aws_kb"];

export type KbRetrieval = {
  matches: Citation[];
  citations: string[];
  filters: Record<string, string>;
  reasonCodes: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function toCitation(item: unknown): Citation | null {
  if (!isRecord(item)) return null;
  const id = text(item.id);
  const snippet = text(item.snippet) || text(item.text);
  const citation = text(item.citation) || text(item.fileName) || id || "KB";
  const score = typeof item.score === "number" && Number.isFinite(item.score) ? item.score : 0;
  if (!id && !snippet) return null;
  return { id, snippet, citation, score };
}

/** The retrieval tool answers with a bare list or with `{ matches | sources: [...] }`. */
export function parseKbMatches(payload: unknown): Citation[] {
  let items: unknown[] = [];
  if (Array.isArray(payload)) items = payload;
  else if (isRecord(payload) && Array.isArray(payload.matches)) items = payload.matches;
  else if (isRecord(payload) && Array.isArray(payload.sources)) items = payload.sources;
  return items.map(toCitation).filter((item): item is Citation => item !== null);
}

export function uniqueCitations(matches: readonly Citation[]): string[] {
  const seen: string[] = [];
  for (const match of matches) {
    if (match.citation && !seen.includes(match.citation)) seen.push(match.citation);
  }
  return seen;
}

export type KbClientOptions = {
  invoker: ToolInvoker;
  knowledgeBaseId: string;
  toolName?: string;
  maxResults?: number;
  log: Logger;
};

/**
 * Knowledge-base retrieval through the tool gateway. The gateway may
 * prefix the retrieval tool's name, so it is looked up once with
 * `tools/list` and shared by every request afterwards.
 */
export class KbClient {
  private toolNamePromise?: Promise<string>;

  constructor(private readonly opts: KbClientOptions) {}

  get enabled(): boolean {
    return this.opts.knowledgeBaseId.length > 0;
  }

  resolveToolName(ctx: ToolCallContext): Promise<string> {
    if (this.opts.toolName) return Promise.resolve(this.opts.toolName);
    if (!this.toolNamePromise) {
      this.toolNamePromise = this.lookupToolName(ctx);
    }
    return this.toolNamePromise;
  }

  private async lookupToolName(ctx: ToolCallContext): Promise<string> {
    try {
      // Deferred so a synchronous throw lands here after resolveToolName has stored the promise.
      const names = await Promise.resolve().then(() => this.opts.invoker.listTools(ctx));
      const found = names.find((name) => KB_TOOL_SUFFIXES.some((suffix) => name.endsWith(suffix)));
      if (found) {
        this.opts.log.info({ evt: "kb.tool_resolved", tool: found }, "kb.tool_resolved");
        return found;
      }
    } catch (err) {
      // Let the next request try the lookup again.
      this.toolNamePromise = undefined;
      this.opts.log.warn({ evt: "kb.tool_list_failed", err: String(err) }, "kb.tool_list_failed");
    }
    return DEFAULT_KB_TOOL_NAME;
  }

  async retrieve(query: string, filters: Record<string, string>, ctx: ToolCallContext): Promise<KbRetrieval> {
    if (!this.enabled) {
      return { matches: [], citations: [], filters, reasonCodes: ["kb_disabled"] };
    }
    try {
      const toolName = await this.resolveToolName(ctx);
      const payload = await this.opts.invoker.call(
        toolName,
        { query, knowledgeBaseId: this.opts.knowledgeBaseId, n: this.opts.maxResults ?? 3 },
        ctx
      );
      const matches = parseKbMatches(payload);
      return { matches, citations: uniqueCitations(matches), filters, reasonCodes: [] };
    } catch (err) {
      this.opts.log.warn({ evt: "kb.unavailable", err: String(err) }, "kb.unavailable");
      return { matches: [], citations: [], filters, reasonCodes: ["kb_unavailable"] };
    }
  }
}
