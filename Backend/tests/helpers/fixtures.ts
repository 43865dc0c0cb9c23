import type { LLMProvider, LLMRequest, LLMResponse } from "../../src/ai/llm/llm-providers";
import type { PostRecord, Source } from "../../src/leadgen/types";

const HOSTS: Record<Source, string> = {
  reddit: "https://www.reddit.com/r/sales/comments",
  linkedin: "https://www.linkedin.com/posts",
  x: "https://x.com/someone/status",
};

export function post(source: Source, id: string, extra: Partial<PostRecord> = {}): PostRecord {
  return {
    source,
    title: `${source} post ${id}`,
    url: `${HOSTS[source]}/${id}`,
    snippet: "",
    ...extra,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export interface FakeProviderOptions {
  reply?: (req: LLMRequest) => string;
  chunks?: string[];
  streamError?: Error;
}

/** In-process LLMProvider: answers from `reply`, streams `chunks`, records requests. */
export class FakeProvider implements LLMProvider {
  readonly name = "fake";
  readonly calls: LLMRequest[] = [];
  readonly streamed: LLMRequest[] = [];

  constructor(private readonly opts: FakeProviderOptions = {}) {}

  async call(req: LLMRequest): Promise<LLMResponse> {
    this.calls.push(req);
    const content = this.opts.reply ? this.opts.reply(req) : "";
    return { provider: this.name, model: "fake-model", content };
  }

  async *stream(req: LLMRequest): AsyncGenerator<string, void, void> {
    this.streamed.push(req);
    for (const c of this.opts.chunks ?? []) yield c;
    if (this.opts.streamError) throw this.opts.streamError;
  }
}
