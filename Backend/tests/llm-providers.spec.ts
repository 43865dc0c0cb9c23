// tests/llm-providers.spec.ts
import { describe, it, expect, vi, type Mock } from "vitest";
import { OpenAICompatibleProvider, buildProvider, parseStreamLine } from "../src/ai/llm/llm-providers";
import { HttpPool, type FetchLike } from "../src/ops/http-pool";
import { jsonResponse } from "./helpers/fixtures";

function poolWith(impl: FetchLike) {
  const fetchImpl = vi.fn<FetchLike>(impl);
  return { pool: new HttpPool({ fetchImpl }), fetchImpl };
}

function sentBody(fetchImpl: Mock<FetchLike>, call = 0): unknown {
  return JSON.parse(String(fetchImpl.mock.calls[call][1]?.body));
}

describe("parseStreamLine", () => {
  it("extracts delta text", () => {
    expect(parseStreamLine('data: {"choices":[{"delta":{"content":"Hi"}}]}')).toBe("Hi");
    expect(parseStreamLine('data:{"choices":[{"delta":{"content":" there"}}]}')).toBe(" there");
  });

  it("recognizes the end marker", () => {
    expect(parseStreamLine("data: [DONE]")).toBe("[DONE]");
  });

  it("ignores lines without text", () => {
    expect(parseStreamLine("")).toBeNull();
    expect(parseStreamLine(": keep-alive")).toBeNull();
    expect(parseStreamLine("data: not json")).toBeNull();
    expect(parseStreamLine('data: {"choices":[{"delta":{"role":"assistant"}}]}')).toBeNull();
    expect(parseStreamLine('data: {"choices":[{"delta":{"content":""}}]}')).toBeNull();
  });
});

describe("OpenAICompatibleProvider.call", () => {
  it("posts a chat completion with defaults and bearer auth", async () => {
    const { pool, fetchImpl } = poolWith(async () =>
      jsonResponse({ choices: [{ message: { content: "hello" }, finish_reason: "stop" }], usage: { total_tokens: 12 } })
    );
    const provider = new OpenAICompatibleProvider(pool, "test-secret");

    const res = await provider.call({ messages: [{ role: "user", content: "hi" }], json: true });

    expect(res).toEqual({
      provider: "openai",
      model: "gpt-4o-mini",
      content: "hello",
      finish_reason: "stop",
      usage: { total_tokens: 12 },
    });
    expect(fetchImpl.mock.calls[0][0]).toBe("https://api.openai.com/v1/chat/completions");
    const init = fetchImpl.mock.calls[0][1];
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-secret");
    expect(sentBody(fetchImpl)).toEqual({
      model: "gpt-4o-mini",
      temperature: 0.2,
      max_tokens: 900,
      messages: [{ role: "user", content: "hi" }],
      response_format: { type: "json_object" },
    });
  });

  it("lets the request override model settings", async () => {
    const { pool, fetchImpl } = poolWith(async () => jsonResponse({ choices: [{ message: { content: "x" } }] }));
    const provider = new OpenAICompatibleProvider(pool, "test-secret", { defaults: { model: "base-model" } });
    const res = await provider.call({ messages: [], model: "other", max_tokens: 1500, temperature: 0 });
    expect(res.model).toBe("other");
    expect(sentBody(fetchImpl)).toEqual({ model: "other", temperature: 0, max_tokens: 1500, messages: [] });
  });

  it("prefers output_text when present", async () => {
    const { pool } = poolWith(async () =>
      jsonResponse({ output_text: "direct", choices: [{ message: { content: "nested" } }] })
    );
    const res = await new OpenAICompatibleProvider(pool, "test-secret").call({ messages: [] });
    expect(res.content).toBe("direct");
  });

  it("returns empty content when the reply has none", async () => {
    const { pool } = poolWith(async () => jsonResponse({ choices: [] }));
    const res = await new OpenAICompatibleProvider(pool, "test-secret").call({ messages: [] });
    expect(res.content).toBe("");
  });

  it("rejects a malformed completion", async () => {
    const { pool } = poolWith(async () => jsonResponse({ choices: "nope" }));
    await expect(new OpenAICompatibleProvider(pool, "test-secret").call({ messages: [] })).rejects.toThrow(
      "openai: unexpected completion shape"
    );
  });

  it("surfaces upstream HTTP errors", async () => {
    const { pool } = poolWith(async () => new Response("bad key", { status: 401 }));
    await expect(new OpenAICompatibleProvider(pool, "test-secret").call({ messages: [] })).rejects.toThrow(
      "https://api.openai.com/v1/chat/completions responded 401"
    );
  });
});

describe("buildProvider", () => {
  it("uses the provider's base URL", async () => {
    const { pool, fetchImpl } = poolWith(async () => jsonResponse({ choices: [] }));
    const provider = buildProvider({ kind: "openrouter", apiKey: "test-secret" }, pool);
    await provider.call({ messages: [] });
    expect(provider.name).toBe("openrouter");
    expect(fetchImpl.mock.calls[0][0]).toBe("https://openrouter.ai/api/v1/chat/completions");
  });

  it("honors an explicit base URL, trailing slash or not", async () => {
    const { pool, fetchImpl } = poolWith(async () => jsonResponse({ choices: [] }));
    await buildProvider({ kind: "grok", apiKey: "test-secret", baseURL: "https://llm.test/v1/" }, pool).call({ messages: [] });
    expect(fetchImpl.mock.calls[0][0]).toBe("https://llm.test/v1/chat/completions");
  });
});

describe("OpenAICompatibleProvider.stream", () => {
  const sse = [
    'data: {"choices":[{"delta":{"role":"assistant"}}]}',
    "",
    'data: {"choices":[{"delta":{"content":"Hel"}}]}',
    "",
    ": ping",
    'data: {"choices":[{"delta":{"content":"lo"}}]}',
    "",
    "data: [DONE]",
    "",
    'data: {"choices":[{"delta":{"content":"after done"}}]}',
    "",
  ].join("\n");

  it("yields deltas until [DONE]", async () => {
    const { pool, fetchImpl } = poolWith(async () => new Response(sse));
    const provider = new OpenAICompatibleProvider(pool, "test-secret");

    const chunks: string[] = [];
    for await (const c of provider.stream({ messages: [{ role: "user", content: "hi" }] })) chunks.push(c);

    expect(chunks).toEqual(["Hel", "lo"]);
    expect(sentBody(fetchImpl)).toMatchObject({ stream: true, model: "gpt-4o-mini" });
    expect(pool.stats().active).toBe(0);
  });

  it("fails when the stream cannot be opened", async () => {
    const { pool } = poolWith(async () => new Response("overloaded", { status: 503 }));
    const gen = new OpenAICompatibleProvider(pool, "test-secret").stream({ messages: [] });
    await expect(gen.next()).rejects.toThrow("stream responded 503");
  });
});
