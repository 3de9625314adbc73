import assert from "node:assert/strict";
import test from "node:test";
import { GeminiProvider, OpenAIResponsesProvider, type FetchLike } from "./completion-provider.js";
import { CompletionProviderError } from "./errors.js";

type RecordedCall = {
  url: string;
  headers: Headers;
  body: unknown;
};

function createFetch(respond: () => Response): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined
    });
    return respond();
  };
  return { fetchImpl, calls };
}

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

function hasReason(reason: string) {
  return (error: unknown) => error instanceof CompletionProviderError && error.reason === reason;
}

test("OpenAIResponsesProvider posts the prompt and reads output_text", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse({ output_text: "  See service-41.  " }));
  const provider = new OpenAIResponsesProvider({
    apiKey: "test-key",
    baseUrl: "https://api.test/v1/",
    model: "test-model",
    fetchImpl
  });

  assert.equal(provider.configured, true);
  assert.equal(await provider.complete("PROMPT"), "See service-41.");
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "https://api.test/v1/responses");
  assert.equal(calls[0]?.headers.get("authorization"), "Bearer test-key");
  assert.equal(calls[0]?.headers.get("content-type"), "application/json");
  assert.deepEqual(calls[0]?.body, {
    model: "test-model",
    temperature: 0,
    input: [{ role: "user", content: [{ type: "input_text", text: "PROMPT" }] }]
  });
});

test("OpenAIResponsesProvider falls back to output content segments", async () => {
  const { fetchImpl } = createFetch(() =>
    jsonResponse({
      output: [{ content: [{ text: "First line." }, { text: " " }] }, { content: [{ text: "Second line." }] }]
    })
  );
  const provider = new OpenAIResponsesProvider({ apiKey: "test-key", baseUrl: "https://api.test/v1", model: "m", fetchImpl });

  assert.equal(await provider.complete("PROMPT"), "First line.\nSecond line.");
});

test("GeminiProvider calls generateContent and joins candidate parts", async () => {
  const { fetchImpl, calls } = createFetch(() =>
    jsonResponse({ candidates: [{ content: { parts: [{ text: "Hello " }, { text: "there" }] } }] })
  );
  const provider = new GeminiProvider({
    apiKey: "test-key",
    baseUrl: "https://gemini.test/v1beta",
    model: "gemini-test",
    fetchImpl
  });

  assert.equal(await provider.complete("PROMPT"), "Hellothere");
  assert.equal(calls[0]?.url, "https://gemini.test/v1beta/models/gemini-test:generateContent?key=test-key");
  assert.deepEqual(calls[0]?.body, {
    contents: [{ role: "user", parts: [{ text: "PROMPT" }] }],
    generationConfig: { temperature: 0.3, maxOutputTokens: 512, topP: 0.9, topK: 40 }
  });
});

test("providers without an API key fail without calling out", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse({ output_text: "unused" }));
  const provider = new OpenAIResponsesProvider({ apiKey: "  ", baseUrl: "https://api.test/v1", model: "m", fetchImpl });

  assert.equal(provider.configured, false);
  await assert.rejects(() => provider.complete("PROMPT"), hasReason("not_configured"));
  assert.equal(calls.length, 0);
});

test("non-success status maps to http_status with the status code", async () => {
  const { fetchImpl } = createFetch(() => new Response("upstream unavailable", { status: 503 }));
  const provider = new OpenAIResponsesProvider({ apiKey: "test-key", baseUrl: "https://api.test/v1", model: "m", fetchImpl });

  await assert.rejects(
    () => provider.complete("PROMPT"),
    (error: unknown) =>
      error instanceof CompletionProviderError &&
      error.reason === "http_status" &&
      error.status === 503 &&
      error.message === "Completion provider openai failed: status=503 body=upstream unavailable"
  );
});

test("malformed and empty payloads are provider failures", async () => {
  const notJson = new GeminiProvider({
    apiKey: "test-key",
    baseUrl: "https://gemini.test/v1beta",
    model: "m",
    fetchImpl: createFetch(() => new Response("not json", { status: 200 })).fetchImpl
  });
  await assert.rejects(() => notJson.complete("PROMPT"), hasReason("malformed_response"));

  const wrongShape = new OpenAIResponsesProvider({
    apiKey: "test-key",
    baseUrl: "https://api.test/v1",
    model: "m",
    fetchImpl: createFetch(() => jsonResponse({ id: "resp-1" })).fetchImpl
  });
  await assert.rejects(() => wrongShape.complete("PROMPT"), hasReason("malformed_response"));

  const empty = new GeminiProvider({
    apiKey: "test-key",
    baseUrl: "https://gemini.test/v1beta",
    model: "m",
    fetchImpl: createFetch(() => jsonResponse({ candidates: [] })).fetchImpl
  });
  await assert.rejects(() => empty.complete("PROMPT"), hasReason("empty_response"));
});

test("requests that outlive the timeout fail with reason timeout", async () => {
  const fetchImpl: FetchLike = (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) {
        reject(new Error("missing abort signal"));
        return;
      }
      signal.addEventListener("abort", () => reject(signal.reason));
    });
  const provider = new OpenAIResponsesProvider({
    apiKey: "test-key",
    baseUrl: "https://api.test/v1",
    model: "m",
    timeoutMs: 10,
    fetchImpl
  });

  await assert.rejects(() => provider.complete("PROMPT"), hasReason("timeout"));
});

test("network failures map to reason network", async () => {
  const fetchImpl: FetchLike = async () => {
    throw Object.assign(new TypeError("fetch failed"), { cause: { code: "ECONNREFUSED" } });
  };
  const provider = new GeminiProvider({ apiKey: "test-key", baseUrl: "https://gemini.test/v1beta", model: "m", fetchImpl });

  await assert.rejects(() => provider.complete("PROMPT"), hasReason("network"));
});
