import { describe, expect, it, vi } from "vitest";
import { OpenAICompatibleProvider } from "./openaiCompatible";
import { LLMAuthError, LLMResponseError, LLMTransientError } from "./provider";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function providerWith(response: Response | Error) {
  const fetchFn = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) throw response;
    return response;
  });
  const provider = new OpenAICompatibleProvider("https://llm.test/v1/", "test-key", "test-model", { fetchFn });
  return { provider, fetchFn };
}

describe("OpenAICompatibleProvider", () => {
  it("posts a chat completion and returns the text and usage", async () => {
    const { provider, fetchFn } = providerWith(jsonResponse({
      choices: [{ message: { role: "assistant", content: "[true]" } }],
      usage: { prompt_tokens: 12, completion_tokens: 3 }
    }));

    const out = await provider.generate({ system: "be brief", prompt: "hello", temperature: 0, maxTokens: 50 });

    expect(out.text).toBe("[true]");
    expect(out.usage).toEqual({ inputTokens: 12, outputTokens: 3 });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "Authorization": "Bearer test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [{ role: "system", content: "be brief" }, { role: "user", content: "hello" }],
      temperature: 0,
      max_tokens: 50
    });
  });

  it("maps 401 to an authentication error", async () => {
    const { provider } = providerWith(new Response("invalid api key", { status: 401 }));
    await expect(provider.generate({ prompt: "x" })).rejects.toThrow(
      new LLMAuthError("LLM authentication failed (HTTP 401): invalid api key")
    );
  });

  it.each([408, 429, 500, 503])("maps HTTP %i to a transient error", async status => {
    const { provider } = providerWith(new Response("busy", { status }));
    await expect(provider.generate({ prompt: "x", correlationId: "2406.00001v1" })).rejects.toThrow(
      new LLMTransientError(`LLM request failed (HTTP ${status}): busy`, status, "2406.00001v1")
    );
  });

  it("maps network failures and timeouts to transient errors", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    const { provider } = providerWith(timeout);
    await expect(provider.generate({ prompt: "x" })).rejects.toBeInstanceOf(LLMTransientError);
  });

  it("treats a timeout while reading the body as transient", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"choices": [{"message": '));
        controller.error(timeout);
      }
    });
    const { provider } = providerWith(new Response(body, { status: 200 }));

    const err = await provider.generate({ prompt: "x", correlationId: "b1" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LLMTransientError);
    expect(err).toMatchObject({ status: 200 });
  });

  it("maps other client errors to a response error", async () => {
    const { provider } = providerWith(new Response("bad model", { status: 400 }));
    await expect(provider.generate({ prompt: "x" })).rejects.toBeInstanceOf(LLMResponseError);
  });

  it("rejects a body without message content", async () => {
    const { provider } = providerWith(jsonResponse({ choices: [] }));
    await expect(provider.generate({ prompt: "x", correlationId: "b1" })).rejects.toThrow(
      new LLMResponseError("LLM response has no message content [b1]")
    );
  });

  it("rejects a body that is not JSON", async () => {
    const { provider } = providerWith(new Response("<html>gateway</html>", { status: 200 }));
    await expect(provider.generate({ prompt: "x" })).rejects.toBeInstanceOf(LLMResponseError);
  });
});
