import { beforeEach, describe, expect, it, vi } from "vitest";
import { AnthropicLlmClient } from "../../src/domain/ai/service";
import { AIServiceError, ValidationCancelledError } from "../../src/shared/errors";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: vi.fn().mockImplementation(() => ({ messages: { create } })),
}));

function client(): AnthropicLlmClient {
  return new AnthropicLlmClient({
    apiKey: "test-key",
    model: "claude-test",
    timeoutMs: 2000,
    maxRequestsPerMinute: 600,
  });
}

describe("AnthropicLlmClient", () => {
  beforeEach(() => {
    create.mockReset();
  });

  it("returns the text blocks of the reply", async () => {
    create.mockResolvedValueOnce({
      model: "claude-test",
      content: [
        { type: "text", text: "[\"claim one\"," },
        { type: "text", text: "\"claim two\"]" },
      ],
      usage: { input_tokens: 12, output_tokens: 8 },
    });
    const controller = new AbortController();

    const text = await client().complete("Extract claims", { signal: controller.signal, maxTokens: 256 });

    expect(text).toBe("[\"claim one\",\n\"claim two\"]");
    expect(create).toHaveBeenCalledWith(
      {
        model: "claude-test",
        max_tokens: 256,
        temperature: 0,
        messages: [{ role: "user", content: "Extract claims" }],
      },
      { signal: controller.signal, timeout: 2000 }
    );
  });

  it("reports cancellation when the caller aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    create.mockRejectedValueOnce(new Error("Request was aborted."));

    await expect(client().complete("x", { signal: controller.signal })).rejects.toBeInstanceOf(
      ValidationCancelledError
    );
  });

  it("maps provider rate limiting", async () => {
    create.mockRejectedValueOnce(new Error("429 rate_limit_error"));

    const failure = client().complete("x");

    await expect(failure).rejects.toBeInstanceOf(AIServiceError);
    await expect(failure).rejects.toThrow("AI error: Rate limit exceeded, please try again later");
  });

  it("wraps other provider errors", async () => {
    create.mockRejectedValueOnce(new Error("overloaded"));

    await expect(client().complete("x")).rejects.toThrow("AI error: overloaded");
  });
});
