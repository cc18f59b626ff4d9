import { describe, expect, it, vi } from "vitest";

const responsesCreateMock = vi.fn();
const constructorMock = vi.fn();

function mockOpenAI() {
  responsesCreateMock.mockReset();
  responsesCreateMock.mockResolvedValue({ output_text: '{"ok": true}' });
  constructorMock.mockReset();
  class OpenAIStub {
    responses = { create: responsesCreateMock };

    constructor(options: unknown) {
      constructorMock(options);
    }
  }
  vi.doMock("openai", () => ({ default: OpenAIStub }));
}

async function loadOpenAI() {
  vi.resetModules();
  mockOpenAI();
  return import("../../src/libs/openai");
}

const messages = [
  { role: "system" as const, content: "You are an underwriter." },
  { role: "user" as const, content: "Assess this driver." }
];

describe("OpenAIGeneration", () => {
  it("uses the default model and generation settings", async () => {
    const { OpenAIGeneration } = await loadOpenAI();
    const generation = new OpenAIGeneration({ apiKey: "test-openai-key" });

    const reply = await generation.generate({ purpose: "risk", messages });

    expect(reply).toBe('{"ok": true}');
    expect(constructorMock).toHaveBeenCalledWith({ apiKey: "test-openai-key", baseURL: undefined });
    expect(responsesCreateMock).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gpt-4o-mini",
        temperature: 0.2,
        stream: false,
        input: [
          { role: "system", content: "You are an underwriter." },
          { role: "user", content: "Assess this driver." }
        ]
      }),
      expect.objectContaining({ timeout: 20_000 })
    );
  });

  it("respects the model override and validation temperature", async () => {
    const { OpenAIGeneration } = await loadOpenAI();
    const generation = new OpenAIGeneration({ apiKey: "test-openai-key", model: "gpt-4o", timeoutMs: 5_000 });
    const controller = new AbortController();

    await generation.generate({ purpose: "review", messages, mode: "validation", signal: controller.signal });

    expect(responsesCreateMock).toHaveBeenCalledWith(expect.objectContaining({ model: "gpt-4o", temperature: 0 }), {
      signal: controller.signal,
      timeout: 5_000
    });
  });

  it("returns an empty string when the response has no text", async () => {
    const { OpenAIGeneration } = await loadOpenAI();
    responsesCreateMock.mockResolvedValueOnce({});
    const generation = new OpenAIGeneration({ apiKey: "test-openai-key" });

    await expect(generation.generate({ purpose: "draft", messages })).resolves.toBe("");
  });

  it("requires an API key", async () => {
    const { OpenAIGeneration } = await loadOpenAI();

    expect(() => new OpenAIGeneration({})).toThrow("OPENAI_API_KEY is required to call OpenAI APIs.");
  });
});
