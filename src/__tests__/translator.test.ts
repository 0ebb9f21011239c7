import { describe, it, expect } from "vitest";
import OpenAI from "openai";

import {
  OpenAITranslator,
  DryRunTranslator,
  cleanupTranslation,
  createSystemPrompt,
} from "../translator.js";
import { DEFAULT_CONFIG } from "../config.js";
import { ConfigurationError, TranslationFailedError } from "../errors.js";
import type { TranslateConfig } from "../types.js";

interface CapturedRequest {
  url: string;
  body: unknown;
}

const config: TranslateConfig = {
  ...DEFAULT_CONFIG,
  apiKey: "test-secret",
  model: "test-model",
  targetLanguage: "French",
};

function completion(content: string | null) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content, refusal: null },
        finish_reason: "stop",
        logprobs: null,
      },
    ],
  };
}

/**
 * OpenAI client whose HTTP calls are answered in process.
 */
function createClient(
  reply: () => { status: number; body: unknown },
  requests: CapturedRequest[],
): OpenAI {
  return new OpenAI({
    apiKey: "test-secret",
    baseURL: "http://llm.test/v1",
    maxRetries: 0,
    fetch: async (input, init) => {
      requests.push({
        url: input instanceof Request ? input.url : input.toString(),
        body: JSON.parse(String(init?.body)),
      });
      const { status, body } = reply();
      return new Response(JSON.stringify(body), {
        status,
        headers: { "content-type": "application/json" },
      });
    },
  });
}

describe("createSystemPrompt", () => {
  it("names the target language", () => {
    expect(createSystemPrompt("German")).toContain(
      "You will be given a text that you have to translate to German.",
    );
  });
});

describe("cleanupTranslation", () => {
  it("strips quotes the model added", () => {
    expect(cleanupTranslation('"Salut"', "Hi")).toBe("Salut");
  });

  it("keeps quotes present in the original", () => {
    expect(cleanupTranslation('"Salut"', '"Hi"')).toBe('"Salut"');
  });

  it("strips code fences and backticks the model added", () => {
    expect(cleanupTranslation("```\nbonjour\n```", "hello")).toBe("bonjour");
    expect(cleanupTranslation("`bonjour`", "hello")).toBe("bonjour");
    expect(cleanupTranslation("`code`", "`code`")).toBe("`code`");
  });
});

describe("OpenAITranslator", () => {
  it("sends one chat completion per text and returns the cleaned reply", async () => {
    const requests: CapturedRequest[] = [];
    const client = createClient(
      () => ({ status: 200, body: completion(' "Bonjour" ') }),
      requests,
    );
    const translator = new OpenAITranslator(config, client);

    await expect(translator.translate("Hello")).resolves.toBe("Bonjour");

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("http://llm.test/v1/chat/completions");
    expect(requests[0].body).toEqual({
      model: "test-model",
      temperature: 0.2,
      messages: [
        { role: "system", content: createSystemPrompt("French") },
        { role: "user", content: "Hello" },
      ],
    });
  });

  it("fails on an empty reply", async () => {
    const client = createClient(() => ({ status: 200, body: completion("") }), []);
    const translator = new OpenAITranslator(config, client);

    await expect(translator.translate("Hello")).rejects.toBeInstanceOf(
      TranslationFailedError,
    );
  });

  it("propagates API errors", async () => {
    const client = createClient(
      () => ({ status: 401, body: { error: { message: "bad key" } } }),
      [],
    );
    const translator = new OpenAITranslator(config, client);

    await expect(translator.translate("Hello")).rejects.toBeInstanceOf(
      OpenAI.AuthenticationError,
    );
  });

  it("returns whitespace-only text without a request", async () => {
    const requests: CapturedRequest[] = [];
    const client = createClient(
      () => ({ status: 200, body: completion("unused") }),
      requests,
    );
    const translator = new OpenAITranslator(config, client);

    await expect(translator.translate("  ")).resolves.toBe("  ");
    expect(requests).toHaveLength(0);
  });

  it("requires an API key", () => {
    expect(() => new OpenAITranslator({ ...DEFAULT_CONFIG })).toThrow(
      ConfigurationError,
    );
  });
});

describe("DryRunTranslator", () => {
  it("tags the text with the target language", async () => {
    await expect(new DryRunTranslator("French").translate("Hi")).resolves.toBe(
      "[French] Hi",
    );
  });
});
