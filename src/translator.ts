/**
 * OpenAI Translation Integration
 */

import OpenAI from "openai";
import type {
  TranslateCallOptions,
  TranslateConfig,
  Translator,
} from "./types.js";
import { ConfigurationError, TranslationFailedError } from "./errors.js";

/**
 * Create the system prompt for translation
 */
export function createSystemPrompt(targetLanguage: string): string {
  return `You are a translator. You will be given a text that you have to translate to ${targetLanguage}.

GUIDELINES:

1. Give ONLY the translation, without any additional context, explanation or formatting.
2. Keep the syntax as it was. If there is no punctuation, don't add any.
3. Keep numbers, symbols, code, math expressions and line breaks unchanged.
4. Do not add quotes around your translation.`;
}

/**
 * Clean up a translation by removing artifacts added by LLM
 */
export function cleanupTranslation(translated: string, original: string): string {
  let result = translated;

  const originalStartsWithQuote = original.startsWith('"');
  const originalEndsWithQuote = original.endsWith('"');

  // If original doesn't have outer quotes but translation does, strip them
  if (!originalStartsWithQuote && !originalEndsWithQuote) {
    if (result.length >= 2 && result.startsWith('"') && result.endsWith('"')) {
      result = result.slice(1, -1);
    }
  }

  // Remove triple backticks if present
  if (
    !original.startsWith("```") &&
    result.length >= 6 &&
    result.startsWith("```") &&
    result.endsWith("```")
  ) {
    result = result.slice(3, -3).trim();
  }

  // Remove markdown-style backticks if LLM added them
  if (
    !original.startsWith("`") &&
    result.length >= 2 &&
    result.startsWith("`") &&
    result.endsWith("`")
  ) {
    result = result.slice(1, -1);
  }

  return result;
}

/**
 * Translator backed by an OpenAI-compatible chat completions endpoint.
 * Retries and timeouts are handled by the client.
 */
export class OpenAITranslator implements Translator {
  private readonly client: OpenAI;
  private readonly systemPrompt: string;

  constructor(
    private readonly config: TranslateConfig,
    client?: OpenAI,
  ) {
    this.client = client ?? OpenAITranslator.createClient(config);
    this.systemPrompt = createSystemPrompt(config.targetLanguage);
  }

  /**
   * Initialize OpenAI client from config
   */
  static createClient(config: TranslateConfig): OpenAI {
    if (!config.apiKey) {
      throw new ConfigurationError(
        "API key not found. Please set API_KEY (or OPENAI_API_KEY) in the environment or a .env file, or use --dry-run.",
      );
    }

    return new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutSeconds * 1000,
      maxRetries: config.maxRetries,
    });
  }

  async translate(
    text: string,
    options: TranslateCallOptions = {},
  ): Promise<string> {
    // Nothing to translate; the model would answer with an empty message
    if (text.trim() === "") {
      return text;
    }

    const completion = await this.client.chat.completions.create(
      {
        model: this.config.model,
        temperature: this.config.temperature,
        messages: [
          { role: "system", content: this.systemPrompt },
          { role: "user", content: text },
        ],
      },
      { signal: options.signal },
    );

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new TranslationFailedError("model returned an empty response", text);
    }

    return cleanupTranslation(content, text);
  }
}

/**
 * Translator that makes no API call and tags each string with the target
 * language, for checking a run end to end.
 */
export class DryRunTranslator implements Translator {
  constructor(private readonly targetLanguage: string) {}

  async translate(text: string): Promise<string> {
    return `[${this.targetLanguage}] ${text}`;
  }
}
