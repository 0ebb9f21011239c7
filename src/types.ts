/**
 * Type definitions for jsonl-translate
 */

import type { LosslessNumber } from "lossless-json";

/**
 * Numbers that a double cannot hold exactly (e.g. integers beyond 2^53)
 * are kept as `LosslessNumber` so they are written back digit for digit.
 */
export type JsonScalar = number | LosslessNumber | boolean | null;

export type JsonValue =
  | string
  | JsonScalar
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A JSON value seen by the tree walker. Every position of a record maps to
 * exactly one of these variants.
 */
export type TreeNode =
  | { kind: "object"; entries: [string, JsonValue][] }
  | { kind: "sequence"; items: JsonValue[] }
  | { kind: "string"; text: string }
  | { kind: "opaque"; value: JsonScalar };

/**
 * One string leaf on its way to the translator.
 * `position` is a readable path used for logs and error messages only.
 */
export interface TranslationJob {
  text: string;
  position: string;
}

export interface TranslateCallOptions {
  signal?: AbortSignal;
}

/**
 * A single text-in, text-out translation call.
 */
export interface Translator {
  translate(text: string, options?: TranslateCallOptions): Promise<string>;
}

export interface JobHooks {
  onJobStart?: (job: TranslationJob) => void;
  onJobDone?: (job: TranslationJob, translated: string) => void;
}

/**
 * Configuration loaded from .jsonltranslaterc.json, the environment and CLI flags
 */
export interface TranslateConfig {
  /** Chat model to use (default: "gpt-4o-mini") */
  model: string;
  /** API key, never persisted to the config file */
  apiKey?: string;
  /** OpenAI-compatible endpoint; SDK default when unset */
  baseUrl?: string;
  /** Sampling temperature (default: 0.2) */
  temperature: number;
  /** Retries performed by the API client (default: 3) */
  maxRetries: number;
  /** Per-request timeout in seconds (default: 60) */
  timeoutSeconds: number;
  /** Max concurrent API requests across the whole batch (default: 8) */
  concurrency: number;
  /** Language the model translates into (default: "French") */
  targetLanguage: string;
  /** Directory translated files are written to (default: "./translated") */
  outputDir: string;
}
