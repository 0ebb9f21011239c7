/**
 * Configuration loading for jsonl-translate
 *
 * Searches upward from cwd for .jsonltranslaterc.json and merges:
 * defaults → file → env vars → CLI flags
 */

import * as fs from "fs";
import * as path from "path";
import type { TranslateConfig } from "./types.js";
import { ConfigurationError } from "./errors.js";

export const CONFIG_FILE_NAME = ".jsonltranslaterc.json";

export const DEFAULT_CONFIG: TranslateConfig = {
  model: "gpt-4o-mini",
  temperature: 0.2,
  maxRetries: 3,
  timeoutSeconds: 60,
  concurrency: 8,
  targetLanguage: "French",
  outputDir: "./translated",
};

/**
 * Walk upward from startDir looking for .jsonltranslaterc.json.
 * Returns the full path if found, null otherwise.
 */
export function findConfigFile(startDir?: string): string | null {
  let dir = startDir ? path.resolve(startDir) : process.cwd();
  const root = path.parse(dir).root;

  while (true) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir || dir === root) {
      return null;
    }
    dir = parent;
  }
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

function isNonNegativeInteger(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

/**
 * Parse a raw config file into a partial TranslateConfig.
 * Unknown keys and values of the wrong type are ignored.
 */
function parseConfigFile(filePath: string): Partial<TranslateConfig> {
  const raw = fs.readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file ${filePath}: ${error instanceof Error ? error.message : error}`,
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(
      `Config file ${filePath} must contain a JSON object`,
    );
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  const result: Partial<TranslateConfig> = {};

  const model = fields.get("model");
  if (typeof model === "string") {
    result.model = model;
  }
  const baseUrl = fields.get("baseUrl");
  if (typeof baseUrl === "string") {
    result.baseUrl = baseUrl;
  }
  const temperature = fields.get("temperature");
  if (typeof temperature === "number") {
    result.temperature = temperature;
  }
  const maxRetries = fields.get("maxRetries");
  if (typeof maxRetries === "number" && isNonNegativeInteger(maxRetries)) {
    result.maxRetries = maxRetries;
  }
  const timeoutSeconds = fields.get("timeoutSeconds");
  if (typeof timeoutSeconds === "number" && timeoutSeconds > 0) {
    result.timeoutSeconds = timeoutSeconds;
  }
  const concurrency = fields.get("concurrency");
  if (typeof concurrency === "number" && isPositiveInteger(concurrency)) {
    result.concurrency = concurrency;
  }
  const targetLanguage = fields.get("targetLanguage");
  if (typeof targetLanguage === "string") {
    result.targetLanguage = targetLanguage;
  }
  const outputDir = fields.get("outputDir");
  if (typeof outputDir === "string") {
    result.outputDir = outputDir;
  }

  return result;
}

/**
 * Read env-var overrides. Malformed numbers are ignored.
 */
export function getEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
): Partial<TranslateConfig> {
  const result: Partial<TranslateConfig> = {};

  if (env.MODEL) {
    result.model = env.MODEL;
  }
  const apiKey = env.API_KEY || env.OPENAI_API_KEY;
  if (apiKey) {
    result.apiKey = apiKey;
  }
  if (env.BASE_URL) {
    result.baseUrl = env.BASE_URL;
  }
  if (env.TEMPERATURE) {
    const t = parseFloat(env.TEMPERATURE);
    if (!isNaN(t) && t >= 0) {
      result.temperature = t;
    }
  }
  if (env.MAX_RETRIES) {
    const n = Number(env.MAX_RETRIES);
    if (isNonNegativeInteger(n)) {
      result.maxRetries = n;
    }
  }
  if (env.TIMEOUT) {
    const s = parseFloat(env.TIMEOUT);
    if (!isNaN(s) && s > 0) {
      result.timeoutSeconds = s;
    }
  }
  if (env.CONCURRENCY) {
    const n = Number(env.CONCURRENCY);
    if (isPositiveInteger(n)) {
      result.concurrency = n;
    }
  }
  if (env.TARGET_LANGUAGE) {
    result.targetLanguage = env.TARGET_LANGUAGE;
  }
  if (env.OUTPUT_DIR) {
    result.outputDir = env.OUTPUT_DIR;
  }

  return result;
}

export interface LoadConfigOptions {
  /** CLI --model flag */
  model?: string;
  /** CLI [concurrency] argument */
  concurrency?: number;
  /** CLI --language flag */
  targetLanguage?: string;
  /** CLI --output-dir flag */
  outputDir?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config by merging: defaults → .jsonltranslaterc.json → env vars → CLI flags.
 * A relative outputDir from the config file is resolved against the config
 * file's directory; env and CLI values resolve against cwd.
 */
export function loadConfig(overrides: LoadConfigOptions = {}): TranslateConfig {
  const cwd = overrides.cwd ? path.resolve(overrides.cwd) : process.cwd();
  const configFilePath = findConfigFile(cwd);

  // Start with defaults
  let config: TranslateConfig = {
    ...DEFAULT_CONFIG,
    outputDir: path.resolve(cwd, DEFAULT_CONFIG.outputDir),
  };

  // Merge config file values
  if (configFilePath) {
    const fileConfig = parseConfigFile(configFilePath);
    if (fileConfig.outputDir) {
      fileConfig.outputDir = path.resolve(
        path.dirname(configFilePath),
        fileConfig.outputDir,
      );
    }
    config = { ...config, ...fileConfig };
  }

  // Merge env vars
  const envConfig = getEnvOverrides(overrides.env);
  if (envConfig.outputDir) {
    envConfig.outputDir = path.resolve(cwd, envConfig.outputDir);
  }
  config = { ...config, ...envConfig };

  // Merge CLI flag overrides
  if (overrides.model) config.model = overrides.model;
  if (overrides.concurrency) config.concurrency = overrides.concurrency;
  if (overrides.targetLanguage) config.targetLanguage = overrides.targetLanguage;
  if (overrides.outputDir) {
    config.outputDir = path.resolve(cwd, overrides.outputDir);
  }

  return config;
}

/**
 * Create a default .jsonltranslaterc.json file in cwd.
 * The API key is left to the environment.
 */
export function createDefaultConfig(dir?: string): string {
  const targetDir = dir || process.cwd();
  const configPath = path.join(targetDir, CONFIG_FILE_NAME);

  fs.writeFileSync(
    configPath,
    JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n",
    "utf-8",
  );

  return configPath;
}
