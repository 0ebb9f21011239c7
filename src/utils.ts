/**
 * Utility functions for jsonl-translate
 */

import * as fs from "fs";
import * as path from "path";
import { parse, stringify, isSafeNumber, LosslessNumber } from "lossless-json";
import type { JsonValue } from "./types.js";
import { InputFileError } from "./errors.js";

// ============================================================================
// JSON Lines files
// ============================================================================

/**
 * Numbers a double holds exactly become plain numbers; any other number
 * keeps its source digits.
 */
function parseNumber(value: string): number | LosslessNumber {
  return isSafeNumber(value) ? parseFloat(value) : new LosslessNumber(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof LosslessNumber
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === "object") {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

/**
 * Parse one JSON text without losing number precision
 */
export function parseJson(text: string): JsonValue {
  const value = parse(text, null, parseNumber);
  if (!isJsonValue(value)) {
    throw new SyntaxError("Unsupported JSON value");
  }
  return value;
}

/**
 * Serialize a value parsed by `parseJson`, numbers digit for digit
 */
export function stringifyJson(value: JsonValue): string {
  const text = stringify(value);
  if (text === undefined) {
    throw new TypeError("Value cannot be serialized as JSON");
  }
  return text;
}

/**
 * Load a JSON Lines file. Blank lines are skipped.
 */
export function loadJsonl(filePath: string): JsonValue[] {
  if (!fs.existsSync(filePath)) {
    throw new InputFileError(filePath, "Input file not found");
  }

  const content = fs.readFileSync(filePath, "utf-8");
  const records: JsonValue[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    try {
      records.push(parseJson(line));
    } catch (error) {
      throw new InputFileError(
        filePath,
        `Invalid JSON (${error instanceof Error ? error.message : error})`,
        index + 1,
      );
    }
  });

  return records;
}

/**
 * Save values as JSON Lines, one record per line.
 * Creates the parent directory if needed.
 */
export function saveJsonl(filePath: string, records: readonly JsonValue[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const content = records.map((record) => stringifyJson(record) + "\n").join("");
  fs.writeFileSync(filePath, content, "utf-8");
}

/**
 * Output files keep the input's file name inside the output directory
 */
export function resolveOutputPath(inputFile: string, outputDir: string): string {
  return path.join(outputDir, path.basename(inputFile));
}

// ============================================================================
// Console output
// ============================================================================

/**
 * Format a color-coded console message
 */
export const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
};

export function colorize(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, "0");
}

/**
 * `HH:MM:SS.mmm` in local time
 */
export function formatTimestamp(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Print a message prefixed with the current time
 */
export function log(text: string, color?: keyof typeof colors): void {
  const stamp = colorize(`[${formatTimestamp(new Date())}]`, "dim");
  console.log(`${stamp} ${color ? colorize(text, color) : text}`);
}

/**
 * Human-readable duration, e.g. "950ms", "12.4s", "3m 05s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${pad(Math.floor(seconds % 60))}s`;
}

/**
 * Print a formatted header with box-drawing characters
 */
export function printHeader(text: string): void {
  const width = Math.max(text.length + 4, 40);
  const inner = width - 2;
  console.log("");
  console.log(colorize(`┌${"─".repeat(inner)}┐`, "cyan"));
  console.log(
    colorize("│", "cyan") +
      colorize(` ${text}`, "bold") +
      " ".repeat(inner - text.length - 1) +
      colorize("│", "cyan"),
  );
  console.log(colorize(`└${"─".repeat(inner)}┘`, "cyan"));
}

/**
 * Print a success message
 */
export function printSuccess(text: string): void {
  console.log(colorize(`  ✓ ${text}`, "green"));
}

/**
 * Print a warning message
 */
export function printWarning(text: string): void {
  console.log(colorize(`  ⚠ ${text}`, "yellow"));
}

/**
 * Print an error message
 */
export function printError(text: string): void {
  console.error(colorize(`Error: ${text}`, "red"));
}
