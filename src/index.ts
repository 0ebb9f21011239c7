#!/usr/bin/env node

/**
 * jsonl-translate CLI Tool
 *
 * Translates every string of a JSON Lines file with an LLM, keeping each
 * record's structure intact.
 */

import { config } from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs";
import * as path from "path";

// Load .env from cwd
config({ path: path.resolve(process.cwd(), ".env"), quiet: true });

import { loadConfig, createDefaultConfig, CONFIG_FILE_NAME } from "./config.js";
import { OpenAITranslator, DryRunTranslator } from "./translator.js";
import { runTranslateFile } from "./runner.js";
import type { Translator } from "./types.js";
import {
  colorize,
  log,
  printError,
  printHeader,
  printSuccess,
  printWarning,
} from "./utils.js";

interface TranslateCommandOptions {
  outputDir?: string;
  model?: string;
  language?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/** Display a file path relative to cwd */
function relPath(filePath: string): string {
  return path.relative(process.cwd(), filePath);
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < -1) {
    throw new InvalidArgumentError("Must be -1 (no limit) or a non-negative integer.");
  }
  return n;
}

function exitWithError(error: unknown): never {
  printError(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

const program = new Command();

program
  .name("jsonl-translate")
  .description("Translate the strings of a JSON Lines file with an LLM, keeping its structure")
  .version("1.0.0")
  .argument("<input_file>", "the JSONL file to translate")
  .argument(
    "[concurrency]",
    "max translation requests in flight (default: from config, 8)",
    parsePositiveInt,
  )
  .argument(
    "[limit]",
    "number of lines to translate from the top of the file (-1: no limit)",
    parseLimit,
    -1,
  )
  .option("-o, --output-dir <dir>", "directory for the translated file (default: from config)")
  .option("--model <model>", "model to use (default: from config)")
  .option("-l, --language <name>", "target language (default: from config)")
  .option("--dry-run", "tag strings with the target language instead of calling the API")
  .option("-v, --verbose", "log every string as it is translated")
  .action(
    async (
      inputFile: string,
      concurrency: number | undefined,
      limit: number,
      options: TranslateCommandOptions,
    ) => {
      try {
        printHeader("jsonl-translate");

        log("Loading settings...");
        const cfg = loadConfig({
          model: options.model,
          concurrency,
          targetLanguage: options.language,
          outputDir: options.outputDir,
        });
        log(`Model : ${cfg.model}`);
        log(`URL : ${cfg.baseUrl ?? "(default)"}`);
        log(`Target language : ${cfg.targetLanguage}`);
        log(`Temperature : ${cfg.temperature}`);
        log(`Max retries : ${cfg.maxRetries}`);
        log(`Timeout : ${cfg.timeoutSeconds} seconds`);
        log("Settings loaded.");

        let translator: Translator;
        if (options.dryRun) {
          log("Dry run: no API calls will be made.", "yellow");
          translator = new DryRunTranslator(cfg.targetLanguage);
        } else {
          translator = new OpenAITranslator(cfg);
        }

        const summary = await runTranslateFile(inputFile, cfg, {
          translator,
          limit,
          verbose: options.verbose,
        });

        console.log("");
        printSuccess(
          `Translated ${summary.recordCount} record(s), ${summary.leafCount} string(s) → ${relPath(summary.outputPath)}`,
        );
      } catch (error) {
        exitWithError(error);
      }
    },
  );

// ============================================================================
// init command
// ============================================================================
program
  .command("init")
  .description(`Create a default ${CONFIG_FILE_NAME} in the current directory`)
  .action(() => {
    try {
      printHeader("Initializing jsonl-translate");

      const existingConfig = path.join(process.cwd(), CONFIG_FILE_NAME);
      if (fs.existsSync(existingConfig)) {
        console.log(
          colorize(`\n  ${CONFIG_FILE_NAME} already exists in this directory.`, "yellow"),
        );
        console.log("  Delete it first if you want to reinitialize.\n");
        return;
      }

      const configPath = createDefaultConfig();
      console.log(
        `\n  ${colorize("Created:", "green")} ${path.basename(configPath)}`,
      );

      console.log("");
      if (process.env.API_KEY || process.env.OPENAI_API_KEY) {
        printSuccess("API key is set");
      } else {
        printWarning("API_KEY not found");
        console.log("  Set it (or OPENAI_API_KEY) before running translations,");
        console.log("  in the environment or in a .env file.\n");
      }
    } catch (error) {
      exitWithError(error);
    }
  });

program.parseAsync(process.argv).catch(exitWithError);
