/**
 * Translate one JSON Lines file end to end: load, translate, save
 */

import type { JsonValue, TranslateConfig, Translator } from "./types.js";
import { translateBatch, effectiveRecordCount } from "./batch.js";
import { countLeaves } from "./tree.js";
import {
  loadJsonl,
  saveJsonl,
  resolveOutputPath,
  log,
  formatDuration,
} from "./utils.js";

export interface RunOptions {
  translator: Translator;
  /** Records to translate from the top of the file; -1 for all */
  limit?: number;
  /** Log every string as it starts and finishes */
  verbose?: boolean;
}

export interface RunSummary {
  outputPath: string;
  recordCount: number;
  leafCount: number;
  durationMs: number;
}

export async function runTranslateFile(
  inputFile: string,
  config: TranslateConfig,
  options: RunOptions,
): Promise<RunSummary> {
  const { translator, limit = -1, verbose = false } = options;
  const outputPath = resolveOutputPath(inputFile, config.outputDir);

  log(`Input file : ${inputFile}`);
  log(`Output file : ${outputPath}`);
  log(`Number of tasks : ${config.concurrency}`);
  log(`Lines limit : ${limit >= 0 ? limit : "no limit"}`);

  log("Loading JSON objects from the input file...");
  const records = loadJsonl(inputFile);
  const recordCount = effectiveRecordCount(records.length, limit);
  const selected: JsonValue[] = records.slice(0, recordCount);
  const leafCount = selected.reduce<number>(
    (sum, record) => sum + countLeaves(record),
    0,
  );
  log(
    `${records.length} JSON object(s) loaded, translating ${recordCount} (${leafCount} strings).`,
  );

  let completed = 0;
  let lastReported = 0;
  const showProgress = !verbose && process.stdout.isTTY === true;

  log("Beginning translation tasks...", "cyan");
  const startTime = Date.now();
  const translations = await translateBatch(records, {
    translator,
    concurrency: config.concurrency,
    limit,
    onJobStart: verbose
      ? (job) => log(`Translating ${job.position}...`, "dim")
      : undefined,
    onJobDone: (job) => {
      completed++;
      if (verbose) {
        log(`${job.position} translated.`);
        return;
      }
      // Only update progress every 2% to reduce stdout overhead
      const pct = leafCount === 0 ? 100 : Math.round((completed / leafCount) * 100);
      if (showProgress && (pct >= lastReported + 2 || completed === leafCount)) {
        lastReported = pct;
        process.stdout.write(`\r  Progress: ${completed}/${leafCount} (${pct}%)`);
      }
    },
  });
  const durationMs = Date.now() - startTime;
  if (showProgress && leafCount > 0) {
    process.stdout.write("\n");
  }
  log(`Translation tasks completed in ${formatDuration(durationMs)}.`, "green");

  log(`Saving translations to ${outputPath}...`);
  saveJsonl(outputPath, translations);
  log(`Translations saved to ${outputPath}.`);

  return { outputPath, recordCount, leafCount, durationMs };
}
