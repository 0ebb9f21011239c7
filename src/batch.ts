/**
 * Batch translation of JSON records under one shared concurrency limit
 */

import { setMaxListeners } from "events";
import type { JobHooks, JsonValue, Translator } from "./types.js";
import { Semaphore } from "./semaphore.js";
import { translateTree } from "./tree.js";
import { BatchFailure, TranslationFailure } from "./errors.js";

export interface BatchOptions extends JobHooks {
  translator: Translator;
  /** Max translator calls in flight across all records */
  concurrency: number;
  /** Translate only the first `limit` records; negative or unset means all */
  limit?: number;
}

/**
 * Number of records a batch will translate for the given limit
 */
export function effectiveRecordCount(total: number, limit?: number): number {
  if (limit === undefined || limit < 0) {
    return total;
  }
  return Math.min(limit, total);
}

/**
 * Translate every selected record concurrently and return the results in
 * input order. One semaphore gates all translator calls of the batch.
 *
 * The first failure aborts the whole batch: queued leaves are dropped and
 * in-flight calls receive an aborted signal. Nothing is returned on failure;
 * the promise rejects with a `BatchFailure` whose cause is the
 * `TranslationFailure` of the record that failed first.
 */
export async function translateBatch(
  records: readonly JsonValue[],
  options: BatchOptions,
): Promise<JsonValue[]> {
  const count = effectiveRecordCount(records.length, options.limit);
  const gate = new Semaphore(options.concurrency);
  const controller = new AbortController();
  // Each in-flight call may listen on the signal, plus the gate's own listener
  setMaxListeners(options.concurrency + 1, controller.signal);
  let firstFailure: TranslationFailure | undefined;

  const fail = (recordIndex: number, cause: unknown) => {
    if (firstFailure) return;
    firstFailure = new TranslationFailure(recordIndex, cause);
    controller.abort(firstFailure);
  };

  const pending = records.slice(0, count).map((record, index) =>
    translateTree(
      record,
      {
        gate,
        translator: options.translator,
        signal: controller.signal,
        onJobStart: options.onJobStart,
        onJobDone: options.onJobDone,
        onFailure: (failure) => fail(index, failure),
      },
      `Record #${index + 1}`,
    ).catch((error: unknown) => {
      fail(index, error);
      throw error;
    }),
  );

  try {
    return await Promise.all(pending);
  } catch (error) {
    throw new BatchFailure(count, firstFailure ?? error);
  }
}
