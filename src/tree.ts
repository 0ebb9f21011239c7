/**
 * Structure-preserving translation of every string leaf in a JSON value
 */

import type {
  JobHooks,
  JsonObject,
  JsonValue,
  TranslationJob,
  Translator,
  TreeNode,
} from "./types.js";
import type { Semaphore } from "./semaphore.js";
import { LosslessNumber } from "lossless-json";
import { PortFailure, TranslationCancelledError } from "./errors.js";

export interface TreeContext extends JobHooks {
  gate: Semaphore;
  translator: Translator;
  signal?: AbortSignal;
  /** Called with a leaf's failure while that leaf still holds its permit */
  onFailure?: (failure: PortFailure) => void;
}

/**
 * A child position paired with its pending translation, or with the
 * original value when the child is an opaque scalar.
 */
type Slot<P> =
  | { position: P; pending: Promise<JsonValue> }
  | { position: P; value: JsonValue };

export function classify(value: JsonValue): TreeNode {
  if (typeof value === "string") {
    return { kind: "string", text: value };
  }
  if (
    value === null ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof LosslessNumber
  ) {
    return { kind: "opaque", value };
  }
  if (Array.isArray(value)) {
    return { kind: "sequence", items: value };
  }
  return { kind: "object", entries: Object.entries(value) };
}

/**
 * Count the string leaves of a value (used for progress reporting)
 */
export function countLeaves(value: JsonValue): number {
  const node = classify(value);
  switch (node.kind) {
    case "string":
      return 1;
    case "opaque":
      return 0;
    case "sequence":
      return node.items.reduce<number>((sum, item) => sum + countLeaves(item), 0);
    case "object":
      return node.entries.reduce<number>(
        (sum, [, child]) => sum + countLeaves(child),
        0,
      );
  }
}

function keyPosition(parent: string, key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key)
    ? `${parent}.${key}`
    : `${parent}[${JSON.stringify(key)}]`;
}

function indexPosition(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

async function translateLeaf(
  job: TranslationJob,
  context: TreeContext,
): Promise<string> {
  const { gate, translator, signal } = context;

  return gate.use(async () => {
    if (signal?.aborted) {
      throw new TranslationCancelledError(job.position);
    }
    context.onJobStart?.(job);
    let translated: string;
    try {
      translated = await translator.translate(job.text, { signal });
    } catch (error) {
      const failure = new PortFailure(job.position, error);
      context.onFailure?.(failure);
      throw failure;
    }
    context.onJobDone?.(job, translated);
    return translated;
  }, signal);
}

/**
 * Start the translation of one child. Opaque scalars get no task.
 */
function launch<P>(
  position: P,
  child: JsonValue,
  childPath: string,
  context: TreeContext,
): Slot<P> {
  const node = classify(child);
  if (node.kind === "opaque") {
    return { position, value: child };
  }
  return { position, pending: translateTree(child, context, childPath) };
}

async function settle<P>(slots: Slot<P>[]): Promise<[P, JsonValue][]> {
  const values = await Promise.all(
    slots.map((slot) => ("pending" in slot ? slot.pending : slot.value)),
  );
  return slots.map((slot, i): [P, JsonValue] => [slot.position, values[i]]);
}

/**
 * Translate every string leaf of `value` and return a new tree of the same
 * shape. Children of a container are translated concurrently; each leaf
 * holds one permit of `context.gate` while the translator runs.
 *
 * The input is never mutated. Rejects with a `PortFailure` when a leaf's
 * translation fails, or a `TranslationCancelledError` for leaves still
 * waiting when `context.signal` aborts.
 */
export async function translateTree(
  value: JsonValue,
  context: TreeContext,
  position = "$",
): Promise<JsonValue> {
  const node = classify(value);

  switch (node.kind) {
    case "string":
      return translateLeaf({ text: node.text, position }, context);

    case "opaque":
      return node.value;

    case "sequence": {
      const slots = node.items.map((item, index) =>
        launch(index, item, indexPosition(position, index), context),
      );
      const settled = await settle(slots);
      return settled.map(([, translated]) => translated);
    }

    case "object": {
      const slots = node.entries.map(([key, child]) =>
        launch(key, child, keyPosition(position, key), context),
      );
      const settled = await settle(slots);
      const rebuilt: JsonObject = Object.fromEntries(settled);
      return rebuilt;
    }

    default: {
      const unreachable: never = node;
      throw new TypeError(`Unknown tree node: ${JSON.stringify(unreachable)}`);
    }
  }
}
