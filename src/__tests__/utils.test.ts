import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { LosslessNumber } from "lossless-json";

import {
  loadJsonl,
  saveJsonl,
  resolveOutputPath,
  formatTimestamp,
  formatDuration,
} from "../utils.js";
import { InputFileError } from "../errors.js";

describe("JSON Lines files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-translate-utils-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeInput(content: string): string {
    const file = path.join(dir, "input.jsonl");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("loads one record per line and skips blank lines", () => {
    const file = writeInput('{"a":1}\n\n   \n[1,"x"]\n');
    expect(loadJsonl(file)).toEqual([{ a: 1 }, [1, "x"]]);
  });

  it("accepts CRLF line endings", () => {
    const file = writeInput('{"a":"b"}\r\n{"c":2}\r\n');
    expect(loadJsonl(file)).toEqual([{ a: "b" }, { c: 2 }]);
  });

  it("reports the line of invalid JSON", () => {
    const file = writeInput('{"a":1}\n{bad}\n');

    let error: unknown;
    try {
      loadJsonl(file);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(InputFileError);
    if (!(error instanceof InputFileError)) return;
    expect(error.line).toBe(2);
    expect(error.message).toContain(`${file}:2`);
  });

  it("fails on a missing file", () => {
    expect(() => loadJsonl(path.join(dir, "missing.jsonl"))).toThrow(InputFileError);
  });

  it("saves records as JSON Lines, creating the directory", () => {
    const file = path.join(dir, "out", "result.jsonl");

    saveJsonl(file, [{ q: "Combien ça coûte ?" }, [1, null]]);

    expect(fs.readFileSync(file, "utf-8")).toBe(
      '{"q":"Combien ça coûte ?"}\n[1,null]\n',
    );
  });

  it("keeps integers beyond 2^53 digit for digit", () => {
    const file = writeInput('{"id":9007199254740993,"q":"x","n":[1.5,12345678901234567890]}\n');
    const out = path.join(dir, "out.jsonl");

    const records = loadJsonl(file);
    saveJsonl(out, records);

    expect(fs.readFileSync(out, "utf-8")).toBe(
      '{"id":9007199254740993,"q":"x","n":[1.5,12345678901234567890]}\n',
    );
  });

  it("loads safe numbers as plain numbers and others as LosslessNumber", () => {
    const file = writeInput('{"small":42,"big":9007199254740993}\n');

    const [record] = loadJsonl(file);

    expect(record).toEqual({ small: 42, big: new LosslessNumber("9007199254740993") });
  });

  it("keeps the input file name in the output directory", () => {
    expect(resolveOutputPath(path.join("data", "train.jsonl"), "/out")).toBe(
      path.join("/out", "train.jsonl"),
    );
  });
});

describe("formatting", () => {
  it("formats timestamps as HH:MM:SS.mmm", () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5, 6))).toBe("03:04:05.006");
    expect(formatTimestamp(new Date(2024, 0, 2, 23, 59, 58, 987))).toBe("23:59:58.987");
  });

  it("formats durations", () => {
    expect(formatDuration(950)).toBe("950ms");
    expect(formatDuration(12400)).toBe("12.4s");
    expect(formatDuration(185000)).toBe("3m 05s");
  });
});
