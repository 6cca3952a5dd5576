import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EntryFileError } from "../errors.js";
import { loadReadinessAnswers, parseReadinessAnswers } from "./answers-loader.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scopeledger-answers-test-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("loadReadinessAnswers", () => {
  it("reads indexes and option text", async () => {
    const file = path.join(tmpDir, "answers.json");
    fs.writeFileSync(file, '{"env_1": 2, "soc_2": "Occasional surveys"}');

    expect(await loadReadinessAnswers(file)).toEqual({ env_1: 2, soc_2: "Occasional surveys" });
  });

  it("rejects invalid JSON", async () => {
    const file = path.join(tmpDir, "answers.json");
    fs.writeFileSync(file, "{env_1: 2}");

    await expect(loadReadinessAnswers(file)).rejects.toThrow(
      `Cannot load answers from ${file}: not valid JSON`,
    );
  });

  it("rejects a missing file", async () => {
    await expect(loadReadinessAnswers(path.join(tmpDir, "nope.json"))).rejects.toBeInstanceOf(
      EntryFileError,
    );
  });
});

describe("parseReadinessAnswers", () => {
  it("rejects non-object documents", () => {
    expect(() => parseReadinessAnswers("inline", [1, 2])).toThrow(
      "Cannot load answers from inline: expected an option index or option text",
    );
  });
});
