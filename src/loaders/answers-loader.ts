/**
 * Readiness questionnaire answers from a JSON file:
 * `{ "env_1": 0, "soc_2": "Occasional surveys", ... }`.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { EntryFileError } from "../errors.js";
import type { ReadinessAnswers } from "../frameworks/readiness.js";

const AnswersSchema = z.record(z.union([z.number().int(), z.string()]));

export function parseReadinessAnswers(source: string, raw: unknown): ReadinessAnswers {
  const parsed = AnswersSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new EntryFileError(source, `${where}expected an option index or option text`, {
      cause: parsed.error,
      contents: "answers",
    });
  }
  return parsed.data;
}

export async function loadReadinessAnswers(source: string): Promise<ReadinessAnswers> {
  let text: string;
  try {
    text = await readFile(source, "utf-8");
  } catch (err) {
    throw new EntryFileError(source, "file could not be read", { cause: err, contents: "answers" });
  }
  try {
    return parseReadinessAnswers(source, JSON.parse(text));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new EntryFileError(source, "not valid JSON", { cause: err, contents: "answers" });
    }
    throw err;
  }
}
