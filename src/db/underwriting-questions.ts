import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { PersistenceGateway } from "./gateway";

export const underwritingQuestionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  mandatory: z.boolean(),
  explanation: z.string().default(""),
  allowedAnswers: z.array(z.string().min(1)).min(1).default(["Yes", "No"])
});

export type UnderwritingQuestion = z.infer<typeof underwritingQuestionSchema>;

const DEFAULT_QUESTIONS_PATH = fileURLToPath(new URL("../../data/underwriting-questions.json", import.meta.url));

let cachedDefaults: UnderwritingQuestion[] | null = null;

/** Built-in question set shipped with the service, used when the store has none. */
export function defaultUnderwritingQuestions(): UnderwritingQuestion[] {
  if (!cachedDefaults) {
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_QUESTIONS_PATH, "utf8"));
    cachedDefaults = z.array(underwritingQuestionSchema).parse(raw);
  }
  return cachedDefaults.map((question) => ({ ...question, allowedAnswers: [...question.allowedAnswers] }));
}

/** Keeps the entries that parse as questions, ordered by id. */
export function parseUnderwritingQuestions(documents: readonly unknown[]) {
  const questions: UnderwritingQuestion[] = [];
  for (const document of documents) {
    const parsed = underwritingQuestionSchema.safeParse(document);
    if (parsed.success) {
      questions.push(parsed.data);
    }
  }
  return questions.sort((a, b) => a.id.localeCompare(b.id));
}

/** Writes the built-in question set through the gateway, replacing stored entries by id. */
export async function seedUnderwritingQuestions(gateway: PersistenceGateway) {
  const questions = defaultUnderwritingQuestions();
  for (const question of questions) {
    await gateway.upsert("underwritingQuestions", { ...question });
  }
  return questions.length;
}
