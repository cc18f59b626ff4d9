import type { UnderwritingEntry } from "./artifacts";

export const NEGATIVE_ANSWER = "No";

export type EligibilityDecision = { eligible: true } | { eligible: false; reason: string };

/** Maps free-form answers onto the allowed set; anything unrecognised is unanswered. */
export function normalizeAnswer(answer: unknown): "Yes" | "No" | null {
  if (typeof answer === "boolean") {
    return answer ? "Yes" : "No";
  }
  if (typeof answer !== "string") {
    return null;
  }
  const normalized = answer.trim().toLowerCase();
  if (["yes", "y", "true"].includes(normalized)) return "Yes";
  if (["no", "n", "false"].includes(normalized)) return "No";
  return null;
}

/**
 * The eligibility gate. Any mandatory question answered with the negative option makes
 * the applicant ineligible; the reason lists each offending question.
 */
export function evaluateEligibility(underwriting: Record<string, UnderwritingEntry>): EligibilityDecision {
  const declined = Object.entries(underwriting)
    .filter(([, entry]) => entry.mandatory && entry.answer === NEGATIVE_ANSWER)
    .sort(([a], [b]) => a.localeCompare(b));

  if (declined.length === 0) {
    return { eligible: true };
  }

  const reason = declined
    .map(([id, entry]) => `Mandatory underwriting question ${id} was answered "${NEGATIVE_ANSWER}": ${entry.question}`)
    .join("; ");
  return { eligible: false, reason };
}
