import { describe, expect, it } from "vitest";
import type { UnderwritingEntry } from "../../src/orchestrator/artifacts";
import { evaluateEligibility, normalizeAnswer } from "../../src/orchestrator/eligibility";

describe("normalizeAnswer", () => {
  it("maps common spellings onto Yes and No", () => {
    expect(normalizeAnswer("Yes")).toBe("Yes");
    expect(normalizeAnswer(" y ")).toBe("Yes");
    expect(normalizeAnswer("TRUE")).toBe("Yes");
    expect(normalizeAnswer(true)).toBe("Yes");
    expect(normalizeAnswer("no")).toBe("No");
    expect(normalizeAnswer("N")).toBe("No");
    expect(normalizeAnswer(false)).toBe("No");
  });

  it("treats anything else as unanswered", () => {
    expect(normalizeAnswer("maybe")).toBeNull();
    expect(normalizeAnswer("")).toBeNull();
    expect(normalizeAnswer(1)).toBeNull();
    expect(normalizeAnswer(undefined)).toBeNull();
  });
});

describe("evaluateEligibility", () => {
  const entry = (answer: string, mandatory: boolean, question = "Question?"): UnderwritingEntry => ({
    question,
    answer,
    mandatory
  });

  it("accepts when every mandatory question is answered Yes", () => {
    expect(
      evaluateEligibility({
        "UW-01": entry("Yes", true),
        "UW-02": entry("Yes", true)
      })
    ).toEqual({ eligible: true });
  });

  it("ignores a No on an optional question", () => {
    expect(evaluateEligibility({ "UW-01": entry("Yes", true), "UW-07": entry("No", false) })).toEqual({ eligible: true });
  });

  it("rejects a No on a mandatory question and names it", () => {
    expect(evaluateEligibility({ "UW-03": entry("No", true, "Is the vehicle unmodified?") })).toEqual({
      eligible: false,
      reason: 'Mandatory underwriting question UW-03 was answered "No": Is the vehicle unmodified?'
    });
  });

  it("lists every declined mandatory question in id order", () => {
    const decision = evaluateEligibility({
      "UW-04": entry("No", true, "Private use only?"),
      "UW-01": entry("No", true, "Licensed driver?"),
      "UW-02": entry("Yes", true)
    });

    expect(decision).toEqual({
      eligible: false,
      reason:
        'Mandatory underwriting question UW-01 was answered "No": Licensed driver?; ' +
        'Mandatory underwriting question UW-04 was answered "No": Private use only?'
    });
  });
});
