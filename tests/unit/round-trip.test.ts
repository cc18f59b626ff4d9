import { describe, expect, it } from "vitest";
import { backoffDelay, requestStructured, requestText, type RetryPolicy } from "../../src/extractor/round-trip";
import { coverageReplySchema, riskAssessmentSchema } from "../../src/orchestrator/artifacts";
import { StageBudget } from "../../src/orchestrator/budget";
import { ScriptedGeneration } from "../utils/scripted-generation";
import { testRetryPolicy } from "../utils/fixtures";

const messages = [
  { role: "system" as const, content: "Return JSON." },
  { role: "user" as const, content: "Assess the risk." }
];

const fallbackRisk = () => ({ riskScore: 5, riskFactors: ["Default risk assessment"] });

function riskRequest(generation: ScriptedGeneration, policy: RetryPolicy = testRetryPolicy, budget?: StageBudget) {
  return requestStructured({
    generation,
    purpose: "risk",
    messages,
    policy,
    budget,
    schema: riskAssessmentSchema,
    fallback: fallbackRisk
  });
}

describe("requestStructured", () => {
  it("returns the first reply that extracts and validates", async () => {
    const generation = new ScriptedGeneration({ risk: '{"riskScore": "7.5", "riskFactors": ["Young driver"]}' });

    const result = await riskRequest(generation);

    expect(result).toEqual({
      value: { riskScore: 7.5, riskFactors: ["Young driver"] },
      attempts: 1,
      source: "generated",
      strategy: "direct"
    });
    expect(generation.calls[0]).toMatchObject({ purpose: "risk", mode: "generation", messages });
  });

  it("retries after a reply with no structured data", async () => {
    const generation = new ScriptedGeneration({ risk: ["no idea", '```json\n{"riskScore": 3}\n```'] });

    const result = await riskRequest(generation);

    expect(result).toEqual({ value: { riskScore: 3, riskFactors: [] }, attempts: 2, source: "generated", strategy: "labeled_fence" });
  });

  it("retries after a reply that fails the schema", async () => {
    const generation = new ScriptedGeneration({ risk: ['{"riskFactors": []}', '{"riskScore": 11}', '{"riskScore": 2}'] });

    const result = await riskRequest(generation);

    expect(result.attempts).toBe(3);
    expect(result.value).toEqual({ riskScore: 2, riskFactors: [] });
  });

  it("retries a reply that parses but leaves a required field empty", async () => {
    const generation = new ScriptedGeneration({
      coverage: ["{}", '{"coverages": []}', '{"coverages": ["Liability"]}']
    });

    const result = await requestStructured({
      generation,
      purpose: "coverage",
      messages,
      policy: testRetryPolicy,
      schema: coverageReplySchema,
      fallback: () => ({ coverages: ["Collision"], limits: {}, deductibles: {}, exclusions: [], addOns: [] })
    });

    expect(result).toEqual({
      value: { coverages: ["Liability"], limits: {}, deductibles: {}, exclusions: [], addOns: [] },
      attempts: 3,
      source: "generated",
      strategy: "direct"
    });
  });

  it("falls back to the default dataset once attempts run out", async () => {
    const generation = new ScriptedGeneration({ risk: "no idea" });

    const result = await riskRequest(generation);

    expect(result).toEqual({ value: fallbackRisk(), attempts: 3, source: "fallback" });
    expect(generation.calls).toHaveLength(3);
  });

  it("counts failed generation calls as attempts", async () => {
    const generation = new ScriptedGeneration({ risk: new Error("upstream 503") });

    const result = await riskRequest(generation);

    expect(result.source).toBe("fallback");
    expect(generation.callsFor("risk")).toBe(3);
  });

  it("gives up on calls that exceed the timeout", async () => {
    const generation = new ScriptedGeneration({ risk: () => new Promise<string>(() => {}) });

    const result = await riskRequest(generation, { ...testRetryPolicy, timeoutMs: 20 });

    expect(result).toEqual({ value: fallbackRisk(), attempts: 3, source: "fallback" });
  });

  it("stops calling once the stage budget is spent", async () => {
    const generation = new ScriptedGeneration({ risk: "no idea" });
    const budget = new StageBudget(2);

    const result = await riskRequest(generation, testRetryPolicy, budget);

    expect(result).toEqual({ value: fallbackRisk(), attempts: 2, source: "fallback" });
    expect(generation.calls).toHaveLength(2);
    expect(budget.totalCalls).toBe(2);
  });

  it("records validation calls against the budget by mode", async () => {
    const generation = new ScriptedGeneration({ review: '{"approved": true}' });
    const budget = new StageBudget(8);

    await requestStructured({
      generation,
      purpose: "review",
      messages,
      mode: "validation",
      policy: testRetryPolicy,
      budget,
      schema: riskAssessmentSchema.partial(),
      fallback: () => ({})
    });

    expect(budget.callsOf("validation")).toBe(1);
    expect(budget.callsOf("generation")).toBe(0);
    expect(generation.calls[0].mode).toBe("validation");
  });
});

describe("requestText", () => {
  it("strips a fence around the whole reply", async () => {
    const generation = new ScriptedGeneration({ draft: "```markdown\nPolicy text\n```" });

    const result = await requestText({
      generation,
      purpose: "draft",
      messages,
      policy: testRetryPolicy,
      fallback: () => "Standard policy language."
    });

    expect(result).toEqual({ value: "Policy text", attempts: 1, source: "generated", strategy: undefined });
  });

  it("rejects blank replies", async () => {
    const generation = new ScriptedGeneration({ draft: ["   ", "Body"] });

    const result = await requestText({
      generation,
      purpose: "draft",
      messages,
      policy: testRetryPolicy,
      fallback: () => "Standard policy language."
    });

    expect(result.value).toBe("Body");
    expect(result.attempts).toBe(2);
  });
});

describe("backoffDelay", () => {
  const policy: RetryPolicy = { maxAttempts: 3, backoffMs: 100, jitter: 0.5, timeoutMs: 1_000 };

  it("doubles per attempt and spreads by the jitter fraction", () => {
    expect(backoffDelay(policy, 1, () => 0.5)).toBe(100);
    expect(backoffDelay(policy, 3, () => 1)).toBe(600);
    expect(backoffDelay(policy, 3, () => 0)).toBe(200);
  });

  it("is exact without jitter", () => {
    expect(backoffDelay({ ...policy, jitter: 0 }, 2, () => 0.9)).toBe(200);
  });
});
