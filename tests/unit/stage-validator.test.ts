import { describe, expect, it } from "vitest";
import type { CustomerProfile, WorkflowArtifacts } from "../../src/orchestrator/artifacts";
import { defaultCoverageModel, defaultPricing, defaultRiskAssessment } from "../../src/orchestrator/defaults";
import { validateStageInput, validateStageOutput } from "../../src/validators/stage-validator";

function profile(overrides: Partial<CustomerProfile> = {}): CustomerProfile {
  return {
    personal: {
      name: "Jordan Test",
      dob: "1990-04-12",
      address: "1 Example Street",
      contact: { phone: "555-0100", email: "jordan@example.test" }
    },
    underwriting: {},
    eligibility: true,
    eligibilityReason: null,
    ...overrides
  };
}

describe("validateStageInput", () => {
  it("needs the policy document and quote before the presentation", () => {
    expect(validateStageInput("presentation", { quoteDetails: "Final premium: $825.50" })).toEqual({
      ok: false,
      reasons: ["policyDocument is required before the presentation stage"]
    });
  });

  it("lists each missing artifact", () => {
    expect(validateStageInput("coverage", {})).toEqual({
      ok: false,
      reasons: [
        "customerProfile is required before the coverage stage",
        "riskInfo is required before the coverage stage"
      ]
    });
  });

  it("accepts intake with a submission", () => {
    const artifacts: WorkflowArtifacts = { submission: { customerData: {}, underwritingAnswers: {} } };
    expect(validateStageInput("intake", artifacts)).toEqual({ ok: true, reasons: [] });
  });

  it("does not let an ineligible profile reach risk", () => {
    const artifacts: WorkflowArtifacts = {
      customerProfile: profile({ eligibility: false, eligibilityReason: "declined" })
    };
    expect(validateStageInput("risk", artifacts)).toEqual({
      ok: false,
      reasons: ["customerProfile.eligibility must be true before the risk stage"]
    });
    expect(validateStageInput("risk", { customerProfile: profile() }).ok).toBe(true);
  });

  it("requires an approved review before issuance", () => {
    const artifacts: WorkflowArtifacts = {
      pricing: defaultPricing(),
      review: { approved: false, compliant: true, reasons: [], issues: [] },
      policyDraft: {
        id: "QUOTE100000",
        quoteNumber: 100000,
        status: "Draft",
        document: "Standard policy language.",
        customerProfile: profile(),
        riskAssessment: defaultRiskAssessment(),
        coverage: defaultCoverageModel(),
        createdAt: "2026-01-15T10:00:00.000Z"
      }
    };
    expect(validateStageInput("issuance", artifacts)).toEqual({
      ok: false,
      reasons: ["review.approved must be true before the issuance stage"]
    });
  });
});

describe("validateStageOutput", () => {
  it("requires a customer name after intake", () => {
    const artifacts: WorkflowArtifacts = {
      customerProfile: profile({
        personal: { name: "", dob: "", address: "", contact: { phone: "", email: "" } }
      })
    };
    expect(validateStageOutput("intake", artifacts)).toEqual({
      ok: false,
      reasons: ["customerProfile.personal.name could not be determined from the submission"]
    });
  });

  it("reports a missing artifact", () => {
    expect(validateStageOutput("risk", {})).toEqual({ ok: false, reasons: ["riskInfo is missing"] });
  });

  it("reports schema issues with their artifact path", () => {
    expect(validateStageOutput("risk", { riskInfo: { riskScore: 11, riskFactors: [] } })).toEqual({
      ok: false,
      reasons: ["riskInfo.riskScore: Number must be less than or equal to 10"]
    });
  });

  it("requires a decided eligibility after underwriting", () => {
    expect(validateStageOutput("underwriting", { customerProfile: profile({ eligibility: null }) })).toEqual({
      ok: false,
      reasons: ["customerProfile.eligibility was not decided"]
    });
    expect(
      validateStageOutput("underwriting", { customerProfile: profile({ eligibility: false, eligibilityReason: null }) })
    ).toEqual({ ok: false, reasons: ["customerProfile.eligibilityReason is required when eligibility is false"] });
  });

  it("rejects an empty coverage list", () => {
    expect(validateStageOutput("coverage", { coverage: { ...defaultCoverageModel(), coverages: [] } })).toEqual({
      ok: false,
      reasons: ["coverage.coverages must list at least one coverage"]
    });
    expect(validateStageOutput("coverage", { coverage: defaultCoverageModel() }).ok).toBe(true);
  });

  it("rejects a zero premium", () => {
    expect(validateStageOutput("pricing", { pricing: { basePremium: 0, finalPremium: 0, currency: "USD" } })).toEqual({
      ok: false,
      reasons: ["pricing.finalPremium must be greater than zero"]
    });
  });

  it("requires quote text", () => {
    expect(validateStageOutput("quote", { quoteDetails: "  " })).toEqual({ ok: false, reasons: ["quoteDetails is empty"] });
    expect(validateStageOutput("quote", { quoteDetails: "Final premium: $825.50" }).ok).toBe(true);
  });

  it("requires presentation and summary text", () => {
    expect(validateStageOutput("presentation", {})).toEqual({ ok: false, reasons: ["presentation is empty"] });
    expect(validateStageOutput("summary", { summary: "" })).toEqual({ ok: false, reasons: ["summary is empty"] });
    expect(validateStageOutput("summary", { summary: "Policy MV100000 is active." }).ok).toBe(true);
  });

  it("rejects a review that withholds approval", () => {
    expect(
      validateStageOutput("review", { review: { approved: true, compliant: false, reasons: [], issues: ["Missing clause"] } })
    ).toEqual({ ok: false, reasons: ["review must approve the policy and find it compliant"] });
  });
});
