import type { CoverageModel, Monitoring, PolicySummaryInput, Pricing, Review, RiskAssessment } from "./artifacts";

// Datasets a stage falls back to once its generation attempts are exhausted.

export const DEFAULT_POLICY_LANGUAGE = "Standard policy language.";

export const POLICY_TERM_DAYS = 365;

export const DEFAULT_PRESENTATION = "Presentation details unavailable.";

export function defaultRiskAssessment(): RiskAssessment {
  return { riskScore: 5, riskFactors: ["Default risk assessment"] };
}

export function defaultCoverageModel(): CoverageModel {
  return {
    coverages: ["Collision", "Liability", "Comprehensive"],
    limits: { collision: 40_000, liability: 100_000 },
    deductibles: { collision: 1_000, comprehensive: 500 },
    exclusions: ["Wear and Tear"],
    addOns: ["Roadside Assistance"]
  };
}

export function defaultPricing(): Pricing {
  return { basePremium: 750, finalPremium: 825.5, currency: "USD" };
}

export function defaultQuoteDetails(pricing: Pricing) {
  return `Final premium: $${pricing.finalPremium.toFixed(2)}`;
}

export function defaultReview(): Review {
  return { approved: true, compliant: true, reasons: [], issues: [] };
}

export function defaultMonitoring(): Monitoring {
  return { monitoringStatus: "Active", notes: [] };
}

export function defaultPolicySummary(policy: PolicySummaryInput) {
  const { issuance, pricing } = policy;
  return [
    `Policy ${issuance.policyNumber} for ${policy.customerProfile.personal.name}`,
    `runs from ${issuance.startDate} to ${issuance.endDate}`,
    `covering ${policy.coverage.coverages.join(", ")}`,
    `at a final premium of ${pricing.currency} ${pricing.finalPremium.toFixed(2)}.`
  ].join(" ");
}
