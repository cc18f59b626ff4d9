import type { GenerationMessage } from "../libs/generation";
import type { UnderwritingQuestion } from "../db/underwriting-questions";
import type { CustomerProfile, CoverageModel, PolicySummaryInput, Pricing, RiskAssessment } from "./artifacts";

const JSON_ONLY = "Reply with a single JSON object and nothing else. Do not wrap it in prose.";

function block(value: unknown) {
  return JSON.stringify(value, null, 2);
}

function conversation(system: string[], user: string[]): GenerationMessage[] {
  return [
    { role: "system", content: system.join("\n") },
    { role: "user", content: user.join("\n") }
  ];
}

export function intakePrompt(customerData: Record<string, unknown>) {
  return conversation(
    [
      "You are an insurance intake specialist who extracts applicant details from submissions.",
      "Return the applicant's personal information with these keys:",
      '{"name": string, "dob": "YYYY-MM-DD", "address": string, "contact": {"phone": string, "email": string}}',
      "Use an empty string for anything the submission does not state. Never invent values.",
      JSON_ONLY
    ],
    ["Customer submission:", block(customerData)]
  );
}

export function profilePrompt(customerData: Record<string, unknown>, profile: CustomerProfile) {
  return conversation(
    [
      "You are a motor insurance analyst building a customer profile.",
      "Return the insured vehicle, the driving history and the requested coverages:",
      '{"vehicle": {"make": string, "model": string, "year": number, "vin": string},',
      ' "drivingHistory": {"violations": number, "accidents": number, "yearsLicensed": number},',
      ' "coveragePreferences": string[]}',
      JSON_ONLY
    ],
    ["Known applicant details:", block(profile.personal), "", "Customer submission:", block(customerData)]
  );
}

export function underwritingPrompt(profile: CustomerProfile, questions: UnderwritingQuestion[]) {
  return conversation(
    [
      "You are an underwriting assistant. Answer each question from the customer profile alone.",
      'Only answer when the profile clearly supports "Yes" or "No"; leave the question out otherwise.',
      'Return {"answers": {"<question id>": "Yes" | "No"}}.',
      JSON_ONLY
    ],
    [
      "Customer profile:",
      block(profile),
      "",
      "Unanswered questions:",
      ...questions.map((question) => `- ${question.id}: ${question.text}`)
    ]
  );
}

export function riskPrompt(profile: CustomerProfile) {
  return conversation(
    [
      "You are a motor insurance risk assessor.",
      "Score the applicant from 0 (lowest risk) to 10 (highest risk) and list the factors behind the score.",
      '{"riskScore": number, "riskFactors": string[]}',
      JSON_ONLY
    ],
    ["Customer profile:", block(profile)]
  );
}

export function coveragePrompt(profile: CustomerProfile, risk: RiskAssessment) {
  return conversation(
    [
      "You design motor insurance coverage that fits the applicant's preferences and risk.",
      "Amounts are whole currency units.",
      '{"coverages": string[], "limits": {"<coverage>": number}, "deductibles": {"<coverage>": number},',
      ' "exclusions": string[], "addOns": string[]}',
      JSON_ONLY
    ],
    ["Customer profile:", block(profile), "", "Risk assessment:", block(risk)]
  );
}

export function draftPrompt(profile: CustomerProfile, risk: RiskAssessment, coverage: CoverageModel) {
  return conversation(
    [
      "You are a policy writer. Draft the wording of a motor insurance policy.",
      "Cover: parties, insured vehicle, coverages with limits and deductibles, exclusions, add-ons and conditions.",
      "Return the policy text only."
    ],
    [
      "Customer profile:",
      block(profile),
      "",
      "Risk assessment:",
      block(risk),
      "",
      "Coverage model:",
      block(coverage)
    ]
  );
}

export function polishPrompt(document: string) {
  return conversation(
    [
      "You are an editor for insurance documents.",
      "Improve clarity and consistency of the policy below without changing its terms.",
      "Return the revised policy text only."
    ],
    ["Policy draft:", document]
  );
}

export function pricingPrompt(profile: CustomerProfile, risk: RiskAssessment, coverage: CoverageModel) {
  return conversation(
    [
      "You are a pricing analyst for motor insurance.",
      "Compute the annual base premium and the final premium after risk loadings and add-ons.",
      '{"basePremium": number, "finalPremium": number, "currency": string}',
      JSON_ONLY
    ],
    [
      "Customer profile:",
      block(profile),
      "",
      "Risk assessment:",
      block(risk),
      "",
      "Coverage model:",
      block(coverage)
    ]
  );
}

export function quotePrompt(pricing: Pricing, quoteId: string) {
  return conversation(
    [
      "You write short, customer-facing insurance quotes.",
      "State the quote reference, the final premium and what it includes. Return the quote text only."
    ],
    [`Quote reference: ${quoteId}`, "Pricing:", block(pricing)]
  );
}

export function presentationPrompt(document: string, quoteDetails: string) {
  return conversation(
    [
      "You present a motor policy proposal to the customer in plain language.",
      "Walk through what is covered, what is excluded and what it costs. Return the presentation text only."
    ],
    ["Policy document:", document, "", "Quote:", quoteDetails]
  );
}

export function reviewPrompt(document: string, pricing: Pricing) {
  return conversation(
    [
      "You perform the internal approval and regulatory compliance review of a motor policy.",
      "Reject the policy only for concrete problems and list them.",
      '{"approved": boolean, "compliant": boolean, "reasons": string[], "issues": string[]}',
      JSON_ONLY
    ],
    ["Policy document:", document, "", "Pricing:", block(pricing)]
  );
}

export function monitoringPrompt(policyNumber: string, profile: CustomerProfile, risk: RiskAssessment) {
  return conversation(
    [
      "You set up post-issuance monitoring for a motor policy.",
      '{"monitoringStatus": string, "nextReviewDate": "YYYY-MM-DD", "notes": string[]}',
      JSON_ONLY
    ],
    [`Policy number: ${policyNumber}`, "Customer profile:", block(profile), "", "Risk assessment:", block(risk)]
  );
}

export function summaryPrompt(policy: PolicySummaryInput) {
  return conversation(
    [
      "You write the closing summary of an issued motor policy for the customer file.",
      "Cover the policyholder, the policy number and term, the coverages and the premium. Return the summary text only."
    ],
    ["Issued policy:", block(policy)]
  );
}
