import { PersistenceGateway } from "../../src/db/gateway";
import type { DocumentBackend } from "../../src/db/backend";
import type { RetryPolicy } from "../../src/extractor/round-trip";
import type { CustomerSubmissionInput } from "../../src/orchestrator/artifacts";
import { DEFAULT_IDENTIFIER_POLICY } from "../../src/services/identifiers";
import { WorkflowEngine } from "../../src/services/workflow";
import { ScriptedGeneration, type ScriptedReply } from "./scripted-generation";

export const FIXED_NOW = new Date("2026-01-15T10:00:00.000Z");

export const testRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 0,
  jitter: 0,
  timeoutMs: 1_000
};

export const customerData = {
  name: "Jordan Test",
  dob: "1990-04-12",
  address: "1 Example Street, Springfield",
  phone: "555-0100",
  email: "jordan@example.test",
  vehicle: { make: "Toyota", model: "Corolla", year: 2019, vin: "TESTVIN0000000001" },
  coveragePreferences: ["Collision", "Liability"]
};

export const eligibleAnswers: Record<string, string | boolean> = {
  "UW-01": "Yes",
  "UW-02": "yes",
  "UW-03": "Y",
  "UW-04": true,
  "UW-05": "Yes"
};

export const allAnswers: Record<string, string | boolean> = {
  ...eligibleAnswers,
  "UW-06": "Yes",
  "UW-07": "No",
  "UW-08": "Yes"
};

export function eligibleSubmission(overrides: Partial<CustomerSubmissionInput> = {}): CustomerSubmissionInput {
  return { customerData, underwritingAnswers: eligibleAnswers, ...overrides };
}

export function happyPathScript(): Record<string, ScriptedReply | ScriptedReply[]> {
  return {
    intake:
      '{"name": "Jordan Test", "dob": "1990-04-12", "address": "1 Example Street, Springfield", "contact": {"phone": "555-0100", "email": "jordan@example.test"}}',
    profile:
      '```json\n{"vehicle": {"make": "Toyota", "model": "Corolla", "year": 2019, "vin": "TESTVIN0000000001"}, "drivingHistory": {"violations": 0, "accidents": 1, "yearsLicensed": 12}, "coveragePreferences": ["Collision", "Liability"]}\n```',
    underwriting: '{"answers": {"UW-06": "Yes", "UW-07": "no"}}',
    risk: 'Assessment: {"riskScore": 4.2, "riskFactors": ["One prior accident"]}',
    coverage:
      '{"coverages": ["Collision", "Liability", "Collision"], "limits": {"collision": 30000, "liability": 100000}, "deductibles": {"collision": 500}, "exclusions": ["Racing"], "addOns": []}',
    draft: "POLICY WORDING v1",
    polish: "POLICY WORDING v2",
    pricing: '{"basePremium": 900, "finalPremium": 954.75, "currency": "USD"}',
    quote: "Quote QUOTE100000: $954.75 per year",
    presentation: "Your Toyota Corolla is covered for collision and liability for $954.75 a year.",
    review: '{"approved": true, "compliant": true, "reasons": [], "issues": []}',
    monitoring: '{"monitoringStatus": "Active", "nextReviewDate": "2027-01-15", "notes": ["Annual review"]}',
    summary: "Policy MV100000 for Jordan Test is active with a final premium of $954.75."
  };
}

export type TestHarness = {
  gateway: PersistenceGateway;
  generation: ScriptedGeneration;
  engine: WorkflowEngine;
};

export async function createHarness(
  options: {
    script?: Record<string, ScriptedReply | ScriptedReply[]>;
    durable?: DocumentBackend;
    gateway?: PersistenceGateway;
  } = {}
): Promise<TestHarness> {
  const gateway =
    options.gateway ??
    new PersistenceGateway({
      durable: options.durable,
      timeoutMs: 1_000,
      sequencePrefixes: [DEFAULT_IDENTIFIER_POLICY.quotePrefix, DEFAULT_IDENTIFIER_POLICY.policyPrefix]
    });
  if (!options.gateway) {
    await gateway.initialize();
  }
  const generation = new ScriptedGeneration(options.script ?? happyPathScript());
  const engine = new WorkflowEngine({
    gateway,
    generation,
    identifiers: DEFAULT_IDENTIFIER_POLICY,
    retry: testRetryPolicy,
    now: () => FIXED_NOW
  });
  return { gateway, generation, engine };
}
