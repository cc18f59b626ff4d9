import type { ZodTypeAny } from "zod";
import {
  coverageModelSchema,
  customerProfileSchema,
  issuanceSchema,
  monitoringSchema,
  policyDraftSchema,
  pricingSchema,
  reviewSchema,
  riskAssessmentSchema,
  type WorkflowArtifacts
} from "../orchestrator/artifacts";
import type { StageName } from "../orchestrator/types";

export type StageValidationResult = {
  ok: boolean;
  reasons: string[];
};

type ArtifactKey = keyof WorkflowArtifacts;

type StageValidator = (artifacts: WorkflowArtifacts) => StageValidationResult;

/** Artifacts a stage reads; checked before it runs. */
const stageInputs: Record<StageName, ArtifactKey[]> = {
  intake: ["submission"],
  profile: ["submission", "customerProfile"],
  underwriting: ["submission", "customerProfile"],
  risk: ["customerProfile"],
  coverage: ["customerProfile", "riskInfo"],
  draft: ["customerProfile", "riskInfo", "coverage"],
  polish: ["policyDocument", "policyDraft"],
  pricing: ["customerProfile", "riskInfo", "coverage"],
  quote: ["pricing"],
  presentation: ["policyDocument", "quoteDetails"],
  review: ["policyDocument", "pricing"],
  issuance: ["policyDraft", "pricing", "review"],
  monitoring: ["issuance", "customerProfile", "riskInfo"],
  summary: ["customerProfile", "coverage", "policyDocument", "pricing", "quoteDetails", "issuance", "monitoring"]
};

const artifactSchemas: Partial<Record<ArtifactKey, ZodTypeAny>> = {
  customerProfile: customerProfileSchema,
  riskInfo: riskAssessmentSchema,
  coverage: coverageModelSchema,
  policyDraft: policyDraftSchema,
  pricing: pricingSchema,
  review: reviewSchema,
  issuance: issuanceSchema,
  monitoring: monitoringSchema
};

const stageOutputValidators: Record<StageName, StageValidator> = {
  intake: validateIntake,
  profile: (artifacts) => requireSchemas(artifacts, "customerProfile"),
  underwriting: validateUnderwriting,
  risk: (artifacts) => requireSchemas(artifacts, "riskInfo"),
  coverage: validateCoverage,
  draft: validateDraft,
  polish: validateDraft,
  pricing: validatePricing,
  quote: (artifacts) => requireText(artifacts.quoteDetails, "quoteDetails"),
  presentation: (artifacts) => requireText(artifacts.presentation, "presentation"),
  review: validateReview,
  issuance: validateIssuance,
  monitoring: (artifacts) => requireSchemas(artifacts, "monitoring"),
  summary: (artifacts) => requireText(artifacts.summary, "summary")
};

export function validateStageInput(stage: StageName, artifacts: WorkflowArtifacts): StageValidationResult {
  const missing = stageInputs[stage].filter((key) => artifacts[key] === undefined);
  if (missing.length > 0) {
    return { ok: false, reasons: missing.map((key) => `${key} is required before the ${stage} stage`) };
  }
  if (stage === "risk" && artifacts.customerProfile?.eligibility !== true) {
    return fail("customerProfile.eligibility must be true before the risk stage");
  }
  if (stage === "issuance" && artifacts.review?.approved !== true) {
    return fail("review.approved must be true before the issuance stage");
  }
  return ok();
}

export function validateStageOutput(stage: StageName, artifacts: WorkflowArtifacts): StageValidationResult {
  return stageOutputValidators[stage](artifacts);
}

function validateIntake(artifacts: WorkflowArtifacts) {
  const schema = requireSchemas(artifacts, "customerProfile");
  if (!schema.ok) return schema;
  if (!artifacts.customerProfile?.personal.name) {
    return fail("customerProfile.personal.name could not be determined from the submission");
  }
  return ok();
}

function validateUnderwriting(artifacts: WorkflowArtifacts) {
  const schema = requireSchemas(artifacts, "customerProfile");
  if (!schema.ok) return schema;

  const profile = artifacts.customerProfile;
  if (profile?.eligibility === false && !profile.eligibilityReason) {
    return fail("customerProfile.eligibilityReason is required when eligibility is false");
  }
  if (profile?.eligibility === null) {
    return fail("customerProfile.eligibility was not decided");
  }
  return ok();
}

function validateCoverage(artifacts: WorkflowArtifacts) {
  const schema = requireSchemas(artifacts, "coverage");
  if (!schema.ok) return schema;
  return artifacts.coverage && artifacts.coverage.coverages.length > 0
    ? ok()
    : fail("coverage.coverages must list at least one coverage");
}

function validateDraft(artifacts: WorkflowArtifacts) {
  const text = requireText(artifacts.policyDocument, "policyDocument");
  if (!text.ok) return text;
  return requireSchemas(artifacts, "policyDraft");
}

function validatePricing(artifacts: WorkflowArtifacts) {
  const schema = requireSchemas(artifacts, "pricing");
  if (!schema.ok) return schema;
  return artifacts.pricing && artifacts.pricing.finalPremium > 0
    ? ok()
    : fail("pricing.finalPremium must be greater than zero");
}

function validateReview(artifacts: WorkflowArtifacts) {
  const schema = requireSchemas(artifacts, "review");
  if (!schema.ok) return schema;
  return artifacts.review?.approved && artifacts.review.compliant
    ? ok()
    : fail("review must approve the policy and find it compliant");
}

function validateIssuance(artifacts: WorkflowArtifacts) {
  const schema = requireSchemas(artifacts, "issuance", "policyDraft");
  if (!schema.ok) return schema;
  const { issuance, policyDraft } = artifacts;
  if (policyDraft?.status !== "Active" || policyDraft.policyNumber !== issuance?.policyNumber) {
    return fail("policyDraft must be Active and carry the issued policy number");
  }
  return ok();
}

function requireSchemas(artifacts: WorkflowArtifacts, ...keys: ArtifactKey[]): StageValidationResult {
  const reasons: string[] = [];
  for (const key of keys) {
    const value = artifacts[key];
    const schema = artifactSchemas[key];
    if (value === undefined) {
      reasons.push(`${key} is missing`);
      continue;
    }
    if (!schema) continue;
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        reasons.push(`${[key, ...issue.path].join(".")}: ${issue.message}`);
      }
    }
  }
  return reasons.length > 0 ? { ok: false, reasons } : ok();
}

function requireText(value: string | undefined, name: string) {
  return typeof value === "string" && value.trim().length > 0 ? ok() : fail(`${name} is empty`);
}

function ok(): StageValidationResult {
  return { ok: true, reasons: [] };
}

function fail(...reasons: string[]): StageValidationResult {
  return { ok: false, reasons };
}
