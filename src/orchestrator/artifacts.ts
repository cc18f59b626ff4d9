import { z } from "zod";
import { isPlainObject } from "../utils/json";

const blankToUndefined = (value: unknown) =>
  value === null || (typeof value === "string" && value.trim() === "") ? undefined : value;

/** Free text the model may return as a number or a nested object (addresses mostly). */
const looseText = () =>
  z.preprocess((value) => {
    if (value === null || value === undefined) return "";
    if (typeof value === "number") return String(value);
    if (isPlainObject(value)) {
      return Object.values(value)
        .filter((part) => typeof part === "string" || typeof part === "number")
        .join(", ");
    }
    return value;
  }, z.string().trim());

const looseBoolean = () =>
  z.preprocess((value) => {
    if (typeof value !== "string") return value;
    const normalized = value.trim().toLowerCase();
    if (["true", "yes", "y"].includes(normalized)) return true;
    if (["false", "no", "n"].includes(normalized)) return false;
    return value;
  }, z.boolean());

const optionalCount = () =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional());

const amount = () => z.coerce.number().finite().nonnegative();

/** Money as the model writes it: a number, or a string such as "$1,250.00". Null is not zero. */
const premium = () =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() !== "" ? Number(value.replace(/[$,\s]/g, "")) : value),
    z.number().finite().positive()
  );

const uniqueStrings = (values: string[]) => [...new Set(values)];

const stringSet = () =>
  z
    .array(z.string().trim().min(1))
    .default([])
    .transform(uniqueStrings);

export const customerSubmissionSchema = z.object({
  customerData: z.union([z.record(z.unknown()), z.string().min(1)]),
  underwritingAnswers: z.record(z.union([z.string(), z.boolean()])).optional()
});
export type CustomerSubmissionInput = z.infer<typeof customerSubmissionSchema>;

export type CustomerSubmission = {
  customerData: Record<string, unknown>;
  underwritingAnswers: Record<string, string | boolean>;
};

export const personalInfoSchema = z.object({
  name: looseText(),
  dob: looseText().default(""),
  address: looseText().default(""),
  contact: z
    .object({
      phone: looseText().default(""),
      email: looseText().default("")
    })
    .default({})
});
export type PersonalInfo = z.infer<typeof personalInfoSchema>;

export const personalInfoReplySchema = personalInfoSchema.extend({
  name: looseText().refine((name) => name.length > 0, "Required")
});

export const vehicleProfileSchema = z.object({
  vehicle: z
    .object({
      make: looseText().default(""),
      model: looseText().default(""),
      year: optionalCount(),
      vin: looseText().default("")
    })
    .default({}),
  drivingHistory: z
    .object({
      violations: optionalCount().transform((value) => value ?? 0),
      accidents: optionalCount().transform((value) => value ?? 0),
      yearsLicensed: optionalCount()
    })
    .default({}),
  coveragePreferences: stringSet()
});
export type VehicleProfile = z.infer<typeof vehicleProfileSchema>;

export const vehicleProfileReplySchema = vehicleProfileSchema.extend({
  vehicle: vehicleProfileSchema.shape.vehicle.removeDefault()
});

export const underwritingEntrySchema = z.object({
  question: z.string(),
  answer: z.string(),
  mandatory: z.boolean()
});
export type UnderwritingEntry = z.infer<typeof underwritingEntrySchema>;

export const customerProfileSchema = z.object({
  personal: personalInfoSchema,
  vehicle: vehicleProfileSchema.shape.vehicle.optional(),
  drivingHistory: vehicleProfileSchema.shape.drivingHistory.optional(),
  coveragePreferences: z.array(z.string()).optional(),
  underwriting: z.record(underwritingEntrySchema).default({}),
  eligibility: z.boolean().nullable().default(null),
  eligibilityReason: z.string().nullable().default(null)
});
export type CustomerProfile = z.infer<typeof customerProfileSchema>;

export const inferredAnswersSchema = z.object({
  answers: z.record(z.union([z.string(), z.boolean()]))
});

export const riskAssessmentSchema = z.object({
  riskScore: z.preprocess(blankToUndefined, z.coerce.number().finite().min(0).max(10)),
  riskFactors: z.array(z.string().trim().min(1)).default([])
});
export type RiskAssessment = z.infer<typeof riskAssessmentSchema>;

export const coverageModelSchema = z.object({
  coverages: stringSet(),
  limits: z.record(amount()).default({}),
  deductibles: z.record(amount()).default({}),
  exclusions: stringSet(),
  addOns: stringSet()
});
export type CoverageModel = z.infer<typeof coverageModelSchema>;

export const coverageReplySchema = coverageModelSchema.extend({
  coverages: z.array(z.string().trim().min(1)).min(1).transform(uniqueStrings)
});

/**
 * `Ineligible` completes the status set a stored draft may carry; the engine itself never
 * assigns it, because the eligibility gate stops a session before the draft stage exists.
 */
export const policyStatuses = ["Draft", "Ineligible", "Active"] as const;
export type PolicyStatus = (typeof policyStatuses)[number];

export const policyDraftSchema = z.object({
  id: z.string().min(1),
  quoteNumber: z.number().int(),
  status: z.enum(policyStatuses),
  policyNumber: z.string().optional(),
  document: z.string(),
  customerProfile: customerProfileSchema,
  riskAssessment: riskAssessmentSchema,
  coverage: coverageModelSchema,
  createdAt: z.string()
});
export type PolicyDraft = z.infer<typeof policyDraftSchema>;

export const pricingSchema = z.object({
  basePremium: amount(),
  finalPremium: amount(),
  currency: z.string().trim().min(1).default("USD")
});
export type Pricing = z.infer<typeof pricingSchema>;

export const pricingReplySchema = pricingSchema.extend({
  basePremium: premium(),
  finalPremium: premium()
});

export const reviewSchema = z.object({
  approved: looseBoolean(),
  compliant: looseBoolean().default(true),
  reasons: z.array(z.string()).default([]),
  issues: z.array(z.string()).default([])
});
export type Review = z.infer<typeof reviewSchema>;

export const issuanceSchema = z.object({
  policyNumber: z.string().min(1),
  startDate: z.string(),
  endDate: z.string()
});
export type Issuance = z.infer<typeof issuanceSchema>;

export const monitoringSchema = z
  .object({
    monitoringStatus: z.string().trim().min(1),
    nextReviewDate: z.string().optional(),
    notes: z.array(z.string()).default([])
  })
  .passthrough();
export type Monitoring = z.infer<typeof monitoringSchema>;

/** What the closing summary is written from. */
export type PolicySummaryInput = {
  customerProfile: CustomerProfile;
  coverage: CoverageModel;
  policyDocument: string;
  pricing: Pricing;
  quoteDetails: string;
  issuance: Issuance;
  monitoring: Monitoring;
  activatedDate: string;
};

/** Everything the stages have produced for one session so far. */
export type WorkflowArtifacts = {
  submission?: CustomerSubmission;
  customerProfile?: CustomerProfile;
  riskInfo?: RiskAssessment;
  coverage?: CoverageModel;
  policyDocument?: string;
  policyDraft?: PolicyDraft;
  pricing?: Pricing;
  quoteDetails?: string;
  presentation?: string;
  review?: Review;
  issuance?: Issuance;
  monitoring?: Monitoring;
  summary?: string;
  ineligibilityReason?: string;
};

/** Raw text that is not JSON is kept under `rawInput`. */
export function normalizeSubmission(input: CustomerSubmissionInput): CustomerSubmission {
  let customerData: Record<string, unknown>;
  if (typeof input.customerData === "string") {
    const text = input.customerData;
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = undefined;
    }
    customerData = isPlainObject(parsed) ? parsed : { rawInput: text };
  } else {
    customerData = input.customerData;
  }

  return { customerData, underwritingAnswers: input.underwritingAnswers ?? {} };
}
