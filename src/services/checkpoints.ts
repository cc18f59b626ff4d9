import { z } from "zod";
import type { PersistenceGateway } from "../db/gateway";
import type { Logger } from "../libs/logger";
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
import { isStageName } from "../orchestrator/constants";
import type { CheckpointRecord, CheckpointWriter, StageName } from "../orchestrator/types";

const stageNameSchema = z.custom<StageName>((value) => isStageName(value), "Unknown stage");

const failureSchema = z.object({
  kind: z.enum(["ValidationFailure", "StageError"]),
  code: z.string(),
  message: z.string(),
  reasons: z.array(z.string()),
  stage: stageNameSchema,
  correlationId: z.string(),
  occurredAt: z.string()
});

const checkpointSchema = z.object({
  id: z.string().min(1),
  sessionId: z.string().min(1),
  quoteNumber: z.number().int(),
  customerProfile: customerProfileSchema.nullable(),
  stage: stageNameSchema.nullable(),
  completedStages: z.array(stageNameSchema),
  status: z.enum(["InProgress", "Draft", "Active", "Ineligible", "Error"]),
  lastUpdated: z.string(),
  submission: z
    .object({
      customerData: z.record(z.unknown()),
      underwritingAnswers: z.record(z.union([z.string(), z.boolean()]))
    })
    .optional(),
  riskInfo: riskAssessmentSchema.optional(),
  coverage: coverageModelSchema.optional(),
  policyDocument: z.string().optional(),
  policyDraft: policyDraftSchema.optional(),
  pricing: pricingSchema.optional(),
  quoteDetails: z.string().optional(),
  presentation: z.string().optional(),
  review: reviewSchema.optional(),
  issuance: issuanceSchema.optional(),
  monitoring: monitoringSchema.optional(),
  summary: z.string().optional(),
  ineligibilityReason: z.string().optional(),
  failure: failureSchema.optional()
});

/** Reads and writes workflow checkpoints in the `policyDrafts` collection. */
export class CheckpointStore implements CheckpointWriter {
  constructor(
    private readonly gateway: PersistenceGateway,
    private readonly logger: Logger
  ) {}

  async save(record: CheckpointRecord) {
    await this.gateway.upsert("policyDrafts", record);
  }

  async load(sessionId: string): Promise<CheckpointRecord | null> {
    const document = await this.gateway.get("policyDrafts", sessionId);
    if (!document) {
      return null;
    }

    const parsed = checkpointSchema.safeParse(document);
    if (!parsed.success) {
      this.logger.error({ sessionId, issues: parsed.error.issues }, "Stored checkpoint is unreadable");
      return null;
    }
    return parsed.data;
  }
}

/** The artifact part of a checkpoint, as the stages see it. */
export function artifactsOf(record: CheckpointRecord): WorkflowArtifacts {
  return {
    submission: record.submission,
    customerProfile: record.customerProfile ?? undefined,
    riskInfo: record.riskInfo,
    coverage: record.coverage,
    policyDocument: record.policyDocument,
    policyDraft: record.policyDraft,
    pricing: record.pricing,
    quoteDetails: record.quoteDetails,
    presentation: record.presentation,
    review: record.review,
    issuance: record.issuance,
    monitoring: record.monitoring,
    summary: record.summary,
    ineligibilityReason: record.ineligibilityReason
  };
}
