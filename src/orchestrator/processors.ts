import type { UnderwritingQuestion } from "../db/underwriting-questions";
import { requestStructured, requestText } from "../extractor/round-trip";
import { formatPolicyNumber } from "../services/identifiers";
import { isPlainObject } from "../utils/json";
import {
  coverageReplySchema,
  inferredAnswersSchema,
  monitoringSchema,
  personalInfoReplySchema,
  personalInfoSchema,
  pricingReplySchema,
  reviewSchema,
  riskAssessmentSchema,
  vehicleProfileReplySchema,
  vehicleProfileSchema,
  type CustomerProfile,
  type PolicyDraft,
  type UnderwritingEntry,
  type WorkflowArtifacts
} from "./artifacts";
import {
  DEFAULT_POLICY_LANGUAGE,
  DEFAULT_PRESENTATION,
  POLICY_TERM_DAYS,
  defaultCoverageModel,
  defaultMonitoring,
  defaultPolicySummary,
  defaultPricing,
  defaultQuoteDetails,
  defaultReview,
  defaultRiskAssessment
} from "./defaults";
import { evaluateEligibility, normalizeAnswer } from "./eligibility";
import {
  coveragePrompt,
  draftPrompt,
  intakePrompt,
  monitoringPrompt,
  polishPrompt,
  presentationPrompt,
  pricingPrompt,
  profilePrompt,
  quotePrompt,
  reviewPrompt,
  riskPrompt,
  summaryPrompt,
  underwritingPrompt
} from "./prompts";
import type { StageContext, StageName, StageProcessor, StageProcessorResult } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

function completed(update: Partial<WorkflowArtifacts>, usedFallback: boolean): StageProcessorResult {
  return { ok: true, update, usedFallback };
}

function missingInput(...names: string[]): StageProcessorResult {
  return {
    ok: false,
    kind: "ValidationFailure",
    code: "MISSING_INPUT",
    reasons: names.map((name) => `${name} is required but missing`)
  };
}

function roundTripBase(context: StageContext, purpose: string) {
  return {
    generation: context.generation,
    purpose,
    policy: context.retry,
    budget: context.budget,
    logger: context.logger
  };
}

function nested(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isPlainObject(value) ? value : {};
}

/** First present, non-blank value among `keys`. */
function pick(source: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = source[key];
    if (value === undefined || value === null) continue;
    if (typeof value === "string" && value.trim() === "") continue;
    return value;
  }
  return undefined;
}

function isoDate(date: Date) {
  return date.toISOString().slice(0, 10);
}

function personalFromSubmission(data: Record<string, unknown>) {
  const personal = { ...data, ...nested(data, "personalInfo"), ...nested(data, "personal") };
  const contact = { ...personal, ...nested(personal, "contact") };
  const parsed = personalInfoSchema.safeParse({
    name: pick(personal, "name", "fullName", "full_name", "customerName"),
    dob: pick(personal, "dob", "dateOfBirth", "date_of_birth", "birthDate"),
    address: pick(personal, "address"),
    contact: {
      phone: pick(contact, "phone", "phoneNumber", "mobile"),
      email: pick(contact, "email")
    }
  });
  return parsed.success ? parsed.data : personalInfoSchema.parse({});
}

function vehicleFromSubmission(data: Record<string, unknown>) {
  const vehicle = { ...nested(data, "vehicleInfo"), ...nested(data, "vehicle") };
  const preferences = data.coveragePreferences;
  const parsed = vehicleProfileSchema.safeParse({
    vehicle: {
      make: pick(vehicle, "make"),
      model: pick(vehicle, "model"),
      year: pick(vehicle, "year"),
      vin: pick(vehicle, "vin")
    },
    drivingHistory: {},
    coveragePreferences: Array.isArray(preferences)
      ? preferences.filter((entry): entry is string => typeof entry === "string")
      : []
  });
  return parsed.success ? parsed.data : vehicleProfileSchema.parse({});
}

const intake: StageProcessor = {
  async run(context) {
    const { submission } = context.artifacts;
    if (!submission) return missingInput("submission");

    const result = await requestStructured({
      ...roundTripBase(context, "intake"),
      messages: intakePrompt(submission.customerData),
      schema: personalInfoReplySchema,
      fallback: () => personalFromSubmission(submission.customerData)
    });

    const customerProfile: CustomerProfile = {
      personal: result.value,
      underwriting: {},
      eligibility: null,
      eligibilityReason: null
    };
    return completed({ customerProfile }, result.source === "fallback");
  }
};

const profile: StageProcessor = {
  async run(context) {
    const { submission, customerProfile } = context.artifacts;
    if (!submission || !customerProfile) return missingInput("submission", "customerProfile");

    const result = await requestStructured({
      ...roundTripBase(context, "profile"),
      messages: profilePrompt(submission.customerData, customerProfile),
      schema: vehicleProfileReplySchema,
      fallback: () => vehicleFromSubmission(submission.customerData)
    });

    return completed(
      {
        customerProfile: {
          ...customerProfile,
          vehicle: result.value.vehicle,
          drivingHistory: result.value.drivingHistory,
          coveragePreferences: result.value.coveragePreferences
        }
      },
      result.source === "fallback"
    );
  }
};

function acceptedAnswer(question: UnderwritingQuestion, raw: unknown) {
  const answer = normalizeAnswer(raw);
  return answer !== null && question.allowedAnswers.includes(answer) ? answer : null;
}

const underwriting: StageProcessor = {
  async run(context) {
    const { submission, customerProfile } = context.artifacts;
    if (!submission || !customerProfile) return missingInput("submission", "customerProfile");

    const questions = await context.gateway.loadUnderwritingQuestions();
    const answers = new Map<string, string>();
    for (const question of questions) {
      const answer = acceptedAnswer(question, submission.underwritingAnswers[question.id]);
      if (answer) answers.set(question.id, answer);
    }

    let usedFallback = false;
    const unanswered = questions.filter((question) => !answers.has(question.id));
    if (unanswered.length > 0) {
      const inferred = await requestStructured({
        ...roundTripBase(context, "underwriting"),
        mode: "validation",
        messages: underwritingPrompt(customerProfile, unanswered),
        schema: inferredAnswersSchema,
        fallback: () => ({ answers: {} })
      });
      usedFallback = inferred.source === "fallback";
      for (const question of unanswered) {
        const answer = acceptedAnswer(question, inferred.value.answers[question.id]);
        if (answer) answers.set(question.id, answer);
      }
    }

    const entries: Record<string, UnderwritingEntry> = {};
    for (const question of questions) {
      const answer = answers.get(question.id);
      if (answer !== undefined) {
        entries[question.id] = { question: question.text, answer, mandatory: question.mandatory };
      }
    }
    const updated: CustomerProfile = { ...customerProfile, underwriting: entries };

    const missing = questions.filter((question) => question.mandatory && !answers.has(question.id));
    if (missing.length > 0 && evaluateEligibility(entries).eligible) {
      return {
        ok: false,
        kind: "ValidationFailure",
        code: "UNDERWRITING_INCOMPLETE",
        reasons: missing.map((question) => `Mandatory underwriting question ${question.id} is unanswered`),
        update: { customerProfile: updated }
      };
    }

    return completed({ customerProfile: updated }, usedFallback);
  }
};

const risk: StageProcessor = {
  async run(context) {
    const { customerProfile } = context.artifacts;
    if (!customerProfile) return missingInput("customerProfile");

    const result = await requestStructured({
      ...roundTripBase(context, "risk"),
      messages: riskPrompt(customerProfile),
      schema: riskAssessmentSchema,
      fallback: defaultRiskAssessment
    });
    return completed({ riskInfo: result.value }, result.source === "fallback");
  }
};

const coverage: StageProcessor = {
  async run(context) {
    const { customerProfile, riskInfo } = context.artifacts;
    if (!customerProfile || !riskInfo) return missingInput("customerProfile", "riskInfo");

    const result = await requestStructured({
      ...roundTripBase(context, "coverage"),
      messages: coveragePrompt(customerProfile, riskInfo),
      schema: coverageReplySchema,
      fallback: defaultCoverageModel
    });
    return completed({ coverage: result.value }, result.source === "fallback");
  }
};

const draft: StageProcessor = {
  async run(context) {
    const { customerProfile, riskInfo, coverage: model } = context.artifacts;
    if (!customerProfile || !riskInfo || !model) return missingInput("customerProfile", "riskInfo", "coverage");

    const result = await requestText({
      ...roundTripBase(context, "draft"),
      messages: draftPrompt(customerProfile, riskInfo, model),
      fallback: () => DEFAULT_POLICY_LANGUAGE
    });

    const policyDraft: PolicyDraft = {
      id: context.sessionId,
      quoteNumber: context.quoteNumber,
      status: "Draft",
      document: result.value,
      customerProfile,
      riskAssessment: riskInfo,
      coverage: model,
      createdAt: context.now().toISOString()
    };
    return completed({ policyDocument: result.value, policyDraft }, result.source === "fallback");
  }
};

const polish: StageProcessor = {
  async run(context) {
    const { policyDocument, policyDraft } = context.artifacts;
    if (!policyDocument || !policyDraft) return missingInput("policyDocument", "policyDraft");

    const result = await requestText({
      ...roundTripBase(context, "polish"),
      messages: polishPrompt(policyDocument),
      fallback: () => policyDocument
    });
    return completed(
      { policyDocument: result.value, policyDraft: { ...policyDraft, document: result.value } },
      result.source === "fallback"
    );
  }
};

const pricing: StageProcessor = {
  async run(context) {
    const { customerProfile, riskInfo, coverage: model } = context.artifacts;
    if (!customerProfile || !riskInfo || !model) return missingInput("customerProfile", "riskInfo", "coverage");

    const result = await requestStructured({
      ...roundTripBase(context, "pricing"),
      messages: pricingPrompt(customerProfile, riskInfo, model),
      schema: pricingReplySchema,
      fallback: defaultPricing
    });
    return completed({ pricing: result.value }, result.source === "fallback");
  }
};

const quote: StageProcessor = {
  async run(context) {
    const { pricing: premium } = context.artifacts;
    if (!premium) return missingInput("pricing");

    const result = await requestText({
      ...roundTripBase(context, "quote"),
      messages: quotePrompt(premium, context.sessionId),
      fallback: () => defaultQuoteDetails(premium)
    });
    return completed({ quoteDetails: result.value }, result.source === "fallback");
  }
};

const presentation: StageProcessor = {
  async run(context) {
    const { policyDocument, quoteDetails } = context.artifacts;
    if (!policyDocument || !quoteDetails) return missingInput("policyDocument", "quoteDetails");

    const result = await requestText({
      ...roundTripBase(context, "presentation"),
      messages: presentationPrompt(policyDocument, quoteDetails),
      fallback: () => DEFAULT_PRESENTATION
    });
    return completed({ presentation: result.value }, result.source === "fallback");
  }
};

const review: StageProcessor = {
  async run(context) {
    const { policyDocument, pricing: premium } = context.artifacts;
    if (!policyDocument || !premium) return missingInput("policyDocument", "pricing");

    const result = await requestStructured({
      ...roundTripBase(context, "review"),
      mode: "validation",
      messages: reviewPrompt(policyDocument, premium),
      schema: reviewSchema,
      fallback: defaultReview
    });

    const outcome = result.value;
    if (!outcome.approved || !outcome.compliant) {
      const reasons = [...outcome.reasons, ...outcome.issues];
      return {
        ok: false,
        kind: "ValidationFailure",
        code: "REVIEW_REJECTED",
        reasons: reasons.length > 0 ? reasons : ["Policy was rejected by review"],
        update: { review: outcome }
      };
    }
    return completed({ review: outcome }, result.source === "fallback");
  }
};

const issuance: StageProcessor = {
  async run(context) {
    const { policyDraft, pricing: premium } = context.artifacts;
    if (!policyDraft || !premium) return missingInput("policyDraft", "pricing");

    const policyNumber = formatPolicyNumber(context.identifiers, context.quoteNumber);
    const start = context.now();
    const issued = {
      policyNumber,
      startDate: isoDate(start),
      endDate: isoDate(new Date(start.getTime() + POLICY_TERM_DAYS * DAY_MS))
    };
    const activated: PolicyDraft = { ...policyDraft, status: "Active", policyNumber };

    await context.gateway.upsert("policiesIssued", {
      id: policyNumber,
      policyNumber,
      quoteId: context.sessionId,
      quoteNumber: context.quoteNumber,
      status: "Active",
      customerProfile: policyDraft.customerProfile,
      riskAssessment: policyDraft.riskAssessment,
      coverage: policyDraft.coverage,
      pricing: premium,
      quoteDetails: context.artifacts.quoteDetails ?? null,
      policyDocument: policyDraft.document,
      issuance: issued,
      activatedDate: start.toISOString()
    });
    context.logger.info({ policyNumber }, "Policy issued");

    return completed({ issuance: issued, policyDraft: activated }, false);
  }
};

const monitoring: StageProcessor = {
  async run(context) {
    const { issuance: issued, customerProfile, riskInfo } = context.artifacts;
    if (!issued || !customerProfile || !riskInfo) return missingInput("issuance", "customerProfile", "riskInfo");

    const result = await requestStructured({
      ...roundTripBase(context, "monitoring"),
      messages: monitoringPrompt(issued.policyNumber, customerProfile, riskInfo),
      schema: monitoringSchema,
      fallback: defaultMonitoring
    });
    return completed({ monitoring: result.value }, result.source === "fallback");
  }
};

const summary: StageProcessor = {
  async run(context) {
    const { customerProfile, coverage: model, policyDocument, pricing: premium } = context.artifacts;
    const { quoteDetails, issuance: issued, monitoring: followUp } = context.artifacts;
    if (!customerProfile || !model || !policyDocument || !premium || !quoteDetails || !issued || !followUp) {
      return missingInput(
        "customerProfile",
        "coverage",
        "policyDocument",
        "pricing",
        "quoteDetails",
        "issuance",
        "monitoring"
      );
    }

    const policy = {
      customerProfile,
      coverage: model,
      policyDocument,
      pricing: premium,
      quoteDetails,
      issuance: issued,
      monitoring: followUp,
      activatedDate: issued.startDate
    };
    const result = await requestText({
      ...roundTripBase(context, "summary"),
      messages: summaryPrompt(policy),
      fallback: () => defaultPolicySummary(policy)
    });
    return completed({ summary: result.value }, result.source === "fallback");
  }
};

export const stageProcessors: Record<StageName, StageProcessor> = {
  intake,
  profile,
  underwriting,
  risk,
  coverage,
  draft,
  polish,
  pricing,
  quote,
  presentation,
  review,
  issuance,
  monitoring,
  summary
};
