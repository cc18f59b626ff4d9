import { describe, expect, it } from "vitest";
import {
  coverageModelSchema,
  coverageReplySchema,
  normalizeSubmission,
  personalInfoReplySchema,
  personalInfoSchema,
  pricingReplySchema,
  reviewSchema,
  riskAssessmentSchema,
  vehicleProfileReplySchema,
  vehicleProfileSchema
} from "../../src/orchestrator/artifacts";

describe("normalizeSubmission", () => {
  it("parses a JSON string into customer data", () => {
    expect(normalizeSubmission({ customerData: '{"name": "Jordan Test"}' })).toEqual({
      customerData: { name: "Jordan Test" },
      underwritingAnswers: {}
    });
  });

  it("keeps other text as raw input", () => {
    expect(normalizeSubmission({ customerData: "[1, 2]", underwritingAnswers: { "UW-01": true } })).toEqual({
      customerData: { rawInput: "[1, 2]" },
      underwritingAnswers: { "UW-01": true }
    });
  });
});

describe("artifact schemas", () => {
  it("flattens structured addresses and fills missing contact fields", () => {
    const parsed = personalInfoSchema.parse({
      name: "Jordan Test",
      address: { street: "1 Example Street", city: "Springfield" }
    });

    expect(parsed).toEqual({
      name: "Jordan Test",
      dob: "",
      address: "1 Example Street, Springfield",
      contact: { phone: "", email: "" }
    });
  });

  it("coerces counts and zeroes unknown driving history", () => {
    expect(vehicleProfileSchema.parse({ vehicle: { year: "2019" }, drivingHistory: { accidents: "" } })).toEqual({
      vehicle: { make: "", model: "", year: 2019, vin: "" },
      drivingHistory: { violations: 0, accidents: 0, yearsLicensed: undefined },
      coveragePreferences: []
    });
  });

  it("deduplicates coverage lists", () => {
    const parsed = coverageModelSchema.parse({ coverages: ["Liability", " Liability ", "Collision"], limits: { liability: "100000" } });

    expect(parsed).toEqual({
      coverages: ["Liability", "Collision"],
      limits: { liability: 100000 },
      deductibles: {},
      exclusions: [],
      addOns: []
    });
  });

  it("reads yes/no strings as review flags", () => {
    expect(reviewSchema.parse({ approved: "yes", compliant: "No" })).toEqual({
      approved: true,
      compliant: false,
      reasons: [],
      issues: []
    });
  });
});

describe("reply schemas", () => {
  it("requires a customer name in intake replies", () => {
    const missing = personalInfoReplySchema.safeParse({ dob: "1990-04-12" });
    expect(missing.success).toBe(false);
    expect(missing.error?.issues[0]).toMatchObject({ path: ["name"], message: "Required" });
    expect(personalInfoReplySchema.safeParse({ name: "   " }).success).toBe(false);
    expect(personalInfoReplySchema.parse({ name: "Jordan Test" }).name).toBe("Jordan Test");
  });

  it("requires a vehicle in profile replies", () => {
    expect(vehicleProfileReplySchema.safeParse({}).success).toBe(false);
    expect(vehicleProfileReplySchema.parse({ vehicle: { make: "Toyota" } }).vehicle.make).toBe("Toyota");
  });

  it("requires at least one coverage", () => {
    expect(coverageReplySchema.safeParse({}).success).toBe(false);
    expect(coverageReplySchema.safeParse({ coverages: [] }).success).toBe(false);
    expect(coverageReplySchema.parse({ coverages: ["Liability", "Liability"] }).coverages).toEqual(["Liability"]);
  });

  it("rejects missing, null and zero premiums and reads formatted amounts", () => {
    expect(pricingReplySchema.safeParse({}).success).toBe(false);
    expect(pricingReplySchema.safeParse({ basePremium: null, finalPremium: null }).success).toBe(false);
    expect(pricingReplySchema.safeParse({ basePremium: 0, finalPremium: 10 }).success).toBe(false);
    expect(pricingReplySchema.parse({ basePremium: "$1,200", finalPremium: "1,320.50" })).toEqual({
      basePremium: 1200,
      finalPremium: 1320.5,
      currency: "USD"
    });
  });

  it("does not read a null risk score as zero", () => {
    expect(riskAssessmentSchema.safeParse({ riskScore: null }).success).toBe(false);
    expect(riskAssessmentSchema.parse({ riskScore: 0 })).toEqual({ riskScore: 0, riskFactors: [] });
  });
});
