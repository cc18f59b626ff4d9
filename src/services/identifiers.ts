import type { PersistenceGateway } from "../db/gateway";

/**
 * How quote ids and policy numbers are built. Both share one allocated number: the
 * policy number for quote `QUOTE100010` is `MV100010`.
 */
export type IdentifierPolicy = {
  quotePrefix: string;
  policyPrefix: string;
  increment: number;
  defaultStart: number;
};

export const DEFAULT_IDENTIFIER_POLICY: IdentifierPolicy = {
  quotePrefix: "QUOTE",
  policyPrefix: "MV",
  increment: 10,
  defaultStart: 100_000
};

export const QUOTE_SEQUENCE_FIELD = "quoteNumber";

export function formatQuoteId(policy: IdentifierPolicy, quoteNumber: number) {
  return `${policy.quotePrefix}${quoteNumber}`;
}

export function formatPolicyNumber(policy: IdentifierPolicy, quoteNumber: number) {
  return `${policy.policyPrefix}${quoteNumber}`;
}

/** Allocates the number a new session's quote id and eventual policy number share. */
export function allocateQuoteNumber(gateway: PersistenceGateway, policy: IdentifierPolicy) {
  return gateway.nextSequence(QUOTE_SEQUENCE_FIELD, "policyDrafts", policy.increment, policy.defaultStart);
}
