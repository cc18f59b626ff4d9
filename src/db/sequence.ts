export type SequenceRequest = {
  field: string;
  increment: number;
  defaultStart: number;
  /** Business prefixes stripped before the digits are read, e.g. `MV`. */
  prefixes: readonly string[];
};

/** What reading a sequence without advancing it needs. */
export type SequencePeek = Pick<SequenceRequest, "field" | "prefixes">;

/**
 * Numeric portion of an identifier field. Numbers pass through; strings lose any known
 * prefix before their digits are read. Anything else yields null.
 */
export function numericPortionOf(value: unknown, prefixes: readonly string[]): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value !== "string") {
    return null;
  }

  let digits = value.trim();
  for (const prefix of prefixes) {
    if (prefix && digits.startsWith(prefix)) {
      digits = digits.slice(prefix.length);
      break;
    }
  }

  return /^\d+$/.test(digits) ? Number.parseInt(digits, 10) : null;
}

export function highestNumericPortion(values: Iterable<unknown>, prefixes: readonly string[]) {
  let highest: number | null = null;
  for (const value of values) {
    const numeric = numericPortionOf(value, prefixes);
    if (numeric !== null && (highest === null || numeric > highest)) {
      highest = numeric;
    }
  }
  return highest;
}

/** Highest number seen so far, stored or reserved; null when there is none. */
export function highWaterMark(highest: number | null, reserved: number | null) {
  const candidates = [highest, reserved].filter((value): value is number => value !== null);
  return candidates.length > 0 ? Math.max(...candidates) : null;
}

/**
 * `max(highest, reserved) + increment`, or `defaultStart` when neither the collection nor
 * the reservation counter has seen a number yet.
 */
export function computeNextSequence(
  highest: number | null,
  reserved: number | null,
  increment: number,
  defaultStart: number
) {
  const mark = highWaterMark(highest, reserved);
  return mark === null ? defaultStart : mark + increment;
}

export function sequenceKey(collection: string, field: string) {
  return `${collection}.${field}`;
}
