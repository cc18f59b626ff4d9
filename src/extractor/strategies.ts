import { isStructured, type StructuredValue } from "../utils/json";

export type StrategyName =
  | "direct"
  | "labeled_fence"
  | "any_fence"
  | "outer_braces"
  | "quoted_keys"
  | "line_trim"
  | "embedded_string"
  | "aggressive_repair";

export type ExtractionStrategy = {
  name: StrategyName;
  /** Regex-heavy strategies are skipped on very large replies. */
  heavy: boolean;
  apply: (text: string) => StructuredValue | undefined;
};

const LABELED_FENCE = /```[^\S\r\n]*json\b[^\S\r\n]*\r?\n?([\s\S]*?)```/i;
const ANY_FENCE = /```[\w+-]*[^\S\r\n]*\r?\n?([\s\S]*?)```/g;
const BRACE_SPAN = /\{[\s\S]*\}/;
const BRACKET_SPAN = /\[[\s\S]*\]/;
const BARE_KEY = /([{,]\s*)([A-Za-z_$][\w$]*)\s*:/g;
const LOOSE_KEY = /(?<!["'\w$-])([A-Za-z_$][\w$-]*)(\s*):(?!\/\/)/g;
const SINGLE_QUOTED = /(?<=[[{,:]\s*)'([^'\\]*)'(?=\s*[,\]}:])/g;
const TRAILING_COMMA = /,\s*([\]}])/g;

/**
 * Parses `candidate` and keeps the result only when it is an object or array.
 * A syntax error is an expected outcome here, not a fault.
 */
export function tryParseStructured(candidate: string | undefined): StructuredValue | undefined {
  if (candidate === undefined) return undefined;
  const trimmed = candidate.trim();
  if (!trimmed) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return undefined;
  }
  return isStructured(parsed) ? parsed : undefined;
}

export function quoteBareKeys(text: string) {
  return text.replace(BARE_KEY, '$1"$2":');
}

function direct(text: string) {
  return tryParseStructured(text);
}

function labeledFence(text: string) {
  return tryParseStructured(LABELED_FENCE.exec(text)?.[1]);
}

function anyFence(text: string) {
  for (const match of text.matchAll(ANY_FENCE)) {
    const value = tryParseStructured(match[1]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function outerBraces(text: string) {
  return tryParseStructured(BRACE_SPAN.exec(text)?.[0]);
}

function quotedKeys(text: string) {
  const span = BRACE_SPAN.exec(text)?.[0];
  return span === undefined ? undefined : tryParseStructured(quoteBareKeys(span));
}

function lineTrim(text: string) {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => /^\s*[[{]/.test(line));
  if (start === -1) return undefined;

  let end = -1;
  for (let index = lines.length - 1; index >= start; index -= 1) {
    if (/[\]}]\s*$/.test(lines[index])) {
      end = index;
      break;
    }
  }
  if (end === -1) return undefined;

  return tryParseStructured(lines.slice(start, end + 1).join("\n"));
}

function embeddedString(text: string) {
  const span = BRACE_SPAN.exec(text)?.[0];
  if (span === undefined || !span.includes('\\"')) return undefined;
  return tryParseStructured(span.replace(/\\(["\\])/g, "$1"));
}

function aggressiveRepair(text: string) {
  const repaired = text
    .replace(SINGLE_QUOTED, '"$1"')
    .replace(LOOSE_KEY, '"$1"$2:')
    .replace(TRAILING_COMMA, "$1");

  return (
    tryParseStructured(repaired) ??
    tryParseStructured(BRACE_SPAN.exec(repaired)?.[0]) ??
    tryParseStructured(BRACKET_SPAN.exec(repaired)?.[0])
  );
}

/** Fixed priority order. The first strategy to produce an object or array wins. */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  { name: "direct", heavy: false, apply: direct },
  { name: "labeled_fence", heavy: false, apply: labeledFence },
  { name: "any_fence", heavy: false, apply: anyFence },
  { name: "outer_braces", heavy: false, apply: outerBraces },
  { name: "quoted_keys", heavy: true, apply: quotedKeys },
  { name: "line_trim", heavy: false, apply: lineTrim },
  { name: "embedded_string", heavy: true, apply: embeddedString },
  { name: "aggressive_repair", heavy: true, apply: aggressiveRepair }
];
