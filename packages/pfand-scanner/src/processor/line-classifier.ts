import type { ClassifierPolicy } from "@pfand/contracts";
import { STANDARD_CLASSIFIER_POLICY } from "./policy.js";
import type { ClassifierDecision, LineContext } from "./types.js";

const DIGIT_REGEX = /\p{Nd}/gu;
const LETTER_REGEX = /\p{L}/u;

type CompiledPolicy = {
  keywords: string[];
  disallowedCharacters: RegExp;
  pricePattern: RegExp | null;
};

const compiledPolicies = new WeakMap<ClassifierPolicy, CompiledPolicy>();

/**
 * Decides whether an OCR line reads like a purchased item rather than receipt clutter
 * (store header, totals, tax, payment and terminal metadata). The first matching rule wins.
 */
export function explainLine(
  line: string,
  context?: LineContext,
  policy: ClassifierPolicy = STANDARD_CLASSIFIER_POLICY,
): ClassifierDecision {
  const compiled = compilePolicy(policy);

  if (context && isBoundaryLine(context, policy)) {
    return reject("boundary");
  }

  const lowered = line.toLowerCase();
  if (compiled.keywords.some((keyword) => lowered.includes(keyword))) {
    return reject("keyword");
  }

  if (exceedsDigitDensity(line, policy)) {
    return reject("digit-density");
  }

  if (compiled.disallowedCharacters.test(line)) {
    return reject("symbol");
  }

  if (line.length < policy.minLength || line.length > policy.maxLength) {
    return reject("length");
  }

  if (compiled.pricePattern?.test(line)) {
    return LETTER_REGEX.test(line)
      ? { accepted: true, rule: "price-with-text" }
      : reject("bare-price");
  }

  return { accepted: true, rule: "accepted" };
}

export function classifyLine(
  line: string,
  context?: LineContext,
  policy: ClassifierPolicy = STANDARD_CLASSIFIER_POLICY,
): boolean {
  return explainLine(line, context, policy).accepted;
}

function reject(rule: ClassifierDecision["rule"]): ClassifierDecision {
  return { accepted: false, rule };
}

function isBoundaryLine(context: LineContext, policy: ClassifierPolicy): boolean {
  const { enabled, marginCount } = policy.skipBoundaryLines;
  if (!enabled) {
    return false;
  }

  return context.index < marginCount || context.index >= context.totalLinesInBlock - marginCount;
}

// The ratio uses the whole line length, spaces and punctuation included.
function exceedsDigitDensity(line: string, policy: ClassifierPolicy): boolean {
  const digits = line.match(DIGIT_REGEX)?.length ?? 0;

  if (policy.maxDigitRatio !== null && digits > line.length * policy.maxDigitRatio) {
    return true;
  }
  if (policy.maxDigitCount !== null && digits > policy.maxDigitCount) {
    return true;
  }
  return false;
}

function compilePolicy(policy: ClassifierPolicy): CompiledPolicy {
  const cached = compiledPolicies.get(policy);
  if (cached) {
    return cached;
  }

  const compiled: CompiledPolicy = {
    keywords: policy.clutterKeywords.map((keyword) => keyword.toLowerCase()),
    disallowedCharacters: new RegExp(policy.disallowedCharacters, "u"),
    pricePattern: policy.pricePattern === null ? null : new RegExp(policy.pricePattern, "u"),
  };
  compiledPolicies.set(policy, compiled);
  return compiled;
}
