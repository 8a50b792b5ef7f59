import type { Capitalization, NormalizerPolicy } from "@pfand/contracts";
import { DEFAULT_NORMALIZER_POLICY } from "./policy.js";

/**
 * Deduplicates accepted lines and returns the capitalized display form of the first occurrence
 * of each canonical key. Keys are taken from the display form, so feeding the output back in
 * yields the same list.
 */
export function normalizeItems(
  candidates: readonly string[],
  policy: NormalizerPolicy = DEFAULT_NORMALIZER_POLICY,
): string[] {
  const merged = new Map<string, string>();

  for (const candidate of candidates) {
    const trimmed = candidate.trim();
    if (!trimmed) {
      continue;
    }

    const display = capitalize(trimmed, policy.capitalization);
    const key = toCanonicalKey(display);
    if (merged.has(key)) {
      continue;
    }
    merged.set(key, display);
  }

  const entries = [...merged.entries()];
  if (policy.order === "sorted") {
    entries.sort(([left], [right]) => compareKeys(left, right));
  }

  return entries.map(([, display]) => display);
}

export function toCanonicalKey(value: string): string {
  return value.trim().toLowerCase();
}

// Characters that expand when upper-cased ("ß", "ﬁ") keep only their first letter capitalized.
function capitalize(value: string, mode: Capitalization): string {
  const [first = "", ...restChars] = Array.from(value);
  const rest = restChars.join("");
  const upper = first.toUpperCase();
  const [head = "", ...tail] = Array.from(upper);
  const titled = head + tail.join("").toLowerCase();
  return titled + (mode === "sentence" ? rest.toLowerCase() : rest);
}

// Code-unit order, independent of the host locale.
function compareKeys(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
}
