import {
  DEFAULT_CLUTTER_KEYWORDS,
  DEFAULT_CONTAINER_KEYWORDS,
  PfandPolicySchema,
  type ClassifierPolicy,
  type ClassifierPreset,
  type DepositPolicy,
  type NormalizerPolicy,
  type PfandPolicy,
  type PfandPolicyOverrides,
} from "@pfand/contracts";

export const STANDARD_CLASSIFIER_POLICY: ClassifierPolicy = {
  clutterKeywords: DEFAULT_CLUTTER_KEYWORDS,
  maxDigitRatio: 0.6,
  maxDigitCount: null,
  // Word characters are Unicode letters and numbers, so precomposed umlauts pass.
  disallowedCharacters: "[^\\p{L}\\p{N}_\\s.,]",
  minLength: 5,
  maxLength: 50,
  pricePattern: "\\d+(\\.\\d{2})?\\s*[€$]",
  skipBoundaryLines: { enabled: false, marginCount: 3 },
};

export const CONSERVATIVE_CLASSIFIER_POLICY: ClassifierPolicy = {
  clutterKeywords: DEFAULT_CLUTTER_KEYWORDS.slice(0, DEFAULT_CLUTTER_KEYWORDS.indexOf("subtotal")),
  maxDigitRatio: null,
  maxDigitCount: 2,
  disallowedCharacters: '[!@#$%^&*()_+=|<>?{}~:;"]',
  minLength: 3,
  maxLength: 50,
  pricePattern: null,
  skipBoundaryLines: { enabled: true, marginCount: 3 },
};

export const DEFAULT_NORMALIZER_POLICY: NormalizerPolicy = {
  order: "sorted",
  capitalization: "sentence",
};

export const DEFAULT_DEPOSIT_POLICY: DepositPolicy = {
  containerKeywords: DEFAULT_CONTAINER_KEYWORDS,
  perUnitDeposit: 0.25,
};

export const DEFAULT_PFAND_POLICY: PfandPolicy = {
  classifier: STANDARD_CLASSIFIER_POLICY,
  normalizer: DEFAULT_NORMALIZER_POLICY,
  deposit: DEFAULT_DEPOSIT_POLICY,
};

export function classifierPolicyForPreset(preset: ClassifierPreset): ClassifierPolicy {
  switch (preset) {
    case "conservative":
      return CONSERVATIVE_CLASSIFIER_POLICY;
    case "standard":
    default:
      return STANDARD_CLASSIFIER_POLICY;
  }
}

export function resolvePfandPolicy(
  preset: ClassifierPreset = "standard",
  overrides: PfandPolicyOverrides = {},
): PfandPolicy {
  const classifier = classifierPolicyForPreset(preset);

  return PfandPolicySchema.parse({
    classifier: {
      ...classifier,
      ...overrides.classifier,
      skipBoundaryLines: {
        ...classifier.skipBoundaryLines,
        ...overrides.classifier?.skipBoundaryLines,
      },
    },
    normalizer: { ...DEFAULT_NORMALIZER_POLICY, ...overrides.normalizer },
    deposit: { ...DEFAULT_DEPOSIT_POLICY, ...overrides.deposit },
  });
}
