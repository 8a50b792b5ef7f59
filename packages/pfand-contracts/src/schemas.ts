import { z } from "zod";

export const OcrWordSchema = z.object({
  value: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});

export const OcrLineSchema = z.object({
  words: z.array(OcrWordSchema),
});

export const OcrBlockSchema = z.object({
  lines: z.array(OcrLineSchema),
});

export const OcrPageSchema = z.object({
  blocks: z.array(OcrBlockSchema),
});

const OcrPagedDocumentSchema = z.object({
  pages: z.array(OcrPageSchema).min(1),
});

// Some engines export a single page without the `pages` wrapper.
export const OcrDocumentSchema = z.union([
  OcrPagedDocumentSchema,
  OcrPageSchema.transform((page) => ({ pages: [page] })),
]);

const RegexSourceSchema = z
  .string()
  .min(1)
  .refine(isValidUnicodeRegex, { message: "must be a valid regular expression" });

export const DEFAULT_CLUTTER_KEYWORDS = [
  "store",
  "total",
  "due",
  "debit",
  "credit",
  "cash",
  "payment",
  "change",
  "balance",
  "date",
  "time",
  "vat",
  "tax",
  "thank you",
  "subtotal",
  "discount",
  "offer",
  "feedback",
  "survey",
  "prices",
  "network",
  "terminal",
  "ref",
  "aid",
  "appr code",
  "st#",
  "op#",
  "te#",
  "tr#",
  "tc#",
];

export const DEFAULT_CONTAINER_KEYWORDS = [
  "coca cola",
  "pepsi",
  "dasani",
  "bottle",
  "sprite",
  "fanta",
  "evian",
  "volvic",
  "nestle",
  "mineral water",
  "glass bottle",
  "plastic bottle",
];

export const BoundarySkipSchema = z.object({
  enabled: z.boolean(),
  marginCount: z.number().int().min(0),
});

export const ClassifierPolicySchema = z.object({
  clutterKeywords: z.array(z.string().min(1)),
  maxDigitRatio: z.number().min(0).max(1).nullable(),
  maxDigitCount: z.number().int().min(0).nullable(),
  disallowedCharacters: RegexSourceSchema,
  minLength: z.number().int().min(0),
  maxLength: z.number().int().positive(),
  pricePattern: RegexSourceSchema.nullable(),
  skipBoundaryLines: BoundarySkipSchema,
});

export const ItemOrderSchema = z.enum(["sorted", "first-seen"]);
export const CapitalizationSchema = z.enum(["sentence", "first-letter"]);

export const NormalizerPolicySchema = z.object({
  order: ItemOrderSchema,
  capitalization: CapitalizationSchema,
});

export const DepositPolicySchema = z.object({
  containerKeywords: z.array(z.string().min(1)),
  perUnitDeposit: z.number().nonnegative(),
});

export const PfandPolicySchema = z.object({
  classifier: ClassifierPolicySchema,
  normalizer: NormalizerPolicySchema,
  deposit: DepositPolicySchema,
});

// Policy files override individual fields of a preset.
export const PfandPolicyOverridesSchema = z
  .object({
    classifier: ClassifierPolicySchema.extend({
      skipBoundaryLines: BoundarySkipSchema.partial(),
    })
      .partial()
      .strict(),
    normalizer: NormalizerPolicySchema.partial().strict(),
    deposit: DepositPolicySchema.partial().strict(),
  })
  .partial()
  .strict();

export const ClassifierPresetSchema = z.enum(["standard", "conservative"]);

export const LineRuleSchema = z.enum([
  "boundary",
  "keyword",
  "digit-density",
  "symbol",
  "length",
  "bare-price",
  "price-with-text",
  "accepted",
]);

export const LineVerdictSchema = z.object({
  text: z.string(),
  index: z.number().int().min(0),
  accepted: z.boolean(),
  rule: LineRuleSchema,
});

export const ReceiptResultSchema = z.object({
  items: z.array(z.string().min(1)),
  refund: z.number().nonnegative(),
  depositItemCount: z.number().int().min(0),
  lines: z.array(LineVerdictSchema).optional(),
});

export const ScanErrorCodeSchema = z.enum([
  "file_not_found",
  "unsupported_image",
  "ocr_failed",
  "malformed_ocr_output",
]);

export const ScanErrorSchema = z.object({
  code: ScanErrorCodeSchema,
  message: z.string().min(1),
});

export type OcrWord = z.infer<typeof OcrWordSchema>;
export type OcrLine = z.infer<typeof OcrLineSchema>;
export type OcrBlock = z.infer<typeof OcrBlockSchema>;
export type OcrPage = z.infer<typeof OcrPageSchema>;
export type OcrDocument = z.output<typeof OcrDocumentSchema>;
export type BoundarySkip = z.infer<typeof BoundarySkipSchema>;
export type ClassifierPolicy = z.infer<typeof ClassifierPolicySchema>;
export type ItemOrder = z.infer<typeof ItemOrderSchema>;
export type Capitalization = z.infer<typeof CapitalizationSchema>;
export type NormalizerPolicy = z.infer<typeof NormalizerPolicySchema>;
export type DepositPolicy = z.infer<typeof DepositPolicySchema>;
export type PfandPolicy = z.infer<typeof PfandPolicySchema>;
export type PfandPolicyOverrides = z.infer<typeof PfandPolicyOverridesSchema>;
export type ClassifierPreset = z.infer<typeof ClassifierPresetSchema>;
export type LineRule = z.infer<typeof LineRuleSchema>;
export type LineVerdict = z.infer<typeof LineVerdictSchema>;
export type ReceiptResult = z.infer<typeof ReceiptResultSchema>;
export type ScanErrorCode = z.infer<typeof ScanErrorCodeSchema>;
export type ScanErrorPayload = z.infer<typeof ScanErrorSchema>;

function isValidUnicodeRegex(source: string): boolean {
  try {
    new RegExp(source, "u");
    return true;
  } catch {
    return false;
  }
}
