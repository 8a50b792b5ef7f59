import type { LineVerdict, OcrDocument, ReceiptResult } from "@pfand/contracts";
import { countDepositItems, roundCurrency } from "./deposit-calculator.js";
import { explainLine } from "./line-classifier.js";
import { normalizeItems } from "./normalization.js";
import { DEFAULT_PFAND_POLICY } from "./policy.js";
import type { ProcessReceiptOptions, RawLine } from "./types.js";

export function extractRawLines(document: OcrDocument): RawLine[] {
  const lines: RawLine[] = [];

  for (const page of document.pages) {
    for (const block of page.blocks) {
      block.lines.forEach((line, index) => {
        lines.push({
          text: line.words.map((word) => word.value).join(" "),
          index,
          totalLinesInBlock: block.lines.length,
        });
      });
    }
  }

  return lines;
}

export function processReceipt(
  document: OcrDocument,
  options: ProcessReceiptOptions = {},
): ReceiptResult {
  const policy = options.policy ?? DEFAULT_PFAND_POLICY;
  const candidates: string[] = [];
  const verdicts: LineVerdict[] = [];

  for (const line of extractRawLines(document)) {
    const decision = explainLine(line.text, line, policy.classifier);
    if (decision.accepted) {
      candidates.push(line.text.trim());
    }
    verdicts.push({ text: line.text, index: line.index, ...decision });
  }

  // Deposit counting runs on the deduplicated list, so repeated lines count once.
  const items = normalizeItems(candidates, policy.normalizer);
  const depositItemCount = countDepositItems(items, policy.deposit);

  return {
    items,
    refund: roundCurrency(depositItemCount * policy.deposit.perUnitDeposit),
    depositItemCount,
    ...(options.includeVerdicts ? { lines: verdicts } : {}),
  };
}

export function formatReceiptResult(result: ReceiptResult): string {
  if (result.items.length === 0) {
    return "No valid items found.";
  }

  return [
    "Extracted Items:",
    ...result.items,
    "",
    `Total Pfand Refund: €${result.refund.toFixed(2)}`,
  ].join("\n");
}

export function formatLineVerdicts(verdicts: readonly LineVerdict[]): string {
  return verdicts
    .map((verdict) => `${verdict.accepted ? "+" : "-"} [${verdict.rule}] ${verdict.text}`)
    .join("\n");
}
