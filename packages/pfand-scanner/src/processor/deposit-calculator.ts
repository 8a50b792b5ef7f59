import type { DepositPolicy } from "@pfand/contracts";
import { DEFAULT_DEPOSIT_POLICY } from "./policy.js";

export function countDepositItems(
  items: readonly string[],
  policy: DepositPolicy = DEFAULT_DEPOSIT_POLICY,
): number {
  const keywords = policy.containerKeywords.map((keyword) => keyword.toLowerCase());

  return items.filter((item) => {
    const lowered = item.toLowerCase();
    return keywords.some((keyword) => lowered.includes(keyword));
  }).length;
}

export function calculateDeposit(
  items: readonly string[],
  policy: DepositPolicy = DEFAULT_DEPOSIT_POLICY,
): number {
  return roundCurrency(countDepositItems(items, policy) * policy.perUnitDeposit);
}

// Ties round up (`toFixed` picks the larger candidate), so 0.125 becomes 0.13.
export function roundCurrency(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Number.parseFloat(value.toFixed(2));
}
