import { describe, expect, it } from "vitest";
import { calculateDeposit, countDepositItems, roundCurrency } from "./deposit-calculator.js";

describe("calculateDeposit", () => {
  it("returns zero for no items", () => {
    expect(calculateDeposit([])).toBe(0);
  });

  it("charges 0.25 per matching item", () => {
    expect(calculateDeposit(["Coca cola 500ml", "Bread", "Pepsi bottle"])).toBe(0.5);
    expect(calculateDeposit(["FANTA Orange"])).toBe(0.25);
  });

  it("counts an item once even when several container terms match", () => {
    expect(countDepositItems(["Evian plastic bottle"])).toBe(1);
    expect(calculateDeposit(["Evian plastic bottle"])).toBe(0.25);
  });

  it("matches custom container terms case-insensitively", () => {
    const policy = { containerKeywords: ["Dose"], perUnitDeposit: 0.25 };
    expect(calculateDeposit(["Bier dose", "Bread"], policy)).toBe(0.25);
  });

  it("rounds ties half-up to two decimals", () => {
    const policy = { containerKeywords: ["sprite", "fanta", "pepsi"], perUnitDeposit: 0.125 };
    expect(calculateDeposit(["Sprite"], policy)).toBe(0.13);
    expect(calculateDeposit(["Sprite", "Fanta", "Pepsi"], policy)).toBe(0.38);
    expect(roundCurrency(0)).toBe(0);
  });
});
