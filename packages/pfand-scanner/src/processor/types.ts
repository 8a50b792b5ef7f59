import type { LineRule, PfandPolicy } from "@pfand/contracts";

export type LineContext = {
  index: number;
  totalLinesInBlock: number;
};

export type RawLine = LineContext & {
  text: string;
};

export type ClassifierDecision = {
  accepted: boolean;
  rule: LineRule;
};

export type ProcessReceiptOptions = {
  policy?: PfandPolicy;
  includeVerdicts?: boolean;
};
