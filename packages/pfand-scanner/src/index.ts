export * from "./cli/run-cli.js";
export * from "./config/env.js";
export * from "./ocr/command-engine.js";
export * from "./ocr/image-preprocessor.js";
export * from "./ocr/types.js";
export * from "./processor/deposit-calculator.js";
export * from "./processor/line-classifier.js";
export * from "./processor/normalization.js";
export * from "./processor/policy.js";
export * from "./processor/receipt-processor.js";
export * from "./processor/types.js";
export * from "./scanner/receipt-scanner.js";
