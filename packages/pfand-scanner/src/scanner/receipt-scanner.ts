import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import {
  OcrDocumentSchema,
  type PfandPolicy,
  type ReceiptResult,
  type ScanErrorCode,
  type ScanErrorPayload,
} from "@pfand/contracts";
import {
  preprocessReceiptImage,
  type ReceiptImagePreprocessOptions,
} from "../ocr/image-preprocessor.js";
import type { OcrEngine } from "../ocr/types.js";
import { DEFAULT_PFAND_POLICY } from "../processor/policy.js";
import { processReceipt } from "../processor/receipt-processor.js";

export const SUPPORTED_IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".tiff", ".tif"];

export type ScanOutcome =
  | { ok: true; result: ReceiptResult }
  | { ok: false; error: ScanErrorPayload };

export type ScannerLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type ReceiptScannerOptions = {
  engine?: OcrEngine;
  policy?: PfandPolicy;
  preprocess?: ReceiptImagePreprocessOptions;
  includeVerdicts?: boolean;
  logger?: ScannerLogger;
};

const defaultLogger: ScannerLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScanError";
    this.code = code;
  }

  toPayload(): ScanErrorPayload {
    return { code: this.code, message: this.message };
  }
}

/**
 * Boundary between receipt files and the line heuristics. One scanner holds one OCR engine
 * for the whole session; every failure comes back as a typed outcome.
 */
export class ReceiptScanner {
  private readonly engine: OcrEngine | undefined;
  private readonly policy: PfandPolicy;
  private readonly preprocess: ReceiptImagePreprocessOptions;
  private readonly includeVerdicts: boolean;
  private readonly logger: ScannerLogger;

  constructor(options: ReceiptScannerOptions = {}) {
    this.engine = options.engine;
    this.policy = options.policy ?? DEFAULT_PFAND_POLICY;
    this.preprocess = options.preprocess ?? {};
    this.includeVerdicts = options.includeVerdicts ?? false;
    this.logger = options.logger ?? defaultLogger;
  }

  async scan(imagePath: string): Promise<ScanOutcome> {
    return this.capture(imagePath, () => this.scanImage(imagePath));
  }

  async processExportFile(exportPath: string): Promise<ScanOutcome> {
    return this.capture(exportPath, async () => {
      const text = (await readSourceFile(exportPath)).toString("utf8");

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (error) {
        throw new ScanError("malformed_ocr_output", `OCR export ${exportPath} is not valid JSON`, {
          cause: error,
        });
      }

      return this.processValidated(raw, exportPath);
    });
  }

  processDocument(raw: unknown): ScanOutcome {
    try {
      return { ok: true, result: this.processValidated(raw, "document") };
    } catch (error) {
      if (error instanceof ScanError) {
        return { ok: false, error: error.toPayload() };
      }
      throw error;
    }
  }

  private async scanImage(imagePath: string): Promise<ReceiptResult> {
    const extension = extname(imagePath).toLowerCase();
    if (!SUPPORTED_IMAGE_EXTENSIONS.includes(extension)) {
      throw new ScanError(
        "unsupported_image",
        `unsupported receipt image type "${extension || "(none)"}"; expected one of ${SUPPORTED_IMAGE_EXTENSIONS.join(", ")}`,
      );
    }

    const engine = this.engine;
    if (!engine) {
      throw new ScanError("ocr_failed", "no OCR engine configured; set PFAND_OCR_COMMAND");
    }

    const original = await readSourceFile(imagePath);
    const prepared = await preprocessReceiptImage(original, this.preprocess);
    if (prepared.skippedReason) {
      this.logger.warn(
        `[pfand-scanner] preprocessing skipped for ${imagePath}: ${prepared.skippedReason}`,
      );
    }

    let raw: unknown;
    try {
      raw = await engine.recognize({ image: prepared.image, sourcePath: imagePath });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ScanError("ocr_failed", `error processing receipt: ${message}`, { cause: error });
    }

    return this.processValidated(raw, imagePath);
  }

  private processValidated(raw: unknown, source: string): ReceiptResult {
    const parsed = OcrDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ScanError("malformed_ocr_output", `unexpected OCR output for ${source}: ${issues}`);
    }

    return processReceipt(parsed.data, {
      policy: this.policy,
      includeVerdicts: this.includeVerdicts,
    });
  }

  private async capture(
    source: string,
    run: () => Promise<ReceiptResult>,
  ): Promise<ScanOutcome> {
    this.logger.info(`[pfand-scanner] processing ${source}`);
    try {
      const result = await run();
      this.logger.info(
        `[pfand-scanner] completed ${source}: ${result.items.length} items, refund ${result.refund.toFixed(2)}`,
      );
      return { ok: true, result };
    } catch (error) {
      if (!(error instanceof ScanError)) {
        throw error;
      }
      this.logger.error(`[pfand-scanner] failed ${source}: ${error.message}`);
      return { ok: false, error: error.toPayload() };
    }
  }
}

async function readSourceFile(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new ScanError("file_not_found", `file '${path}' not found`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ScanError("file_not_found", `cannot read '${path}': ${message}`, { cause: error });
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
