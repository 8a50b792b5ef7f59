import { parseArgs } from "node:util";
import { ClassifierPresetSchema, type ClassifierPreset } from "@pfand/contracts";
import { loadPfandPolicy, readScannerConfigFromEnv, type ScannerConfig } from "../config/env.js";
import { CommandOcrEngine } from "../ocr/command-engine.js";
import type { OcrEngine } from "../ocr/types.js";
import { formatLineVerdicts, formatReceiptResult } from "../processor/receipt-processor.js";
import { ReceiptScanner, type ScanOutcome } from "../scanner/receipt-scanner.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export type RunCliOptions = {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  engine?: OcrEngine;
};

export const USAGE = [
  "usage: pfand <command> <file> [options]",
  "",
  "commands:",
  "  scan <image>          recognize a receipt image with the configured OCR command",
  "  process <export.json> run the item heuristics over a saved OCR export",
  "",
  "options:",
  "  --json                print the result as JSON",
  "  --explain             list the verdict for every recognized line",
  "  --preset <name>       classifier preset: standard or conservative",
  "  -h, --help            show this help",
].join("\n");

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;

  let parsed: ParsedCliArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 2;
  }

  if (parsed.values.help === true) {
    io.stdout(USAGE);
    return 0;
  }

  const [command, target] = parsed.positionals;
  if ((command !== "scan" && command !== "process") || !target) {
    io.stderr(USAGE);
    return 2;
  }

  let scanner: ReceiptScanner;
  try {
    const config = readScannerConfigFromEnv(options.env);
    const preset = resolvePreset(parsed.values.preset, config.preset);
    const policy = await loadPfandPolicy({ preset, policyFile: config.policyFile });
    scanner = new ReceiptScanner({
      engine: options.engine ?? createEngine(config),
      policy,
      preprocess: { maxLongestSide: config.maxImageSide },
      includeVerdicts: parsed.values.explain === true,
      logger: {
        info: () => {},
        warn: (message) => io.stderr(message),
        error: (message) => io.stderr(message),
      },
    });
  } catch (error) {
    io.stderr(`configuration error: ${error instanceof Error ? error.message : String(error)}`);
    return 2;
  }

  const outcome =
    command === "scan" ? await scanner.scan(target) : await scanner.processExportFile(target);

  return report(outcome, io, parsed.values.json === true);
}

type ParsedCliArgs = ReturnType<typeof parseCliArgs>;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      json: { type: "boolean" },
      explain: { type: "boolean" },
      preset: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

function resolvePreset(flag: string | undefined, fallback: ClassifierPreset): ClassifierPreset {
  if (flag === undefined) {
    return fallback;
  }

  const parsed = ClassifierPresetSchema.safeParse(flag);
  if (!parsed.success) {
    throw new Error(`invalid --preset: ${flag}`);
  }
  return parsed.data;
}

function createEngine(config: ScannerConfig): OcrEngine | undefined {
  if (!config.ocrCommand) {
    return undefined;
  }

  return new CommandOcrEngine({
    command: config.ocrCommand,
    args: config.ocrArgs,
    timeoutMs: config.ocrTimeoutMs,
  });
}

function report(outcome: ScanOutcome, io: CliIo, json: boolean): number {
  if (!outcome.ok) {
    io.stderr(`error [${outcome.error.code}]: ${outcome.error.message}`);
    return 1;
  }

  if (json) {
    io.stdout(JSON.stringify(outcome.result, null, 2));
    return 0;
  }

  if (outcome.result.lines) {
    io.stdout(`${formatLineVerdicts(outcome.result.lines)}\n`);
  }
  io.stdout(formatReceiptResult(outcome.result));
  return 0;
}
