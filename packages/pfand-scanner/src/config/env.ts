import { readFile } from "node:fs/promises";
import {
  ClassifierPresetSchema,
  PfandPolicyOverridesSchema,
  type ClassifierPreset,
  type PfandPolicy,
} from "@pfand/contracts";
import { resolvePfandPolicy } from "../processor/policy.js";

export type ScannerConfig = {
  ocrCommand?: string;
  ocrArgs: string[];
  ocrTimeoutMs: number;
  maxImageSide: number;
  preset: ClassifierPreset;
  policyFile?: string;
};

export function readScannerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  return {
    ocrCommand: env.PFAND_OCR_COMMAND?.trim() || undefined,
    ocrArgs: (env.PFAND_OCR_ARGS ?? "").split(/\s+/).filter((arg) => arg.length > 0),
    ocrTimeoutMs: readPositiveInt(env, "PFAND_OCR_TIMEOUT_MS", 120_000),
    maxImageSide: readPositiveInt(env, "PFAND_MAX_IMAGE_SIDE", 1600),
    preset: parsePreset(env.PFAND_CLASSIFIER_PRESET),
    policyFile: env.PFAND_POLICY_FILE?.trim() || undefined,
  };
}

export function parsePreset(value: string | undefined): ClassifierPreset {
  const lowered = value?.trim().toLowerCase();
  if (!lowered) {
    return "standard";
  }

  const parsed = ClassifierPresetSchema.safeParse(lowered);
  if (!parsed.success) {
    throw new Error(`invalid PFAND_CLASSIFIER_PRESET: ${value}`);
  }
  return parsed.data;
}

export async function loadPfandPolicy(
  config: Pick<ScannerConfig, "preset" | "policyFile">,
): Promise<PfandPolicy> {
  if (!config.policyFile) {
    return resolvePfandPolicy(config.preset);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(config.policyFile, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`cannot read PFAND_POLICY_FILE ${config.policyFile}: ${reason}`);
  }

  const overrides = PfandPolicyOverridesSchema.safeParse(raw);
  if (!overrides.success) {
    const issues = overrides.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid PFAND_POLICY_FILE ${config.policyFile}: ${issues}`);
  }

  return resolvePfandPolicy(config.preset, overrides.data);
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}
