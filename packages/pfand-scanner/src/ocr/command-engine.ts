import { spawn } from "node:child_process";
import type { OcrEngine, OcrInput } from "./types.js";

export type CommandRequest = {
  command: string;
  args: string[];
  input: Buffer;
  timeoutMs: number;
};

export type CommandResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

export type CommandOcrEngineOptions = {
  command: string;
  args?: string[];
  timeoutMs?: number;
  runCommand?: CommandRunner;
};

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Runs an external OCR program once per image. The image bytes go to the program's stdin and
 * the program prints its export document as JSON on stdout.
 */
export class CommandOcrEngine implements OcrEngine {
  readonly name: string;
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs: number;
  private readonly runCommand: CommandRunner;

  constructor(options: CommandOcrEngineOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.runCommand = options.runCommand ?? spawnCommand;
    this.name = `command:${this.command}`;
  }

  async recognize(input: OcrInput): Promise<unknown> {
    const result = await this.runCommand({
      command: this.command,
      args: [...this.args],
      input: input.image,
      timeoutMs: this.timeoutMs,
    });

    if (result.signal) {
      throw new Error(
        `ocr command ${this.command} was stopped by ${result.signal} after at most ${this.timeoutMs}ms`,
      );
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new Error(
        `ocr command ${this.command} exited with code ${result.exitCode}${detail ? `: ${detail}` : ""}`,
      );
    }

    return parseCommandOutput(result.stdout);
  }
}

export function parseCommandOutput(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) {
    throw new Error("ocr command printed no output");
  }

  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`ocr command printed invalid JSON: ${reason}`);
  }
}

export const spawnCommand: CommandRunner = (request) =>
  new Promise<CommandResult>((resolve, reject) => {
    // SIGKILL so a program that ignores SIGTERM cannot outlive the timeout.
    const child = spawn(request.command, request.args, {
      timeout: request.timeoutMs,
      killSignal: "SIGKILL",
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let stdinError: Error | undefined;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    // Programs that read the image from a path may close stdin early.
    child.stdin.on("error", (error) => {
      stdinError = error;
    });
    child.on("error", reject);
    child.on("close", (exitCode, signal) => {
      const stderrText = Buffer.concat(stderr).toString("utf8");
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr:
          stdinError && exitCode !== 0 ? `${stderrText}\n${stdinError.message}`.trim() : stderrText,
      });
    });

    child.stdin.end(request.input);
  });
