import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { OcrEngine } from "../ocr/types.js";
import { USAGE, runCli, type CliIo } from "./run-cli.js";

function exportDocument(lines: string[]) {
  return {
    pages: [
      {
        blocks: [
          {
            lines: lines.map((line) => ({
              words: line.split(" ").map((value) => ({ value })),
            })),
          },
        ],
      },
    ],
  };
}

function createIo() {
  return { stdout: vi.fn<CliIo["stdout"]>(), stderr: vi.fn<CliIo["stderr"]>() };
}

describe("runCli", () => {
  let dir: string;
  let exportPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pfand-cli-"));
    exportPath = join(dir, "receipt.json");
    await writeFile(
      exportPath,
      JSON.stringify(exportDocument(["STORE XYZ", "Sprite bottle", "Bread"])),
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage on --help", async () => {
    const io = createIo();
    await expect(runCli(["--help"], { env: {}, io })).resolves.toBe(0);
    expect(io.stdout).toHaveBeenCalledWith(USAGE);
  });

  it("exits with 2 on missing arguments or unknown flags", async () => {
    const io = createIo();
    await expect(runCli([], { env: {}, io })).resolves.toBe(2);
    await expect(runCli(["process", exportPath, "--verbose"], { env: {}, io })).resolves.toBe(2);
    await expect(runCli(["render", exportPath], { env: {}, io })).resolves.toBe(2);
    expect(io.stderr).toHaveBeenCalledWith(USAGE);
  });

  it("prints items and the refund for a saved OCR export", async () => {
    const io = createIo();

    await expect(runCli(["process", exportPath], { env: {}, io })).resolves.toBe(0);

    expect(io.stdout).toHaveBeenCalledTimes(1);
    expect(io.stdout).toHaveBeenCalledWith(
      "Extracted Items:\nBread\nSprite bottle\n\nTotal Pfand Refund: €0.25",
    );
  });

  it("prints JSON and line verdicts on request", async () => {
    const jsonIo = createIo();
    await runCli(["process", exportPath, "--json"], { env: {}, io: jsonIo });
    const printed = jsonIo.stdout.mock.calls[0]?.[0] ?? "";
    expect(JSON.parse(printed)).toEqual({
      items: ["Bread", "Sprite bottle"],
      refund: 0.25,
      depositItemCount: 1,
    });

    const explainIo = createIo();
    await runCli(["process", exportPath, "--explain"], { env: {}, io: explainIo });
    expect(explainIo.stdout.mock.calls[0]?.[0]).toBe(
      "- [keyword] STORE XYZ\n+ [accepted] Sprite bottle\n+ [accepted] Bread\n",
    );
  });

  it("scans images through the injected OCR engine", async () => {
    const imagePath = join(dir, "receipt.jpg");
    await writeFile(imagePath, "fake-image");
    const engine: OcrEngine = {
      name: "fake",
      recognize: async () => exportDocument(["Evian 1L", "Bread"]),
    };
    const io = createIo();

    await expect(runCli(["scan", imagePath], { env: {}, io, engine })).resolves.toBe(0);

    expect(io.stdout).toHaveBeenCalledWith(
      "Extracted Items:\nBread\nEvian 1l\n\nTotal Pfand Refund: €0.25",
    );
  });

  it("exits with 1 when the scan fails", async () => {
    const io = createIo();

    await expect(runCli(["scan", join(dir, "receipt.png")], { env: {}, io })).resolves.toBe(1);

    expect(io.stderr).toHaveBeenCalledWith(
      "error [ocr_failed]: no OCR engine configured; set PFAND_OCR_COMMAND",
    );
  });

  it("exits with 2 on configuration errors", async () => {
    const io = createIo();

    await expect(
      runCli(["process", exportPath, "--preset", "strict"], { env: {}, io }),
    ).resolves.toBe(2);
    await expect(
      runCli(["process", exportPath], { env: { PFAND_OCR_TIMEOUT_MS: "soon" }, io }),
    ).resolves.toBe(2);

    expect(io.stderr).toHaveBeenCalledWith("configuration error: invalid --preset: strict");
    expect(io.stderr).toHaveBeenCalledWith("configuration error: invalid PFAND_OCR_TIMEOUT_MS: soon");
  });
});
