import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { preprocessReceiptImage } from "./image-preprocessor.js";

async function createImage(width: number, height: number, format: "png" | "jpeg"): Promise<Buffer> {
  const image = sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 240, g: 240, b: 235 },
    },
  });

  return format === "png" ? image.png().toBuffer() : image.jpeg({ quality: 90 }).toBuffer();
}

describe("preprocessReceiptImage", () => {
  it("keeps the original image when already within the size threshold", async () => {
    const input = await createImage(900, 1200, "jpeg");
    const output = await preprocessReceiptImage(input);

    expect(output.resized).toBe(false);
    expect(output.image).toBe(input);
    expect(output.skippedReason).toBeUndefined();
  });

  it("downscales tall receipts to the max side and re-encodes them as jpeg", async () => {
    const input = await createImage(800, 2400, "png");
    const output = await preprocessReceiptImage(input);

    expect(output.resized).toBe(true);
    const metadata = await sharp(output.image).metadata();
    expect(metadata.format).toBe("jpeg");
    expect(metadata.height).toBe(1600);
  });

  it("honours a custom max side", async () => {
    const input = await createImage(600, 300, "png");
    const output = await preprocessReceiptImage(input, { maxLongestSide: 300 });

    const metadata = await sharp(output.image).metadata();
    expect(Math.max(metadata.width ?? 0, metadata.height ?? 0)).toBe(300);
  });

  it("passes undecodable input through with a reason", async () => {
    const input = Buffer.from("not an image");
    const output = await preprocessReceiptImage(input);

    expect(output.image).toBe(input);
    expect(output.resized).toBe(false);
    expect(output.skippedReason).toBeDefined();
  });

  it("skips empty buffers", async () => {
    const output = await preprocessReceiptImage(Buffer.alloc(0));
    expect(output.skippedReason).toBe("empty image");
  });
});
