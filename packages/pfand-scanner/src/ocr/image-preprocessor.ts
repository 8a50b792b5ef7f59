import sharp from "sharp";

export type ReceiptImagePreprocessOptions = {
  maxLongestSide?: number;
  jpegQuality?: number;
};

export type PreprocessedImage = {
  image: Buffer;
  resized: boolean;
  skippedReason?: string;
};

const DEFAULT_MAX_LONGEST_SIDE = 1600;
const DEFAULT_JPEG_QUALITY = 75;

export async function preprocessReceiptImage(
  input: Buffer,
  options: ReceiptImagePreprocessOptions = {},
): Promise<PreprocessedImage> {
  if (input.length === 0) {
    return { image: input, resized: false, skippedReason: "empty image" };
  }

  const maxLongestSide = options.maxLongestSide ?? DEFAULT_MAX_LONGEST_SIDE;
  const jpegQuality = options.jpegQuality ?? DEFAULT_JPEG_QUALITY;

  try {
    const metadata = await sharp(input).metadata();
    const width = metadata.width ?? 0;
    const height = metadata.height ?? 0;
    if (width <= 0 || height <= 0) {
      return { image: input, resized: false, skippedReason: "unknown image dimensions" };
    }

    const longestSide = Math.max(width, height);
    if (longestSide <= maxLongestSide) {
      return { image: input, resized: false };
    }

    const output = await sharp(input)
      .rotate()
      .resize({
        width: maxLongestSide,
        height: maxLongestSide,
        fit: "inside",
        withoutEnlargement: true,
      })
      .jpeg({ quality: jpegQuality, mozjpeg: true })
      .toBuffer();

    return { image: output, resized: true };
  } catch (error) {
    return {
      image: input,
      resized: false,
      skippedReason: error instanceof Error ? error.message : String(error),
    };
  }
}
