export type OcrInput = {
  image: Buffer;
  sourcePath: string;
};

/**
 * External text recognizer. Output is untrusted: the scanner validates it against the OCR
 * export document schema before any line is classified.
 */
export type OcrEngine = {
  readonly name: string;
  recognize: (input: OcrInput) => Promise<unknown>;
};
