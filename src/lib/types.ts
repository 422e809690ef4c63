export const ENCODING_TYPES = ["ean13", "ean8", "qr"] as const;

export type EncodingType = (typeof ENCODING_TYPES)[number];

export type BarcodeType = Exclude<EncodingType, "qr">;

export const OUTPUT_FORMATS = ["png", "pdf"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type GenerationRequest = {
  /** Number of codes to synthesise. Mutually exclusive with `file`. */
  count?: number;
  /** Plain-text file with one code per line. */
  file?: string;
  length: number;
  alphanumeric: boolean;
  encodingType: EncodingType;
  /** Logo composited over QR codes; ignored for barcodes. */
  logo?: string;
  outputDir: string;
  format: OutputFormat;
  /** Pack the written images and the manifest into a zip archive. */
  zip: boolean;
  /** Fixed QR width in pixels. Without it the module scale decides the size. */
  qrSize?: number;
  /** Logo side as a fraction of the QR side. */
  logoScale: number;
};

export type ManifestEntry = {
  code: string;
  filename: string;
};

export type ProcessResult = {
  code: string;
  outcome: "ok" | "error";
  filename?: string;
  message?: string;
};

export type RunSummary = {
  total: number;
  written: number;
  failed: number;
  outputDir: string;
  manifestPath: string;
  archivePath?: string;
  results: ProcessResult[];
};
