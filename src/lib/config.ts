import path from "node:path";
import { CodegenError, ErrorCode } from "./errors.js";
import { SYMBOLOGIES, isBarcodeType } from "./encoders.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  ENCODING_TYPES,
  OUTPUT_FORMATS,
  type EncodingType,
  type GenerationRequest,
  type OutputFormat,
} from "./types.js";

export const DEFAULT_LENGTH = 12;
export const DEFAULT_ENCODING_TYPE: EncodingType = "ean13";
export const DEFAULT_OUTPUT_DIR = "output";
export const DEFAULT_FORMAT: OutputFormat = "png";
export const DEFAULT_LOGO_SCALE = 0.25;
// Largest logo that error correction level H reliably reads through.
export const MAX_LOGO_SCALE = 0.25;
export const MANIFEST_FILE = "manifest.csv";
export const ARCHIVE_FILE = "codes.zip";
export const MAX_ATTEMPTS_PER_CODE = 1000;

/** Options as they arrive from the command line (or a library caller). */
export type RawOptions = {
  file?: string;
  count?: string | number;
  length?: string | number;
  alphanum?: boolean;
  encodingType?: string;
  image?: string;
  outputDir?: string;
  format?: string;
  zip?: boolean;
  qrSize?: string | number;
  logoScale?: string | number;
};

const invalid = (message: string): CodegenError =>
  new CodegenError(ErrorCode.INVALID_OPTIONS, message);

function parsePositiveInt(value: string | number, flag: string): number {
  const text = `${value}`.trim();
  if (!/^\d+$/.test(text) || Number(text) < 1) {
    throw invalid(`${flag} must be a positive integer, got '${value}'`);
  }
  return Number(text);
}

function parseFraction(value: string | number, flag: string, max: number): number {
  const parsed = typeof value === "number" ? value : Number(`${value}`.trim());
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > max) {
    throw invalid(`${flag} must be greater than 0 and at most ${max}, got '${value}'`);
  }
  return parsed;
}

function parseChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const normalized = value.trim().toLowerCase();
  const match = choices.find((choice) => choice === normalized);
  if (!match) {
    throw invalid(`${flag} must be one of ${choices.join(", ")}, got '${value}'`);
  }
  return match;
}

/**
 * Validate raw options and fill in defaults.
 * Relative paths are resolved against `cwd`.
 */
export function resolveRequest(
  options: RawOptions,
  logger: Logger = silentLogger,
  cwd: string = process.cwd()
): GenerationRequest {
  const file = options.file?.trim() || undefined;
  const hasCount = options.count !== undefined && `${options.count}`.trim() !== "";

  if (file && hasCount) {
    throw invalid("Use either --file or --count, not both");
  }
  if (!file && !hasCount) {
    throw invalid("One of --file or --count is required");
  }

  const count = hasCount && options.count !== undefined ? parsePositiveInt(options.count, "--count") : undefined;
  const encodingType = options.encodingType
    ? parseChoice(options.encodingType, ENCODING_TYPES, "--encoding-type")
    : DEFAULT_ENCODING_TYPE;
  // Without --length, barcodes default to their data length (12 for EAN13, 7 for EAN8).
  const length =
    options.length !== undefined
      ? parsePositiveInt(options.length, "--length")
      : isBarcodeType(encodingType)
        ? SYMBOLOGIES[encodingType].dataLength
        : DEFAULT_LENGTH;
  const format = options.format ? parseChoice(options.format, OUTPUT_FORMATS, "--format") : DEFAULT_FORMAT;
  const alphanumeric = options.alphanum === true;
  const qrSize = options.qrSize !== undefined ? parsePositiveInt(options.qrSize, "--qr-size") : undefined;
  const logoScale =
    options.logoScale !== undefined
      ? parseFraction(options.logoScale, "--logo-scale", MAX_LOGO_SCALE)
      : DEFAULT_LOGO_SCALE;

  if (isBarcodeType(encodingType)) {
    const symbology = SYMBOLOGIES[encodingType];
    if (alphanumeric) {
      throw new CodegenError(
        ErrorCode.CODE_MISMATCH,
        `${symbology.label} encodes digits only; --alphanum cannot be combined with --encoding-type ${encodingType}`
      );
    }
    // Synthesised codes carry data digits only; the check digit is added when rendering.
    if (count !== undefined && length !== symbology.dataLength) {
      throw new CodegenError(
        ErrorCode.CODE_MISMATCH,
        `${symbology.label} needs ${symbology.dataLength} data digits, got --length ${length}`
      );
    }
  }

  let logo = options.image?.trim() || undefined;
  if (logo && encodingType !== "qr") {
    logger.warn(`Logo ${logo} ignored: logos are only embedded in QR codes`);
    logo = undefined;
  }

  return {
    count,
    file: file ? path.resolve(cwd, file) : undefined,
    length,
    alphanumeric,
    encodingType,
    logo: logo ? path.resolve(cwd, logo) : undefined,
    outputDir: path.resolve(cwd, options.outputDir?.trim() || DEFAULT_OUTPUT_DIR),
    format,
    zip: options.zip === true,
    qrSize,
    logoScale,
  };
}
