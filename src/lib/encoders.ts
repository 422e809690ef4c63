import QRCode from "qrcode";
import { toBuffer as renderBwip } from "bwip-js";
import { CodegenError, ErrorCode } from "./errors.js";
import type { BarcodeType, EncodingType } from "./types.js";

/** EAN symbologies: data digits followed by one check digit. */
export const SYMBOLOGIES = {
  ean13: { label: "EAN13", bcid: "ean13", dataLength: 12 },
  ean8: { label: "EAN8", bcid: "ean8", dataLength: 7 },
} as const satisfies Record<BarcodeType, { label: string; bcid: string; dataLength: number }>;

const QR_ERROR_CORRECTION = "H";
const QR_MARGIN = 5;
const QR_SCALE = 10;
const BARCODE_SCALE = 3;
const BARCODE_HEIGHT_MM = 15;
const BARCODE_PADDING = 10;

export type RenderOptions = {
  /** Fixed QR width in pixels. */
  qrSize?: number;
};

export const isBarcodeType = (type: EncodingType): type is BarcodeType => type !== "qr";

/**
 * GS1 mod-10 check digit. Weights alternate 3, 1, ... starting from the
 * rightmost data digit.
 */
export function eanCheckDigit(digits: string): number {
  if (!/^\d+$/.test(digits)) {
    throw new CodegenError(ErrorCode.CODE_MISMATCH, `Check digit needs digits only, got '${digits}'`);
  }
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    const d = digits.charCodeAt(digits.length - 1 - i) - 48;
    sum += i % 2 === 0 ? d * 3 : d;
  }
  return (10 - (sum % 10)) % 10;
}

/**
 * Full digit string a barcode encodes for `code`.
 * Accepts the data digits (check digit appended) or data plus a correct check digit.
 */
export function normalizeBarcodeCode(code: string, type: BarcodeType): string {
  const { label, dataLength } = SYMBOLOGIES[type];
  if (!/^\d+$/.test(code)) {
    throw new CodegenError(ErrorCode.CODE_MISMATCH, `${label} code '${code}' must contain digits only`);
  }
  if (code.length === dataLength) {
    return `${code}${eanCheckDigit(code)}`;
  }
  if (code.length === dataLength + 1) {
    const data = code.slice(0, dataLength);
    const expected = eanCheckDigit(data);
    if (Number(code.charAt(dataLength)) !== expected) {
      throw new CodegenError(
        ErrorCode.CODE_MISMATCH,
        `${label} code '${code}' has check digit ${code.charAt(dataLength)}, expected ${expected}`
      );
    }
    return code;
  }
  throw new CodegenError(
    ErrorCode.CODE_MISMATCH,
    `${label} code '${code}' must have ${dataLength} digits (or ${dataLength + 1} with check digit), got ${code.length}`
  );
}

/** Rejects the batch on the first code that does not fit `type`. */
export function validateCodes(codes: readonly string[], type: EncodingType): void {
  for (const code of codes) {
    if (!code) {
      throw new CodegenError(ErrorCode.CODE_MISMATCH, "Empty code cannot be encoded");
    }
    if (isBarcodeType(type)) {
      normalizeBarcodeCode(code, type);
    }
  }
}

export async function generateQRPng(text: string, options: RenderOptions = {}): Promise<Buffer> {
  if (!text) {
    throw new CodegenError(ErrorCode.CODE_MISMATCH, "Cannot generate a QR code without content");
  }
  return QRCode.toBuffer(text, {
    type: "png",
    errorCorrectionLevel: QR_ERROR_CORRECTION,
    margin: QR_MARGIN,
    ...(options.qrSize ? { width: options.qrSize } : { scale: QR_SCALE }),
    color: {
      dark: "#000000",
      light: "#ffffff",
    },
  });
}

export async function generateBarcodePng(code: string, type: BarcodeType): Promise<Buffer> {
  const text = normalizeBarcodeCode(code, type);
  return renderBwip({
    bcid: SYMBOLOGIES[type].bcid,
    text,
    scale: BARCODE_SCALE,
    height: BARCODE_HEIGHT_MM,
    includetext: true,
    textxalign: "center",
    backgroundcolor: "FFFFFF",
    paddingwidth: BARCODE_PADDING,
    paddingheight: BARCODE_PADDING,
  });
}

/** PNG image of `code` in the requested symbology. */
export async function renderCode(code: string, type: EncodingType, options: RenderOptions = {}): Promise<Buffer> {
  if (isBarcodeType(type)) {
    return generateBarcodePng(code, type);
  }
  return generateQRPng(code, options);
}
